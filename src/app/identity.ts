import { gameConfig } from 'config/game';
import type { ProfileStore, UserProfile } from 'storage/profile-store';

export type IdentityClaimFailure = 'invalid' | 'taken';

export type IdentityClaimResult =
    | { readonly ok: true; readonly profile: UserProfile }
    | { readonly ok: false; readonly reason: IdentityClaimFailure; readonly message: string };

const DIGITS_ONLY = /^\d+$/;

export const parseUserId = (raw: string): number | null => {
    const trimmed = raw.trim();
    if (!DIGITS_ONLY.test(trimmed)) {
        return null;
    }
    const userId = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(userId) ? userId : null;
};

/**
 * Claims a fresh numeric user id. An id that already has a stored profile is
 * rejected so the entry form can ask again.
 */
export const claimIdentity = async (store: ProfileStore, raw: string): Promise<IdentityClaimResult> => {
    const userId = parseUserId(raw);
    if (userId === null) {
        return { ok: false, reason: 'invalid', message: gameConfig.copy.identityInvalid };
    }

    if (await store.exists(userId)) {
        return { ok: false, reason: 'taken', message: `ID "${userId}" ${gameConfig.copy.identityTaken}` };
    }

    const profile = await store.createProfile(userId);
    return { ok: true, profile };
};
