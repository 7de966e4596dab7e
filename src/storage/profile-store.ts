import { gameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';

const STORAGE = gameConfig.storage;

export interface AttemptResult {
    readonly level: number;
    /** Tracking time for a give-up, reaction time for a completed level */
    readonly elapsedSeconds: number;
    /** False when the player gave up during tracking */
    readonly completed: boolean;
}

export interface UserProfile {
    readonly userId: number;
    readonly personalBest: number;
    readonly history: readonly AttemptResult[];
}

export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem'>;

/**
 * Per-user persistence contract. A user id stays claimed once a profile has
 * been created for it; there is no delete.
 */
export interface ProfileStore {
    exists(userId: number): Promise<boolean>;
    loadProfile(userId: number): Promise<UserProfile | null>;
    createProfile(userId: number): Promise<UserProfile>;
    saveBest(userId: number, level: number): Promise<void>;
    saveHistory(userId: number, history: readonly AttemptResult[]): Promise<void>;
}

export interface ProfileStoreOptions {
    readonly storage?: KeyValueStorage | null;
    readonly logger?: Logger;
}

interface PersistedProfile {
    readonly version: number;
    readonly userId: number;
    readonly personalBest: number;
    readonly history: readonly AttemptResult[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

export const profileKey = (userId: number): string => `${STORAGE.profilePrefix}::v${STORAGE.version}::${userId}`;

export const sanitizeAttempt = (value: unknown): AttemptResult | null => {
    if (!isRecord(value)) {
        return null;
    }

    const { level, elapsedSeconds, completed } = value;
    if (typeof level !== 'number' || !Number.isInteger(level) || level < 1) {
        return null;
    }
    if (typeof elapsedSeconds !== 'number' || !Number.isFinite(elapsedSeconds) || elapsedSeconds < 0) {
        return null;
    }
    if (typeof completed !== 'boolean') {
        return null;
    }

    return { level, elapsedSeconds, completed };
};

const sanitizeHistory = (value: unknown, logger: Logger, userId: number): AttemptResult[] => {
    if (!Array.isArray(value)) {
        logger.warn('Stored history is not a list; starting empty', { userId });
        return [];
    }

    const history: AttemptResult[] = [];
    for (const candidate of value) {
        const attempt = sanitizeAttempt(candidate);
        if (!attempt) {
            logger.warn('Stored history has a malformed entry; starting empty', { userId });
            return [];
        }
        history.push(attempt);
    }
    return history;
};

const sanitizePersonalBest = (value: unknown): number => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < STORAGE.defaultPersonalBest) {
        return STORAGE.defaultPersonalBest;
    }
    return value;
};

const resolveStorage = (explicit: KeyValueStorage | null | undefined, logger: Logger): KeyValueStorage | null => {
    if (explicit !== undefined) {
        return explicit;
    }
    try {
        if (typeof window !== 'undefined' && window.localStorage) {
            return window.localStorage;
        }
    } catch (error) {
        logger.warn('Local storage unavailable; profiles kept in memory', {
            message: error instanceof Error ? error.message : String(error),
        });
    }
    return null;
};

export const createMemoryStorage = (): KeyValueStorage => {
    const entries = new Map<string, string>();
    return {
        getItem: (key) => entries.get(key) ?? null,
        setItem: (key, value) => {
            entries.set(key, value);
        },
    };
};

/**
 * One structured record per user. Reads never throw: a record that cannot be
 * decoded keeps its personal best where possible and falls back to an empty
 * history.
 */
export const createProfileStore = (options: ProfileStoreOptions = {}): ProfileStore => {
    const logger = options.logger ?? rootLogger.child('profile-store');
    const storage = resolveStorage(options.storage, logger) ?? createMemoryStorage();

    const readRecord = (userId: number): UserProfile | null => {
        const raw = storage.getItem(profileKey(userId));
        if (raw === null) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            logger.warn('Stored profile is not valid JSON; starting empty', {
                userId,
                message: error instanceof Error ? error.message : String(error),
            });
            return { userId, personalBest: STORAGE.defaultPersonalBest, history: [] };
        }

        if (!isRecord(parsed)) {
            logger.warn('Stored profile has an unexpected shape; starting empty', { userId });
            return { userId, personalBest: STORAGE.defaultPersonalBest, history: [] };
        }

        return {
            userId,
            personalBest: sanitizePersonalBest(parsed.personalBest),
            history: sanitizeHistory(parsed.history, logger, userId),
        };
    };

    const writeRecord = (profile: UserProfile): void => {
        const record: PersistedProfile = {
            version: STORAGE.version,
            userId: profile.userId,
            personalBest: profile.personalBest,
            history: profile.history.map((entry) => ({ ...entry })),
        };
        storage.setItem(profileKey(profile.userId), JSON.stringify(record));
    };

    const requireRecord = (userId: number): UserProfile =>
        readRecord(userId) ?? { userId, personalBest: STORAGE.defaultPersonalBest, history: [] };

    return {
        exists: async (userId) => storage.getItem(profileKey(userId)) !== null,
        loadProfile: async (userId) => readRecord(userId),
        createProfile: async (userId) => {
            const profile: UserProfile = { userId, personalBest: STORAGE.defaultPersonalBest, history: [] };
            writeRecord(profile);
            return profile;
        },
        saveBest: async (userId, level) => {
            writeRecord({ ...requireRecord(userId), personalBest: level });
        },
        saveHistory: async (userId, history) => {
            writeRecord({ ...requireRecord(userId), history });
        },
    };
};
