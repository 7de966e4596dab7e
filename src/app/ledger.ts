import { rootLogger, type Logger } from 'util/log';
import type { AttemptResult, ProfileStore, UserProfile } from 'storage/profile-store';
import type { BallTrackerEventBus } from './events';

export interface Ledger {
    readonly userId: number;
    append(result: AttemptResult): void;
    /** Returns true when `level` replaced the stored best */
    updateBestIfHigher(level: number): boolean;
    getHistory(): readonly AttemptResult[];
    getPersonalBest(): number;
    /** Resolves once every write issued so far has settled */
    flush(): Promise<void>;
}

export interface LedgerOptions {
    readonly store: ProfileStore;
    readonly profile: UserProfile;
    readonly eventBus?: BallTrackerEventBus;
    readonly logger?: Logger;
}

/**
 * Append-only attempt history plus the best-level watermark for one user.
 *
 * Memory is updated synchronously; writes go out in call order on a single
 * queue and the caller never waits on them. There is no deduplication, so
 * each attempt must be appended exactly once.
 */
export const createLedger = ({ store, profile, eventBus, logger: baseLogger }: LedgerOptions): Ledger => {
    const logger = (baseLogger ?? rootLogger).child('ledger');
    const { userId } = profile;
    const history: AttemptResult[] = profile.history.map((entry) => ({ ...entry }));
    let personalBest = profile.personalBest;
    let queue: Promise<void> = Promise.resolve();

    const enqueue = (label: string, write: () => Promise<void>): void => {
        queue = queue.then(write).catch((error: unknown) => {
            logger.warn(`Failed to persist ${label}`, {
                userId,
                message: error instanceof Error ? error.message : String(error),
            });
        });
    };

    const append: Ledger['append'] = (result) => {
        const entry: AttemptResult = { ...result };
        history.push(entry);
        const snapshot = history.slice();
        enqueue('history', () => store.saveHistory(userId, snapshot));
        logger.debug('Attempt recorded', { ...entry, entries: snapshot.length });
        eventBus?.publish('AttemptRecorded', { userId, result: entry });
    };

    const updateBestIfHigher: Ledger['updateBestIfHigher'] = (level) => {
        if (level <= personalBest) {
            return false;
        }

        const previous = personalBest;
        personalBest = level;
        enqueue('personal best', () => store.saveBest(userId, level));
        logger.info('Personal best raised', { previous, level });
        eventBus?.publish('PersonalBestRaised', { userId, previous, level });
        return true;
    };

    return {
        userId,
        append,
        updateBestIfHigher,
        getHistory: () => history.map((entry) => ({ ...entry })),
        getPersonalBest: () => personalBest,
        flush: () => queue,
    };
};
