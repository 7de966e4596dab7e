import { openFileStorage } from 'storage/file-storage';
import type { Logger } from 'util/log';
import { runHeadlessSession, type HeadlessSessionResult } from './headless-engine';

export interface SimulationInput {
    readonly mode: 'simulate';
    readonly seed?: number;
    readonly levels?: number;
    readonly accuracy?: number;
    readonly giveUpRate?: number;
    readonly userId?: number;
    /** JSON file holding profiles; the session is kept in memory when omitted */
    readonly storePath?: string;
    readonly logger?: Logger;
}

export interface SimulationResult extends HeadlessSessionResult {
    readonly ok: true;
    readonly storePath: string | null;
}

const DEFAULT_SEED = 1;
const DEFAULT_LEVELS = 5;
const DEFAULT_ACCURACY = 0.9;
const DEFAULT_GIVE_UP_RATE = 0.1;
const DEFAULT_USER_ID = 1000;

const requireProbability = (name: string, value: number): number => {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new RangeError(`${name} must be between 0 and 1`);
    }
    return value;
};

const requirePositiveInteger = (name: string, value: number): number => {
    if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer`);
    }
    return value;
};

export const runSimulation = async (input: SimulationInput): Promise<SimulationResult> => {
    const levels = requirePositiveInteger('levels', input.levels ?? DEFAULT_LEVELS);
    const userId = requirePositiveInteger('user', input.userId ?? DEFAULT_USER_ID);
    const accuracy = requireProbability('accuracy', input.accuracy ?? DEFAULT_ACCURACY);
    const giveUpRate = requireProbability('give-up-rate', input.giveUpRate ?? DEFAULT_GIVE_UP_RATE);
    const seed = input.seed ?? DEFAULT_SEED;

    const fileStorage = input.storePath ? await openFileStorage(input.storePath) : null;
    const session = await runHeadlessSession({
        userId,
        seed,
        levels,
        accuracy,
        giveUpRate,
        storage: fileStorage ?? undefined,
        logger: input.logger,
    });
    await fileStorage?.persist();

    return {
        ok: true,
        ...session,
        storePath: fileStorage?.path ?? null,
    };
};
