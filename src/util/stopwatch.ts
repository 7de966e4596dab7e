export type NowFn = () => number;

export const resolveNow = (): NowFn => {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return () => performance.now();
    }

    return () => Date.now();
};

export interface Stopwatch {
    start(): void;
    stop(): void;
    reset(): void;
    isRunning(): boolean;
    elapsedMs(): number;
    /** Whole milliseconds converted to seconds, matching what gets recorded */
    elapsedSeconds(): number;
}

export class MonotonicStopwatch implements Stopwatch {
    private accumulatedMs = 0;

    private startedAt: number | null = null;

    constructor(private readonly now: NowFn = resolveNow()) {}

    start(): void {
        if (this.startedAt !== null) {
            return;
        }
        this.startedAt = this.now();
    }

    stop(): void {
        if (this.startedAt === null) {
            return;
        }
        this.accumulatedMs += Math.max(0, this.now() - this.startedAt);
        this.startedAt = null;
    }

    reset(): void {
        this.accumulatedMs = 0;
        this.startedAt = null;
    }

    isRunning(): boolean {
        return this.startedAt !== null;
    }

    elapsedMs(): number {
        if (this.startedAt === null) {
            return this.accumulatedMs;
        }
        return this.accumulatedMs + Math.max(0, this.now() - this.startedAt);
    }

    elapsedSeconds(): number {
        return Math.floor(this.elapsedMs()) / 1000;
    }
}

export const createStopwatch = (now?: NowFn): Stopwatch => new MonotonicStopwatch(now);
