import { gameConfig } from 'config/game';
import { resolveNow } from 'util/stopwatch';

export const DEFAULT_FIXED_DELTA = 1 / gameConfig.timing.stepsPerSecond;
export const DEFAULT_STEP_MS = DEFAULT_FIXED_DELTA * 1000;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

export type FrameCallback = (timestamp: number) => void;
export type RequestFrame = (callback: FrameCallback) => number;
export type CancelFrame = (handle: number) => void;

const fallbackTimers = new Map<number, ReturnType<typeof setTimeout>>();
let fallbackHandle = 1;

const fallbackRequest: RequestFrame = (callback) => {
    const handle = fallbackHandle++;
    const timer = setTimeout(() => {
        fallbackTimers.delete(handle);
        callback(Date.now());
    }, DEFAULT_STEP_MS);
    fallbackTimers.set(handle, timer);
    return handle;
};

const fallbackCancel: CancelFrame = (handle) => {
    const timer = fallbackTimers.get(handle);
    if (timer) {
        clearTimeout(timer);
        fallbackTimers.delete(handle);
    }
};

const resolveRequestFrame = (options: LoopOptions): RequestFrame => {
    if (options.raf) {
        return options.raf;
    }
    if (typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function') {
        return (callback) => window.requestAnimationFrame(callback);
    }
    return fallbackRequest;
};

const resolveCancelFrame = (options: LoopOptions): CancelFrame => {
    if (options.cancelRaf) {
        return options.cancelRaf;
    }
    if (typeof window !== 'undefined' && typeof window.cancelAnimationFrame === 'function') {
        return (handle) => window.cancelAnimationFrame(handle);
    }
    return fallbackCancel;
};

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
    readonly now?: () => number;
    readonly raf?: RequestFrame;
    readonly cancelRaf?: CancelFrame;
}

export interface GameLoop {
    start(): void;
    stop(): void;
    isRunning(): boolean;
}

/** One motion step; the ball model moves a fixed distance per call. */
export type UpdateCallback = (deltaSeconds: number) => void;
/** Called once per animation frame after the pending steps ran. */
export type RenderCallback = (alpha: number) => void;

export type LoopFactory = (update: UpdateCallback, render: RenderCallback) => GameLoop;

/**
 * Drives ball motion at a fixed step rate regardless of the display refresh
 * rate, so a 6 second tracking window always covers the same number of steps.
 */
export class FixedStepLoop implements GameLoop {
    private readonly fixedDelta: number;

    private readonly stepMs: number;

    private readonly maxStepsPerFrame: number;

    private readonly maxFrameDeltaMs: number;

    private readonly now: () => number;

    private readonly raf: RequestFrame;

    private readonly cancelRaf: CancelFrame;

    private accumulatorMs = 0;

    private lastTime = 0;

    private frameHandle: number | undefined;

    private running = false;

    constructor(
        private readonly update: UpdateCallback,
        private readonly render: RenderCallback,
        options: LoopOptions = {},
    ) {
        const configuredDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.fixedDelta = configuredDelta > 0 ? configuredDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.fixedDelta * 1000;
        this.maxStepsPerFrame = Math.max(1, Math.floor(options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME));
        this.maxFrameDeltaMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS);
        this.now = options.now ?? resolveNow();
        this.raf = resolveRequestFrame(options);
        this.cancelRaf = resolveCancelFrame(options);
    }

    start(): void {
        if (this.running) {
            return;
        }

        this.running = true;
        this.accumulatorMs = 0;
        this.lastTime = this.now();
        this.frameHandle = this.raf(this.tick);
    }

    stop(): void {
        if (!this.running) {
            return;
        }

        this.running = false;
        if (this.frameHandle !== undefined) {
            this.cancelRaf(this.frameHandle);
            this.frameHandle = undefined;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    private readonly tick: FrameCallback = () => {
        if (!this.running) {
            return;
        }

        const currentTime = this.now();
        const frameDeltaMs = Math.min(this.maxFrameDeltaMs, Math.max(0, currentTime - this.lastTime));
        this.lastTime = currentTime;
        this.accumulatorMs += frameDeltaMs;

        let steps = 0;
        while (this.accumulatorMs >= this.stepMs && steps < this.maxStepsPerFrame) {
            this.update(this.fixedDelta);
            this.accumulatorMs -= this.stepMs;
            steps += 1;

            // An update may end tracking; nothing after that belongs to this window.
            if (!this.running) {
                return;
            }
        }

        if (steps === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
            this.accumulatorMs = this.stepMs;
        }

        this.render(Math.min(1, this.accumulatorMs / this.stepMs));
        this.frameHandle = this.raf(this.tick);
    };
}

export const createGameLoop: LoopFactory = (update, render) => new FixedStepLoop(update, render);

export const createLoopFactory = (options: LoopOptions): LoopFactory =>
    (update, render) => new FixedStepLoop(update, render, options);
