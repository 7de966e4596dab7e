import { DEFAULT_STEP_MS, type GameLoop, type LoopFactory, type RenderCallback, type UpdateCallback } from 'app/loop';
import type { TimerHandle, TimerService } from './timers';

interface ScheduledCallback {
    readonly handle: TimerHandle;
    readonly dueAt: number;
    readonly callback: () => void;
}

interface VirtualLoop extends GameLoop {
    step(): void;
}

/**
 * Deterministic time source for headless runs and tests. Time only moves
 * through `advance`, which interleaves loop steps and due timers in order.
 */
export interface VirtualClock {
    readonly now: () => number;
    readonly timers: TimerService;
    readonly createLoop: LoopFactory;
    advance(ms: number): void;
    pendingTimers(): number;
    runningLoops(): number;
}

export const createVirtualClock = (stepMs = DEFAULT_STEP_MS): VirtualClock => {
    let currentTime = 0;
    let nextHandle = 1;
    let stepsTaken = 0;
    const scheduled: ScheduledCallback[] = [];
    const loops = new Set<VirtualLoop>();

    const timers: TimerService = {
        scheduleOnce: (delayMs, callback) => {
            const handle = nextHandle++;
            scheduled.push({ handle, dueAt: currentTime + Math.max(0, delayMs), callback });
            scheduled.sort((a, b) => a.dueAt - b.dueAt || a.handle - b.handle);
            return handle;
        },
        cancel: (handle) => {
            const index = scheduled.findIndex((entry) => entry.handle === handle);
            if (index >= 0) {
                scheduled.splice(index, 1);
            }
        },
    };

    const createLoop: LoopFactory = (update: UpdateCallback, render: RenderCallback) => {
        let running = false;
        const loop: VirtualLoop = {
            start: () => {
                running = true;
                loops.add(loop);
            },
            stop: () => {
                running = false;
                loops.delete(loop);
            },
            isRunning: () => running,
            step: () => {
                if (!running) {
                    return;
                }
                update(stepMs / 1000);
                if (running) {
                    render(0);
                }
            },
        };
        return loop;
    };

    const fireDue = () => {
        while (scheduled.length > 0 && scheduled[0].dueAt <= currentTime) {
            const [entry] = scheduled.splice(0, 1);
            entry.callback();
        }
    };

    const advance = (ms: number) => {
        const target = currentTime + Math.max(0, ms);
        fireDue();
        while (currentTime < target) {
            const nextStepAt = (stepsTaken + 1) * stepMs;
            const nextTimer = scheduled.length > 0 ? scheduled[0].dueAt : Number.POSITIVE_INFINITY;
            currentTime = Math.min(target, nextStepAt, nextTimer);
            if (currentTime >= nextStepAt) {
                stepsTaken += 1;
                for (const loop of [...loops]) {
                    loop.step();
                }
            }
            fireDue();
        }
    };

    return {
        now: () => currentTime,
        timers,
        createLoop,
        advance,
        pendingTimers: () => scheduled.length,
        runningLoops: () => loops.size,
    };
};
