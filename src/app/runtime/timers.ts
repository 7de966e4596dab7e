export type TimerHandle = number;

export interface TimerService {
    scheduleOnce(delayMs: number, callback: () => void): TimerHandle;
    cancel(handle: TimerHandle): void;
}

/** `setTimeout`-backed service used by the browser and CLI hosts. */
export const createTimerService = (): TimerService => {
    const active = new Map<TimerHandle, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;

    return {
        scheduleOnce: (delayMs, callback) => {
            const handle = nextHandle++;
            const timer = setTimeout(() => {
                active.delete(handle);
                callback();
            }, Math.max(0, delayMs));
            active.set(handle, timer);
            return handle;
        },
        cancel: (handle) => {
            const timer = active.get(handle);
            if (timer !== undefined) {
                clearTimeout(timer);
                active.delete(handle);
            }
        },
    };
};

export interface PhaseTimers {
    /**
     * Schedules `callback` for the phase identified by `epoch`. The callback is
     * dropped when the epoch has moved on by the time the delay elapses.
     */
    schedule(epoch: number, delayMs: number, callback: () => void): void;
    cancelAll(): void;
    pending(): number;
}

export const createPhaseTimers = (timers: TimerService, currentEpoch: () => number): PhaseTimers => {
    const handles = new Set<TimerHandle>();

    const schedule: PhaseTimers['schedule'] = (epoch, delayMs, callback) => {
        const handle = timers.scheduleOnce(delayMs, () => {
            handles.delete(handle);
            if (epoch !== currentEpoch()) {
                return;
            }
            callback();
        });
        handles.add(handle);
    };

    const cancelAll = () => {
        for (const handle of handles) {
            timers.cancel(handle);
        }
        handles.clear();
    };

    return {
        schedule,
        cancelAll,
        pending: () => handles.size,
    };
};
