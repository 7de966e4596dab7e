import type { AttemptResult } from 'storage/profile-store';
import type { LevelConfig } from './difficulty';

export type GamePhase = 'idle' | 'setup' | 'reveal' | 'tracking' | 'awaiting-input' | 'resolved';
export type ResolvedOutcome = 'correct' | 'incorrect' | 'gave-up';

export interface PhaseChangedPayload {
    readonly phase: GamePhase;
    readonly previous: GamePhase;
    readonly level: number;
    readonly epoch: number;
}

export interface LevelStartedPayload {
    readonly config: LevelConfig;
}

export interface TargetFoundPayload {
    readonly level: number;
    readonly found: number;
    readonly remaining: number;
}

export interface AttemptRecordedPayload {
    readonly userId: number;
    readonly result: AttemptResult;
}

export interface RoundResolvedPayload {
    readonly level: number;
    readonly outcome: ResolvedOutcome;
}

export interface LevelAdvancedPayload {
    readonly from: LevelConfig;
    readonly to: LevelConfig;
}

export interface PersonalBestPayload {
    readonly userId: number;
    readonly previous: number;
    readonly level: number;
}

export interface BallTrackerEventMap {
    readonly PhaseChanged: PhaseChangedPayload;
    readonly LevelStarted: LevelStartedPayload;
    readonly TargetFound: TargetFoundPayload;
    readonly AttemptRecorded: AttemptRecordedPayload;
    readonly RoundResolved: RoundResolvedPayload;
    readonly LevelAdvanced: LevelAdvancedPayload;
    readonly PersonalBestRaised: PersonalBestPayload;
}

export type BallTrackerEventName = keyof BallTrackerEventMap;

export interface EventEnvelope<EventName extends BallTrackerEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: BallTrackerEventMap[EventName];
}

export type EventListener<EventName extends BallTrackerEventName> = (
    event: EventEnvelope<EventName>,
) => void;

export interface BallTrackerEventBus {
    publish<EventName extends BallTrackerEventName>(
        this: void,
        type: EventName,
        payload: BallTrackerEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends BallTrackerEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends BallTrackerEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
}

type InternalListener = EventListener<BallTrackerEventName>;

type ListenerRegistry = Map<BallTrackerEventName, Set<InternalListener>>;

const ensureListenerSet = (registry: ListenerRegistry, type: BallTrackerEventName): Set<InternalListener> => {
    const existing = registry.get(type);
    if (existing) {
        return existing;
    }

    const created = new Set<InternalListener>();
    registry.set(type, created);
    return created;
};

export interface EventBusOptions {
    readonly now?: () => number;
}

export const createEventBus = (options: EventBusOptions = {}): BallTrackerEventBus => {
    const registry: ListenerRegistry = new Map();
    const resolveNow = options.now ?? Date.now;

    const publish: BallTrackerEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry.get(type);
        if (!listeners || listeners.size === 0) {
            return;
        }

        const envelope: EventEnvelope<typeof type> = { type, payload, timestamp };
        for (const listener of [...listeners]) {
            listener(envelope);
        }
    };

    const unsubscribe: BallTrackerEventBus['unsubscribe'] = (type, listener) => {
        const listeners = registry.get(type);
        if (!listeners) {
            return;
        }

        listeners.delete(listener as InternalListener);
        if (listeners.size === 0) {
            registry.delete(type);
        }
    };

    const subscribe: BallTrackerEventBus['subscribe'] = (type, listener) => {
        ensureListenerSet(registry, type).add(listener as InternalListener);
        return () => unsubscribe(type, listener);
    };

    const clear: BallTrackerEventBus['clear'] = () => {
        registry.clear();
    };

    return {
        publish,
        subscribe,
        unsubscribe,
        clear,
    };
};
