import type { ProfileStore, UserProfile } from 'storage/profile-store';
import { rootLogger, type Logger } from 'util/log';
import type { Subscription } from 'util/observable';
import { createEventBus, type BallTrackerEventBus } from './events';
import { exportHistory, type ExportOutcome, type ExportSink } from './export';
import { createLedger, type Ledger } from './ledger';
import { createRoundMachine, type RoundMachine, type RoundMachineOptions, type RoundSnapshot } from './runtime/round-machine';

export type RuntimeMachineOptions = Omit<RoundMachineOptions, 'ledger' | 'eventBus' | 'logger'>;

export interface GameRuntimeOptions extends RuntimeMachineOptions {
    readonly store: ProfileStore;
    readonly profile: UserProfile;
    readonly exportSink: ExportSink;
    readonly render?: (snapshot: RoundSnapshot) => void;
    readonly eventBus?: BallTrackerEventBus;
    readonly logger?: Logger;
}

export interface GameRuntime {
    readonly machine: RoundMachine;
    readonly ledger: Ledger;
    readonly events: BallTrackerEventBus;
    exportHistory(): Promise<ExportOutcome>;
    dispose(): Promise<void>;
}

/**
 * Assembles one play session for a claimed user: ledger, round machine and
 * the host's render projection, which receives a snapshot after every change.
 */
export const createGameRuntime = (options: GameRuntimeOptions): GameRuntime => {
    const { store, profile, exportSink, render, ...machineOptions } = options;
    const logger = (options.logger ?? rootLogger).child(`user:${profile.userId}`);
    const events = options.eventBus ?? createEventBus({ now: options.now });
    const ledger = createLedger({ store, profile, eventBus: events, logger });
    const machine = createRoundMachine({ ...machineOptions, ledger, eventBus: events, logger });

    const subscription: Subscription | null = render ? machine.subscribe(render) : null;
    logger.info('Session ready', { personalBest: ledger.getPersonalBest(), attempts: ledger.getHistory().length });

    return {
        machine,
        ledger,
        events,
        exportHistory: () => exportHistory({ userId: profile.userId, history: ledger.getHistory(), sink: exportSink, logger }),
        dispose: async () => {
            subscription?.unsubscribe();
            machine.dispose();
            await ledger.flush();
        },
    };
};
