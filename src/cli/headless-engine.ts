import { gameConfig } from 'config/game';
import { createGameRuntime } from 'app/game-runtime';
import { createEventBus, type BallTrackerEventName } from 'app/events';
import type { ExportSink } from 'app/export';
import { createVirtualClock } from 'app/runtime/virtual-clock';
import type { RoundSnapshot } from 'app/runtime/round-machine';
import { isResolvedVisualState, type BallSnapshot } from 'physics/contracts';
import { containsPoint } from 'physics/motion';
import { createMemoryStorage, createProfileStore, type AttemptResult, type KeyValueStorage } from 'storage/profile-store';
import { rootLogger, type Logger } from 'util/log';
import { createRandomManager, type RandomManager } from 'util/random';

const DEFAULT_REACTION_MS = 400;
const REACTION_JITTER_MS = 600;

export interface HeadlessSessionOptions {
    readonly userId: number;
    readonly seed: number;
    /** Levels the bot tries to clear before stopping */
    readonly levels: number;
    /** Chance that each tap lands on a target */
    readonly accuracy: number;
    /** Chance of pressing lose-track during each tracking phase */
    readonly giveUpRate: number;
    /** Upper bound on rounds played, counting retries */
    readonly maxAttempts?: number;
    readonly storage?: KeyValueStorage;
    readonly logger?: Logger;
}

export interface HeadlessSessionResult {
    readonly userId: number;
    readonly seed: number;
    readonly attempts: number;
    readonly levelsCleared: number;
    readonly finalLevel: number;
    readonly personalBest: number;
    readonly outcomes: {
        readonly correct: number;
        readonly incorrect: number;
        readonly gaveUp: number;
    };
    readonly history: readonly AttemptResult[];
    readonly events: Readonly<Partial<Record<BallTrackerEventName, number>>>;
    readonly virtualTimeMs: number;
}

const silentSink: ExportSink = {
    exportAndShare: async () => undefined,
};

const centerOf = (ball: BallSnapshot) => ({ x: ball.position.x, y: ball.position.y });

/** True when a tap on the ball's centre lands on that ball and not on one listed before it. */
const isTappable = (snapshot: RoundSnapshot, ball: BallSnapshot): boolean => {
    const firstHit = snapshot.balls.find(
        (other) => !isResolvedVisualState(other.visualState) && containsPoint(other, ball.position),
    );
    return firstHit?.index === ball.index;
};

const pickBall = (snapshot: RoundSnapshot, bot: RandomManager, accuracy: number): BallSnapshot | null => {
    const open = snapshot.balls.filter((ball) => ball.visualState === 'neutral');
    const targets = open.filter((ball) => ball.isTarget);
    const decoys = open.filter((ball) => !ball.isTarget);
    const pool = decoys.length > 0 && !bot.boolean(accuracy) ? decoys : targets;
    const tappable = pool.filter((ball) => isTappable(snapshot, ball));
    const candidates = tappable.length > 0 ? tappable : pool;
    if (candidates.length === 0) {
        return null;
    }
    return candidates[bot.nextInt(candidates.length)] ?? null;
};

/**
 * Plays the game without a browser: the round machine runs on a virtual
 * clock and a seeded bot decides when to give up and which balls to tap.
 */
export const runHeadlessSession = async (options: HeadlessSessionOptions): Promise<HeadlessSessionResult> => {
    const logger = (options.logger ?? rootLogger).child('headless');
    const clock = createVirtualClock();
    const levelRandom = createRandomManager(options.seed);
    const bot = createRandomManager(options.seed + 1);
    const store = createProfileStore({ storage: options.storage ?? createMemoryStorage(), logger });
    const profile = (await store.loadProfile(options.userId)) ?? (await store.createProfile(options.userId));
    const events = createEventBus({ now: clock.now });
    const eventCounts: Partial<Record<BallTrackerEventName, number>> = {};
    const outcomes = { correct: 0, incorrect: 0, gaveUp: 0 };

    const countEvent = (name: BallTrackerEventName) => () => {
        eventCounts[name] = (eventCounts[name] ?? 0) + 1;
    };
    const eventNames: readonly BallTrackerEventName[] = [
        'LevelStarted',
        'TargetFound',
        'AttemptRecorded',
        'RoundResolved',
        'LevelAdvanced',
        'PersonalBestRaised',
    ];
    for (const name of eventNames) {
        events.subscribe(name, countEvent(name));
    }
    events.subscribe('RoundResolved', ({ payload }) => {
        if (payload.outcome === 'correct') {
            outcomes.correct += 1;
        } else if (payload.outcome === 'incorrect') {
            outcomes.incorrect += 1;
        } else {
            outcomes.gaveUp += 1;
        }
    });

    const runtime = createGameRuntime({
        store,
        profile,
        exportSink: silentSink,
        eventBus: events,
        logger,
        random: levelRandom.random,
        now: clock.now,
        timers: clock.timers,
        createLoop: clock.createLoop,
    });
    const { machine } = runtime;
    const { revealMs, trackingMs } = gameConfig.timing;
    const maxAttempts = options.maxAttempts ?? options.levels * 20;

    let attempts = 0;
    while (outcomes.correct < options.levels && attempts < maxAttempts) {
        if (!machine.start()) {
            throw new Error(`Round could not start from phase ${machine.getPhase()}`);
        }
        attempts += 1;
        clock.advance(revealMs);

        if (bot.boolean(options.giveUpRate)) {
            clock.advance(1 + bot.nextInt(trackingMs - 1));
            machine.loseTrack();
            continue;
        }

        clock.advance(trackingMs);
        while (machine.getPhase() === 'awaiting-input') {
            const ball = pickBall(machine.snapshot(), bot, options.accuracy);
            if (!ball) {
                throw new Error('No ball left to tap while awaiting input');
            }
            clock.advance(DEFAULT_REACTION_MS + bot.nextInt(REACTION_JITTER_MS));
            machine.tap(centerOf(ball));
        }
    }

    const finalSnapshot = machine.snapshot();
    await runtime.dispose();
    logger.info('Headless session finished', { attempts, cleared: outcomes.correct });

    return {
        userId: options.userId,
        seed: options.seed,
        attempts,
        levelsCleared: outcomes.correct,
        finalLevel: finalSnapshot.config.levelIndex,
        personalBest: finalSnapshot.personalBest,
        outcomes,
        history: finalSnapshot.history,
        events: eventCounts,
        virtualTimeMs: clock.now(),
    };
};
