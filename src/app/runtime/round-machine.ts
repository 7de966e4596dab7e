import { gameConfig } from 'config/game';
import { advanceBalls, containsPoint } from 'physics/motion';
import { isResolvedVisualState, snapshotBall, type Arena, type Ball, type BallSnapshot, type Vector2 } from 'physics/contracts';
import type { AttemptResult } from 'storage/profile-store';
import { rootLogger, type Logger } from 'util/log';
import { createStateSubject, type Subscription } from 'util/observable';
import type { RandomSource } from 'util/random';
import { createStopwatch, type NowFn } from 'util/stopwatch';
import { INITIAL_LEVEL_CONFIG, nextConfig, type LevelConfig } from '../difficulty';
import type { BallTrackerEventBus, GamePhase, ResolvedOutcome } from '../events';
import type { Ledger } from '../ledger';
import { generateLevel } from '../level-generator';
import { createGameLoop, type LoopFactory } from '../loop';
import { createPhaseTimers, createTimerService, type TimerService } from './timers';

const COPY = gameConfig.copy;

export type CommandLabel = 'start' | 'next-level' | 'retry';

export interface CommandState {
    readonly enabled: boolean;
    readonly label: CommandLabel;
}

export interface RoundSnapshot {
    readonly phase: GamePhase;
    readonly outcome: ResolvedOutcome | null;
    /** Bumped on every phase change and on dispose */
    readonly epoch: number;
    readonly config: LevelConfig;
    readonly arena: Arena;
    readonly balls: readonly BallSnapshot[];
    readonly foundTargets: number;
    readonly remainingTargets: number;
    readonly command: CommandState;
    readonly instructions: string;
    readonly userId: number;
    readonly personalBest: number;
    readonly history: readonly AttemptResult[];
    readonly lastResult: AttemptResult | null;
}

export interface RoundTiming {
    readonly revealMs?: number;
    readonly trackingMs?: number;
}

export interface RoundMachineOptions {
    readonly ledger: Ledger;
    readonly arena?: Arena;
    readonly initialConfig?: LevelConfig;
    readonly random?: RandomSource;
    readonly timers?: TimerService;
    readonly now?: NowFn;
    readonly createLoop?: LoopFactory;
    readonly eventBus?: BallTrackerEventBus;
    readonly logger?: Logger;
    readonly timing?: RoundTiming;
}

export interface RoundMachine {
    /** Start, next-level and retry command; honoured only while the command is enabled */
    start(): boolean;
    /** Early exit while tracking; records a give-up attempt */
    loseTrack(): boolean;
    tap(point: Readonly<Vector2>): boolean;
    getPhase(): GamePhase;
    getConfig(): LevelConfig;
    snapshot(): RoundSnapshot;
    subscribe(observer: (snapshot: RoundSnapshot) => void): Subscription;
    dispose(): void;
}

const pluralBalls = (count: number): string => `${count} ball(s)`;

export const createRoundMachine = (options: RoundMachineOptions): RoundMachine => {
    const { ledger, eventBus } = options;
    const logger = (options.logger ?? rootLogger).child('round-machine');
    const arena: Arena = options.arena ?? { width: gameConfig.arena.width, height: gameConfig.arena.height };
    const random = options.random ?? Math.random;
    const timers = options.timers ?? createTimerService();
    const revealMs = options.timing?.revealMs ?? gameConfig.timing.revealMs;
    const trackingMs = options.timing?.trackingMs ?? gameConfig.timing.trackingMs;
    const trackingWatch = createStopwatch(options.now);
    const reactionWatch = createStopwatch(options.now);

    let phase: GamePhase = 'idle';
    let outcome: ResolvedOutcome | null = null;
    let epoch = 0;
    let config: LevelConfig = options.initialConfig ?? INITIAL_LEVEL_CONFIG;
    let balls: Ball[] = [];
    let foundTargets = 0;
    let command: CommandState = { enabled: true, label: 'start' };
    let instructions: string = COPY.idle;
    let lastResult: AttemptResult | null = null;
    let disposed = false;

    const phaseTimers = createPhaseTimers(timers, () => epoch);

    const buildSnapshot = (): RoundSnapshot => ({
        phase,
        outcome,
        epoch,
        config,
        arena,
        balls: balls.map(snapshotBall),
        foundTargets,
        remainingTargets: Math.max(0, config.targetCount - foundTargets),
        command,
        instructions,
        userId: ledger.userId,
        personalBest: ledger.getPersonalBest(),
        history: ledger.getHistory(),
        lastResult,
    });

    const state = createStateSubject<RoundSnapshot>(buildSnapshot(), { logger, label: 'round' });

    const emit = (): void => {
        state.next(buildSnapshot());
    };

    const setPhase = (next: GamePhase): void => {
        const previous = phase;
        phase = next;
        epoch += 1;
        logger.debug('Phase changed', { previous, phase: next, level: config.levelIndex, epoch });
        eventBus?.publish('PhaseChanged', { phase: next, previous, level: config.levelIndex, epoch });
    };

    const step = (): void => {
        if (phase === 'tracking') {
            advanceBalls(balls, arena);
        }
    };

    const loop = (options.createLoop ?? createGameLoop)(step, emit);

    const revealTargets = (): void => {
        for (const ball of balls) {
            if (ball.isTarget) {
                ball.visualState = 'highlighted';
            }
        }
    };

    const resolve = (result: ResolvedOutcome, label: CommandLabel, level: number): void => {
        phaseTimers.cancelAll();
        outcome = result;
        command = { enabled: true, label };
        setPhase('resolved');
        logger.info('Round resolved', { level, outcome: result });
        eventBus?.publish('RoundResolved', { level, outcome: result });
        emit();
    };

    const finishTracking = (): void => {
        loop.stop();
        trackingWatch.stop();
        reactionWatch.reset();
        reactionWatch.start();
        instructions = `Click the ${pluralBalls(config.targetCount - foundTargets)} you were tracking.`;
        setPhase('awaiting-input');
        emit();
    };

    const beginTracking = (): void => {
        for (const ball of balls) {
            ball.visualState = 'neutral';
        }
        instructions = COPY.tracking;
        setPhase('tracking');
        trackingWatch.reset();
        trackingWatch.start();
        loop.start();
        phaseTimers.schedule(epoch, trackingMs, finishTracking);
        emit();
    };

    const start: RoundMachine['start'] = () => {
        if (disposed || !command.enabled || (phase !== 'idle' && phase !== 'resolved')) {
            logger.debug('Start ignored', { phase });
            return false;
        }

        setPhase('setup');
        outcome = null;
        foundTargets = 0;
        lastResult = null;
        trackingWatch.reset();
        reactionWatch.reset();
        balls = generateLevel(config, arena, { random });
        command = { enabled: false, label: command.label };
        instructions = `Watch the ${config.targetCount} yellow ball(s).`;
        eventBus?.publish('LevelStarted', { config });

        setPhase('reveal');
        phaseTimers.schedule(epoch, revealMs, beginTracking);
        emit();
        return true;
    };

    const loseTrack: RoundMachine['loseTrack'] = () => {
        if (disposed || phase !== 'tracking') {
            logger.debug('Lose-track signal ignored', { phase });
            return false;
        }

        loop.stop();
        trackingWatch.stop();
        const elapsedSeconds = trackingWatch.elapsedSeconds();
        const result: AttemptResult = { level: config.levelIndex, elapsedSeconds, completed: false };
        lastResult = result;
        ledger.append(result);
        revealTargets();
        instructions = `Tracked for ${elapsedSeconds.toFixed(1)}s. Let's see the answer.`;
        resolve('gave-up', 'retry', config.levelIndex);
        return true;
    };

    const completeLevel = (): void => {
        reactionWatch.stop();
        const completed = config;
        const result: AttemptResult = {
            level: completed.levelIndex,
            elapsedSeconds: reactionWatch.elapsedSeconds(),
            completed: true,
        };
        lastResult = result;
        ledger.append(result);

        config = nextConfig(completed);
        eventBus?.publish('LevelAdvanced', { from: completed, to: config });
        ledger.updateBestIfHigher(config.levelIndex);

        instructions = COPY.correct;
        resolve('correct', 'next-level', completed.levelIndex);
    };

    const tap: RoundMachine['tap'] = (point) => {
        if (disposed || phase !== 'awaiting-input') {
            logger.debug('Tap ignored', { phase });
            return false;
        }

        const hit = balls.find((ball) => !isResolvedVisualState(ball.visualState) && containsPoint(ball, point));
        if (!hit) {
            return false;
        }

        if (!hit.isTarget) {
            hit.visualState = 'incorrect';
            reactionWatch.stop();
            revealTargets();
            instructions = COPY.incorrect;
            resolve('incorrect', 'retry', config.levelIndex);
            return true;
        }

        hit.visualState = 'correct';
        foundTargets += 1;
        const remaining = config.targetCount - foundTargets;
        eventBus?.publish('TargetFound', { level: config.levelIndex, found: foundTargets, remaining });

        if (remaining <= 0) {
            completeLevel();
            return true;
        }

        instructions = `Good job! Find the remaining ${pluralBalls(remaining)}.`;
        emit();
        return true;
    };

    const dispose: RoundMachine['dispose'] = () => {
        if (disposed) {
            return;
        }
        disposed = true;
        phaseTimers.cancelAll();
        loop.stop();
        trackingWatch.stop();
        reactionWatch.stop();
        epoch += 1;
        state.complete();
    };

    return {
        start,
        loseTrack,
        tap,
        getPhase: () => phase,
        getConfig: () => config,
        snapshot: buildSnapshot,
        subscribe: (observer) => state.subscribe(observer),
        dispose,
    };
};
