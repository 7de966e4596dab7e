import { describe, expect, it, vi } from 'vitest';
import { gameConfig } from 'config/game';
import { configForLevel } from 'app/difficulty';
import { createEventBus, type GamePhase } from 'app/events';
import { createLedger } from 'app/ledger';
import { createRoundMachine, type RoundMachineOptions, type RoundSnapshot } from 'app/runtime/round-machine';
import { createVirtualClock } from 'app/runtime/virtual-clock';
import { isResolvedVisualState, type BallSnapshot } from 'physics/contracts';
import { containsPoint } from 'physics/motion';
import { createMemoryStorage, createProfileStore, type UserProfile } from 'storage/profile-store';
import { createLogger } from 'util/log';
import { mulberry32 } from 'util/random';

const { revealMs, trackingMs } = gameConfig.timing;
const COPY = gameConfig.copy;

const silentLogger = createLogger('test', { writer: () => undefined });

const createHarness = (options: Partial<RoundMachineOptions> = {}, profileOverrides: Partial<UserProfile> = {}) => {
    const clock = createVirtualClock();
    const store = createProfileStore({ storage: createMemoryStorage(), logger: silentLogger });
    const profile: UserProfile = { userId: 42, personalBest: 1, history: [], ...profileOverrides };
    const events = createEventBus({ now: clock.now });
    const ledger = createLedger({ store, profile, eventBus: events, logger: silentLogger });
    const machine = createRoundMachine({
        ledger,
        eventBus: events,
        logger: silentLogger,
        random: mulberry32(3),
        now: clock.now,
        timers: clock.timers,
        createLoop: clock.createLoop,
        ...options,
    });
    return { clock, store, ledger, events, machine };
};

const tappableBall = (snapshot: RoundSnapshot, predicate: (ball: BallSnapshot) => boolean): BallSnapshot => {
    const candidate = snapshot.balls.find((ball) => {
        if (!predicate(ball)) {
            return false;
        }
        const firstHit = snapshot.balls.find(
            (other) => !isResolvedVisualState(other.visualState) && containsPoint(other, ball.position),
        );
        return firstHit?.index === ball.index;
    });
    if (!candidate) {
        throw new Error('No ball can be tapped on its own');
    }
    return candidate;
};

const cycle = (values: readonly number[]) => {
    let index = 0;
    return () => values[index++ % values.length] ?? 0;
};

// Level 2 with every ball moving along x on its own row, so no two balls ever meet.
const separatedRows = () => cycle([0.5, 0.1, 0, 0.5, 0.35, 0, 0.5, 0.6, 0, 0.5, 0.85, 0]);

const isOpenTarget = (ball: BallSnapshot) => ball.isTarget && ball.visualState === 'neutral';
const isDecoy = (ball: BallSnapshot) => !ball.isTarget;

const playUntilAwaitingInput = (harness: ReturnType<typeof createHarness>) => {
    expect(harness.machine.start()).toBe(true);
    harness.clock.advance(revealMs);
    harness.clock.advance(trackingMs);
    expect(harness.machine.getPhase()).toBe('awaiting-input');
};

describe('createRoundMachine', () => {
    it('starts idle with the start command enabled', () => {
        const { machine } = createHarness();
        const snapshot = machine.snapshot();

        expect(snapshot.phase).toBe('idle');
        expect(snapshot.outcome).toBeNull();
        expect(snapshot.command).toEqual({ enabled: true, label: 'start' });
        expect(snapshot.instructions).toBe(COPY.idle);
        expect(snapshot.balls).toEqual([]);
        expect(snapshot.config).toEqual(configForLevel(1));
        expect(snapshot.userId).toBe(42);
        expect(snapshot.personalBest).toBe(1);
    });

    it('reveals the targets and disables the command on start', () => {
        const { machine } = createHarness();

        expect(machine.start()).toBe(true);
        const snapshot = machine.snapshot();

        expect(snapshot.phase).toBe('reveal');
        expect(snapshot.balls).toHaveLength(3);
        expect(snapshot.balls.map((ball) => ball.visualState)).toEqual(['highlighted', 'neutral', 'neutral']);
        expect(snapshot.command.enabled).toBe(false);
        expect(snapshot.instructions).toBe('Watch the 1 yellow ball(s).');
        expect(machine.start()).toBe(false);
    });

    it('keeps the balls still during the reveal and moves them while tracking', () => {
        const { machine, clock } = createHarness();
        machine.start();
        const revealed = machine.snapshot().balls.map((ball) => ball.position);

        clock.advance(revealMs - 1);
        expect(machine.snapshot().balls.map((ball) => ball.position)).toEqual(revealed);

        clock.advance(1);
        const tracking = machine.snapshot();
        expect(tracking.phase).toBe('tracking');
        expect(tracking.instructions).toBe(COPY.tracking);
        expect(tracking.balls.every((ball) => ball.visualState === 'neutral')).toBe(true);

        clock.advance(500);
        expect(machine.snapshot().balls.map((ball) => ball.position)).not.toEqual(revealed);
    });

    it('freezes the balls and asks for input when tracking ends', () => {
        const harness = createHarness();
        playUntilAwaitingInput(harness);
        const frozen = harness.machine.snapshot();

        harness.clock.advance(1_000);

        expect(frozen.instructions).toBe('Click the 1 ball(s) you were tracking.');
        expect(harness.machine.snapshot().balls).toEqual(frozen.balls);
        expect(harness.clock.runningLoops()).toBe(0);
    });

    it('records a completed attempt and advances the level when every target is found', () => {
        const harness = createHarness();
        playUntilAwaitingInput(harness);
        const target = tappableBall(harness.machine.snapshot(), isOpenTarget);

        harness.clock.advance(1_250);
        expect(harness.machine.tap(target.position)).toBe(true);
        const snapshot = harness.machine.snapshot();

        expect(snapshot.phase).toBe('resolved');
        expect(snapshot.outcome).toBe('correct');
        expect(snapshot.instructions).toBe(COPY.correct);
        expect(snapshot.command).toEqual({ enabled: true, label: 'next-level' });
        expect(snapshot.balls[target.index]?.visualState).toBe('correct');
        expect(snapshot.config).toEqual({ levelIndex: 2, totalBalls: 4, targetCount: 2, speed: 2 });
        expect(snapshot.history).toEqual([{ level: 1, elapsedSeconds: 1.25, completed: true }]);
        expect(snapshot.lastResult).toEqual({ level: 1, elapsedSeconds: 1.25, completed: true });
        expect(snapshot.personalBest).toBe(2);
    });

    it('asks for the remaining targets after a partial answer', () => {
        const harness = createHarness({ initialConfig: configForLevel(2) });
        playUntilAwaitingInput(harness);
        const first = tappableBall(harness.machine.snapshot(), isOpenTarget);

        expect(harness.machine.tap(first.position)).toBe(true);
        const partial = harness.machine.snapshot();
        expect(partial.phase).toBe('awaiting-input');
        expect(partial.foundTargets).toBe(1);
        expect(partial.remainingTargets).toBe(1);
        expect(partial.instructions).toBe('Good job! Find the remaining 1 ball(s).');

        const second = tappableBall(partial, isOpenTarget);
        expect(harness.machine.tap(second.position)).toBe(true);
        expect(harness.machine.snapshot().outcome).toBe('correct');
        expect(harness.ledger.getHistory()).toHaveLength(1);
    });

    it('ignores a second tap on a target that was already found', () => {
        const harness = createHarness({ initialConfig: configForLevel(2), random: separatedRows() });
        playUntilAwaitingInput(harness);
        const first = harness.machine.snapshot().balls[0];
        if (!first) {
            throw new Error('expected a first ball');
        }
        expect(first.isTarget).toBe(true);

        expect(harness.machine.tap(first.position)).toBe(true);
        expect(harness.machine.tap(first.position)).toBe(false);
        const snapshot = harness.machine.snapshot();

        expect(snapshot.phase).toBe('awaiting-input');
        expect(snapshot.foundTargets).toBe(1);
        expect(snapshot.remainingTargets).toBe(1);
        expect(snapshot.balls[0]?.visualState).toBe('correct');
        expect(harness.ledger.getHistory()).toEqual([]);
    });

    it('resolves a tap on a found target against the unanswered ball beneath it', () => {
        const harness = createHarness({ initialConfig: configForLevel(2), random: () => 0.5 });
        playUntilAwaitingInput(harness);
        const stacked = harness.machine.snapshot().balls;
        expect(stacked.every((ball) => ball.position.x === stacked[0]?.position.x)).toBe(true);
        const point = { ...(stacked[0]?.position ?? { x: 0, y: 0 }) };

        expect(harness.machine.tap(point)).toBe(true);
        expect(harness.machine.snapshot().balls.map((ball) => ball.visualState)).toEqual([
            'correct',
            'neutral',
            'neutral',
            'neutral',
        ]);

        expect(harness.machine.tap(point)).toBe(true);
        const snapshot = harness.machine.snapshot();
        expect(snapshot.outcome).toBe('correct');
        expect(snapshot.balls.slice(0, 2).map((ball) => ball.visualState)).toEqual(['correct', 'correct']);
        expect(harness.ledger.getHistory()).toHaveLength(1);
    });

    it('records a give-up with the tracked time and keeps the level for a retry', () => {
        const { machine, clock, ledger } = createHarness();
        machine.start();
        clock.advance(revealMs);
        clock.advance(3_420);

        expect(machine.loseTrack()).toBe(true);
        const snapshot = machine.snapshot();
        expect(clock.runningLoops()).toBe(0);

        expect(ledger.getHistory()).toEqual([{ level: 1, elapsedSeconds: 3.42, completed: false }]);
        expect(snapshot.phase).toBe('resolved');
        expect(snapshot.outcome).toBe('gave-up');
        expect(snapshot.instructions).toBe("Tracked for 3.4s. Let's see the answer.");
        expect(snapshot.command).toEqual({ enabled: true, label: 'retry' });
        expect(snapshot.config.levelIndex).toBe(1);
        expect(snapshot.balls.filter((ball) => ball.isTarget).every((ball) => ball.visualState === 'highlighted')).toBe(true);

        clock.advance(500);
        expect(machine.snapshot().balls).toEqual(snapshot.balls);

        clock.advance(trackingMs);
        expect(machine.getPhase()).toBe('resolved');
        expect(clock.pendingTimers()).toBe(0);
    });

    it('resolves a wrong tap as incorrect without recording an attempt', () => {
        const harness = createHarness();
        playUntilAwaitingInput(harness);
        const decoy = tappableBall(harness.machine.snapshot(), isDecoy);

        expect(harness.machine.tap(decoy.position)).toBe(true);
        const snapshot = harness.machine.snapshot();

        expect(snapshot.outcome).toBe('incorrect');
        expect(snapshot.instructions).toBe(COPY.incorrect);
        expect(snapshot.command).toEqual({ enabled: true, label: 'retry' });
        expect(snapshot.balls[decoy.index]?.visualState).toBe('incorrect');
        expect(snapshot.balls.filter((ball) => ball.isTarget).every((ball) => ball.visualState === 'highlighted')).toBe(true);
        expect(snapshot.config.levelIndex).toBe(1);
        expect(snapshot.history).toEqual([]);
        expect(snapshot.lastResult).toBeNull();
        expect(snapshot.personalBest).toBe(1);
    });

    it('ignores taps that miss every ball', () => {
        const harness = createHarness();
        playUntilAwaitingInput(harness);

        expect(harness.machine.tap({ x: -100, y: -100 })).toBe(false);
        expect(harness.machine.getPhase()).toBe('awaiting-input');
    });

    it('ignores input outside the phase that accepts it', () => {
        const { machine, clock } = createHarness();

        expect(machine.tap({ x: 10, y: 10 })).toBe(false);
        expect(machine.loseTrack()).toBe(false);

        machine.start();
        expect(machine.loseTrack()).toBe(false);
        expect(machine.tap({ x: 10, y: 10 })).toBe(false);

        clock.advance(revealMs);
        expect(machine.start()).toBe(false);
        expect(machine.tap(machine.snapshot().balls[0]?.position ?? { x: 0, y: 0 })).toBe(false);

        clock.advance(trackingMs);
        expect(machine.loseTrack()).toBe(false);
        expect(machine.start()).toBe(false);
        expect(machine.getPhase()).toBe('awaiting-input');
    });

    it('replays the same level after a retry', () => {
        const { machine, clock } = createHarness();
        machine.start();
        clock.advance(revealMs + 100);
        machine.loseTrack();

        expect(machine.start()).toBe(true);
        const snapshot = machine.snapshot();

        expect(snapshot.phase).toBe('reveal');
        expect(snapshot.outcome).toBeNull();
        expect(snapshot.config.levelIndex).toBe(1);
        expect(snapshot.command).toEqual({ enabled: false, label: 'retry' });
        expect(snapshot.lastResult).toBeNull();
    });

    it('keeps a higher stored personal best', () => {
        const harness = createHarness({}, { personalBest: 5 });
        const raised = vi.fn();
        harness.events.subscribe('PersonalBestRaised', raised);
        playUntilAwaitingInput(harness);

        harness.machine.tap(tappableBall(harness.machine.snapshot(), isOpenTarget).position);

        expect(harness.machine.snapshot().personalBest).toBe(5);
        expect(raised).not.toHaveBeenCalled();
    });

    it('publishes the phase sequence of a round', () => {
        const harness = createHarness();
        const phases: GamePhase[] = [];
        harness.events.subscribe('PhaseChanged', ({ payload }) => phases.push(payload.phase));
        const resolved = vi.fn();
        harness.events.subscribe('RoundResolved', resolved);

        playUntilAwaitingInput(harness);
        harness.machine.tap(tappableBall(harness.machine.snapshot(), isOpenTarget).position);

        expect(phases).toEqual(['setup', 'reveal', 'tracking', 'awaiting-input', 'resolved']);
        expect(resolved).toHaveBeenCalledWith(expect.objectContaining({ payload: { level: 1, outcome: 'correct' } }));
    });

    it('streams snapshots to subscribers, including motion frames', () => {
        const { machine, clock } = createHarness();
        const seen: RoundSnapshot[] = [];
        machine.subscribe((snapshot) => seen.push(snapshot));

        machine.start();
        clock.advance(revealMs);
        const beforeMotion = seen.length;
        clock.advance(100);

        expect(seen[0]?.phase).toBe('idle');
        expect(seen.length).toBeGreaterThan(beforeMotion + 4);
        expect(seen.at(-1)?.phase).toBe('tracking');
    });

    it('hands out snapshots that do not alias live state', () => {
        const { machine, clock } = createHarness();
        machine.start();
        clock.advance(revealMs);
        const snapshot = machine.snapshot();
        const position = { ...snapshot.balls[0]?.position };

        clock.advance(200);

        expect(snapshot.balls[0]?.position).toEqual(position);
    });

    it('cancels timers and motion on dispose', () => {
        const { machine, clock } = createHarness();
        const observer = vi.fn();
        machine.start();
        clock.advance(revealMs);
        machine.subscribe(observer);
        observer.mockClear();

        machine.dispose();
        clock.advance(trackingMs);

        expect(clock.runningLoops()).toBe(0);
        expect(clock.pendingTimers()).toBe(0);
        expect(machine.getPhase()).toBe('tracking');
        expect(observer).not.toHaveBeenCalled();
        expect(machine.start()).toBe(false);
        expect(machine.loseTrack()).toBe(false);
    });
});
