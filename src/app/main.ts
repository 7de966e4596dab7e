import { Application } from 'pixi.js';
import { gameConfig } from 'config/game';
import { bindGameInput } from 'input/input-router';
import { bindIdentityForm } from 'input/identity-form';
import { createBallRenderer } from 'render/ball-renderer';
import { createHudPresenter, createHudView } from 'render/hud';
import { ArenaTheme } from 'render/theme';
import { createProfileStore, type ProfileStore, type UserProfile } from 'storage/profile-store';
import { rootLogger } from 'util/log';
import { createRandomManager } from 'util/random';
import type { ExportOutcome } from './export';
import { createGameRuntime, type GameRuntime } from './game-runtime';
import { claimIdentity } from './identity';
import { createBrowserExportSink } from './share';

const logger = rootLogger.child('bootstrap');

const EXPORT_MESSAGES: Record<ExportOutcome, string> = {
    empty: gameConfig.copy.exportEmpty,
    exported: gameConfig.copy.exportReady,
    failed: gameConfig.copy.exportFailed,
};

export interface BallTrackerOptions {
    readonly seed?: number;
    readonly store?: ProfileStore;
}

export interface BallTrackerHandle {
    getSeed(): number;
    /** Resolves once an id has been claimed and the arena is on screen. */
    whenReady(): Promise<GameRuntime>;
    dispose(): Promise<void>;
}

const requireElement = <T extends HTMLElement>(id: string, type: new () => T): T => {
    const element = document.getElementById(id);
    if (!(element instanceof type)) {
        throw new Error(`Missing #${id} element`);
    }
    return element;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function bootstrapBallTracker(options: BallTrackerOptions = {}): BallTrackerHandle {
    const store = options.store ?? createProfileStore();
    const random = createRandomManager(options.seed);
    const identity = requireElement('identity', HTMLElement);
    const game = requireElement('game', HTMLElement);
    const unbinders: (() => void)[] = [];
    let runtime: GameRuntime | null = null;
    let disposed = false;
    let resolveReady: (session: GameRuntime) => void = () => undefined;
    let rejectReady: (reason: unknown) => void = () => undefined;
    const ready = new Promise<GameRuntime>((resolve, reject) => {
        resolveReady = resolve;
        rejectReady = reject;
    });
    // Start failures are logged where they happen; callers opt in through whenReady.
    ready.catch(() => undefined);

    const releaseBindings = () => {
        unbinders.splice(0).forEach((unbind) => unbind());
    };

    const startSession = async (profile: UserProfile): Promise<GameRuntime> => {
        const { width, height } = gameConfig.arena;
        const surface = requireElement('arena', HTMLElement);
        const command = requireElement('command', HTMLButtonElement);
        const exportButton = requireElement('export', HTMLButtonElement);
        const toast = requireElement('toast', HTMLElement);

        const app = new Application();
        await app.init({ width, height, antialias: true, backgroundAlpha: 0 });
        surface.appendChild(app.canvas);

        const renderer = createBallRenderer(ArenaTheme);
        app.stage.addChild(renderer.container);

        const presentHud = createHudPresenter({
            title: requireElement('title', HTMLElement),
            level: requireElement('level', HTMLElement),
            personalBest: requireElement('personal-best', HTMLElement),
            instructions: requireElement('instructions', HTMLElement),
            command,
            history: requireElement('history', HTMLElement),
        });

        const session = createGameRuntime({
            store,
            profile,
            random: random.random,
            exportSink: createBrowserExportSink({ document, navigator }),
            render: (snapshot) => {
                renderer.render(snapshot);
                presentHud(createHudView(snapshot));
            },
        });

        unbinders.push(
            bindGameInput({
                surface,
                keyTarget: window,
                commandButton: command,
                handlers: {
                    onTap: (point) => session.machine.tap(point),
                    onLoseTrack: () => session.machine.loseTrack(),
                    onCommand: () => session.machine.start(),
                },
            }),
        );

        const handleExport = () => {
            void session.exportHistory().then((outcome) => {
                toast.textContent = EXPORT_MESSAGES[outcome];
            });
        };
        exportButton.addEventListener('click', handleExport);
        unbinders.push(() => exportButton.removeEventListener('click', handleExport));
        unbinders.push(() => {
            renderer.destroy();
            app.destroy(true, { children: true });
        });

        logger.info('Session started', { userId: profile.userId, seed: random.seed() });
        return session;
    };

    unbinders.push(
        bindIdentityForm({
            form: requireElement('identity-form', HTMLFormElement),
            input: requireElement('identity-input', HTMLInputElement),
            error: requireElement('identity-error', HTMLElement),
            claim: (raw) => claimIdentity(store, raw),
            onClaimed: (profile) => {
                identity.hidden = true;
                game.hidden = false;
                startSession(profile)
                    .then(async (session) => {
                        if (disposed) {
                            releaseBindings();
                            await session.dispose();
                            rejectReady(new Error('Session was disposed before it started'));
                            return;
                        }
                        runtime = session;
                        resolveReady(session);
                    })
                    .catch((error: unknown) => {
                        logger.error('Failed to start session', { message: describeError(error) });
                        rejectReady(error);
                    });
            },
            onError: (error) => {
                logger.error('Identity claim failed', { message: describeError(error) });
            },
        }),
    );

    identity.hidden = false;
    game.hidden = true;

    const dispose = async () => {
        disposed = true;
        releaseBindings();
        const active = runtime;
        runtime = null;
        await active?.dispose();
    };

    const handlePageHide = () => {
        window.removeEventListener('pagehide', handlePageHide);
        dispose().catch((error: unknown) => {
            logger.error('Failed to close session', { message: describeError(error) });
        });
    };
    window.addEventListener('pagehide', handlePageHide);

    return {
        getSeed: () => random.seed(),
        whenReady: () => ready,
        dispose,
    };
}

const resolveSeedFromQuery = (): number | undefined => {
    const seedParam = new URLSearchParams(window.location.search).get('seed');
    if (!seedParam) {
        return undefined;
    }
    const parsed = Number.parseInt(seedParam, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
};

if (document.getElementById('app')) {
    bootstrapBallTracker({ seed: resolveSeedFromQuery() });
}
