import type { LogLevel } from 'util/log';

interface ArenaConfig {
    readonly width: number;
    readonly height: number;
    readonly background: number;
    readonly border: number;
}

interface BallConfig {
    readonly radius: number;
}

interface TimingConfig {
    /** How long targets stay highlighted before tracking begins */
    readonly revealMs: number;
    /** Length of the motion-tracking window */
    readonly trackingMs: number;
    /** Fixed motion step, one ball update per step */
    readonly stepsPerSecond: number;
}

interface StartingLevelConfig {
    readonly levelIndex: number;
    readonly totalBalls: number;
    readonly targetCount: number;
    readonly speed: number;
}

interface ProgressionConfig {
    readonly start: StartingLevelConfig;
    readonly targetStepEvery: number;
    readonly maxTargets: number;
    readonly speedStepEvery: number;
    readonly speedIncrement: number;
    readonly ballIncrement: number;
}

interface PaletteConfig {
    readonly target: number;
    readonly neutral: number;
    readonly correct: number;
    readonly incorrect: number;
}

interface CopyConfig {
    readonly title: string;
    readonly idle: string;
    readonly tracking: string;
    readonly correct: string;
    readonly incorrect: string;
    readonly exportEmpty: string;
    readonly exportReady: string;
    readonly exportFailed: string;
    readonly identityTaken: string;
    readonly identityInvalid: string;
    readonly commandLabels: {
        readonly start: string;
        readonly 'next-level': string;
        readonly retry: string;
    };
    readonly resultLabels: {
        readonly answered: string;
        readonly gaveUp: string;
    };
}

interface StorageConfig {
    readonly profilePrefix: string;
    readonly version: number;
    readonly defaultPersonalBest: number;
}

interface ExportConfig {
    readonly header: readonly string[];
    readonly fileNamePrefix: string;
    readonly subjectPrefix: string;
}

interface LoggingConfig {
    readonly level: LogLevel;
}

export interface GameConfig {
    readonly arena: ArenaConfig;
    readonly ball: BallConfig;
    readonly timing: TimingConfig;
    readonly progression: ProgressionConfig;
    readonly palette: PaletteConfig;
    readonly copy: CopyConfig;
    readonly storage: StorageConfig;
    readonly export: ExportConfig;
    readonly logging: LoggingConfig;
}

export const gameConfig = {
    arena: {
        width: 350,
        height: 450,
        background: 0xf8f9fa,
        border: 0xdee2e6,
    },
    ball: {
        radius: 15,
    },
    timing: {
        revealMs: 2_500,
        trackingMs: 6_000,
        stepsPerSecond: 60,
    },
    progression: {
        start: {
            levelIndex: 1,
            totalBalls: 3,
            targetCount: 1,
            speed: 2,
        },
        targetStepEvery: 2,
        maxTargets: 5,
        speedStepEvery: 3,
        speedIncrement: 0.25,
        ballIncrement: 1,
    },
    palette: {
        target: 0xffc107,
        neutral: 0x007bff,
        correct: 0x28a745,
        incorrect: 0xdc3545,
    },
    copy: {
        title: 'Ball Tracking Challenge',
        idle: "Click 'Start' to begin. Watch the yellow balls.",
        tracking: 'Tracking... (Press SPACE if you lose track)',
        correct: 'Correct! Well done!',
        incorrect: 'Incorrect. Try this level again.',
        exportEmpty: 'No history to export.',
        exportReady: 'CSV file created. Opening share dialog...',
        exportFailed: 'Export failed. Please try again.',
        identityTaken: 'is already taken.',
        identityInvalid: 'User ID must be digits only.',
        commandLabels: {
            start: 'Start Level',
            'next-level': 'Next Level',
            retry: 'Try Again',
        },
        resultLabels: {
            answered: 'Answered',
            gaveUp: 'Gave Up',
        },
    },
    storage: {
        profilePrefix: 'ball-tracker::profile',
        version: 1,
        defaultPersonalBest: 1,
    },
    export: {
        header: ['Level', 'Result', 'Time (s)'],
        fileNamePrefix: 'tracking_history_',
        subjectPrefix: 'Ball Tracking History for User ',
    },
    logging: {
        level: 'info',
    },
} as const satisfies GameConfig;

export type GameConfigValues = typeof gameConfig;
