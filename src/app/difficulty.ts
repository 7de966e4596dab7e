import { gameConfig } from 'config/game';

const PROGRESSION = gameConfig.progression;

export interface LevelConfig {
    readonly levelIndex: number;
    readonly totalBalls: number;
    readonly targetCount: number;
    /** Arena units travelled per motion step */
    readonly speed: number;
}

export const INITIAL_LEVEL_CONFIG: LevelConfig = Object.freeze({ ...PROGRESSION.start });

/**
 * Derives the config that follows `previous`.
 *
 * Every level adds a ball; an even level adds a target until the cap is hit;
 * every third level raises the speed.
 */
export const nextConfig = (previous: LevelConfig): LevelConfig => {
    const levelIndex = previous.levelIndex + 1;
    const gainsTarget = levelIndex % PROGRESSION.targetStepEvery === 0 && previous.targetCount < PROGRESSION.maxTargets;
    const gainsSpeed = levelIndex % PROGRESSION.speedStepEvery === 0;

    return Object.freeze({
        levelIndex,
        totalBalls: previous.totalBalls + PROGRESSION.ballIncrement,
        targetCount: gainsTarget ? previous.targetCount + 1 : previous.targetCount,
        speed: gainsSpeed ? previous.speed + PROGRESSION.speedIncrement : previous.speed,
    });
};

export const configForLevel = (levelIndex: number): LevelConfig => {
    if (!Number.isInteger(levelIndex) || levelIndex < INITIAL_LEVEL_CONFIG.levelIndex) {
        throw new RangeError(`levelIndex must be an integer >= ${INITIAL_LEVEL_CONFIG.levelIndex}`);
    }

    let config = INITIAL_LEVEL_CONFIG;
    while (config.levelIndex < levelIndex) {
        config = nextConfig(config);
    }
    return config;
};

export const describeConfig = (config: LevelConfig): string =>
    `level ${config.levelIndex}: ${config.targetCount}/${config.totalBalls} targets @ ${config.speed.toFixed(2)}`;
