import { gameConfig } from 'config/game';
import type { Arena, Ball } from 'physics/contracts';
import { randomAngle, randomInRange, type RandomSource } from 'util/random';
import type { LevelConfig } from './difficulty';

export interface LevelGenerationOptions {
    readonly random?: RandomSource;
    readonly radius?: number;
}

const assertCount = (label: string, value: number): void => {
    if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`${label} must be a non-negative integer, received ${value}`);
    }
};

const assertArena = (arena: Arena, radius: number): void => {
    if (!(arena.width >= radius * 2) || !(arena.height >= radius * 2)) {
        throw new RangeError(`arena ${arena.width}x${arena.height} cannot hold a ball of radius ${radius}`);
    }
};

/**
 * Spawns `totalBalls` balls at uniform positions with uniform headings.
 * The first `targetCount` balls are the targets and start highlighted;
 * spawns may overlap.
 */
export const generateLevel = (
    config: LevelConfig,
    arena: Arena,
    options: LevelGenerationOptions = {},
): Ball[] => {
    const random = options.random ?? Math.random;
    const radius = options.radius ?? gameConfig.ball.radius;

    assertCount('totalBalls', config.totalBalls);
    assertCount('targetCount', config.targetCount);
    if (config.targetCount > config.totalBalls) {
        throw new RangeError(`targetCount ${config.targetCount} exceeds totalBalls ${config.totalBalls}`);
    }
    assertArena(arena, radius);

    const balls: Ball[] = [];
    for (let index = 0; index < config.totalBalls; index += 1) {
        const x = randomInRange(random, radius, arena.width - radius);
        const y = randomInRange(random, radius, arena.height - radius);
        const heading = randomAngle(random);
        const isTarget = index < config.targetCount;

        balls.push({
            position: { x, y },
            velocity: { x: Math.cos(heading) * config.speed, y: Math.sin(heading) * config.speed },
            radius,
            isTarget,
            visualState: isTarget ? 'highlighted' : 'neutral',
        });
    }

    return balls;
};
