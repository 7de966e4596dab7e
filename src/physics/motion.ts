import type { Arena, Ball, Vector2 } from './contracts';

const clamp = (value: number, min: number, max: number): number => {
    if (max < min) {
        return (min + max) / 2;
    }
    return Math.min(max, Math.max(min, value));
};

/**
 * Negates the velocity on any axis whose leading edge touches or crosses the
 * wall, then moves the ball one step. Axes are handled independently, so a
 * corner contact flips both components in the same step.
 */
export const advanceBall = (ball: Ball, arenaWidth: number, arenaHeight: number): void => {
    const { position, velocity, radius } = ball;

    if (position.x + radius >= arenaWidth || position.x - radius <= 0) {
        velocity.x = -velocity.x;
    }
    if (position.y + radius >= arenaHeight || position.y - radius <= 0) {
        velocity.y = -velocity.y;
    }

    position.x = clamp(position.x + velocity.x, radius, arenaWidth - radius);
    position.y = clamp(position.y + velocity.y, radius, arenaHeight - radius);
};

export const advanceBalls = (balls: readonly Ball[], arena: Arena): void => {
    for (const ball of balls) {
        advanceBall(ball, arena.width, arena.height);
    }
};

/** Strict containment: a tap exactly `radius` away from the centre misses. */
export const containsPoint = (ball: Pick<Ball, 'position' | 'radius'>, point: Readonly<Vector2>): boolean => {
    const dx = point.x - ball.position.x;
    const dy = point.y - ball.position.y;
    return Math.hypot(dx, dy) < ball.radius;
};
