/**
 * Ball Motion Contract
 *
 * Shapes shared by the motion model, the level generator, the round machine
 * and the renderer.
 */

export interface Vector2 {
    x: number;
    y: number;
}

export interface Arena {
    readonly width: number;
    readonly height: number;
}

/**
 * Per-attempt look of a ball.
 * `highlighted` marks a target during the reveal and after the answer is shown.
 */
export type BallVisualState = 'neutral' | 'highlighted' | 'correct' | 'incorrect';

export interface Ball {
    /** Centre in arena units */
    position: Vector2;
    /** Displacement applied on every motion step */
    velocity: Vector2;
    readonly radius: number;
    readonly isTarget: boolean;
    visualState: BallVisualState;
}

/** Detached copy handed to observers; never aliases the live arena. */
export interface BallSnapshot {
    readonly index: number;
    readonly position: Readonly<Vector2>;
    readonly velocity: Readonly<Vector2>;
    readonly radius: number;
    readonly isTarget: boolean;
    readonly visualState: BallVisualState;
}

export const isResolvedVisualState = (state: BallVisualState): boolean =>
    state === 'correct' || state === 'incorrect';

export const snapshotBall = (ball: Ball, index: number): BallSnapshot => ({
    index,
    position: { x: ball.position.x, y: ball.position.y },
    velocity: { x: ball.velocity.x, y: ball.velocity.y },
    radius: ball.radius,
    isTarget: ball.isTarget,
    visualState: ball.visualState,
});
