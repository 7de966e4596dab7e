import { Container, Graphics } from 'pixi.js';
import type { Arena, BallSnapshot } from 'physics/contracts';
import { ArenaTheme, colorForState } from './theme';

export interface BallRenderFrame {
    readonly arena: Arena;
    readonly balls: readonly BallSnapshot[];
}

export interface BallRenderer {
    readonly container: Container;
    render(frame: BallRenderFrame): void;
    destroy(): void;
}

const BORDER_WIDTH = 2;
const CORNER_RADIUS = 8;

/**
 * Draws the arena and one circle per ball. Graphics are pooled by ball index
 * and hidden when a level has fewer balls than the previous one.
 */
export const createBallRenderer = (theme: ArenaTheme = ArenaTheme): BallRenderer => {
    const container = new Container();
    container.label = 'ball-arena';
    container.eventMode = 'none';

    const background = new Graphics();
    background.label = 'arena-background';
    container.addChild(background);

    const pool: Graphics[] = [];
    let paintedArena: Arena | null = null;

    const paintBackground = (arena: Arena) => {
        if (paintedArena && paintedArena.width === arena.width && paintedArena.height === arena.height) {
            return;
        }
        background.clear();
        background.roundRect(0, 0, arena.width, arena.height, CORNER_RADIUS);
        background.fill({ color: theme.background });
        background.stroke({ color: theme.border, width: BORDER_WIDTH });
        paintedArena = { width: arena.width, height: arena.height };
    };

    const acquire = (index: number): Graphics => {
        const existing = pool[index];
        if (existing) {
            return existing;
        }
        const created = new Graphics();
        created.label = `ball-${index}`;
        pool.push(created);
        container.addChild(created);
        return created;
    };

    const render: BallRenderer['render'] = ({ arena, balls }) => {
        paintBackground(arena);

        balls.forEach((ball, index) => {
            const graphic = acquire(index);
            graphic.visible = true;
            graphic.clear();
            graphic.circle(ball.position.x, ball.position.y, ball.radius);
            graphic.fill({ color: colorForState(ball.visualState, theme) });
        });

        for (let index = balls.length; index < pool.length; index += 1) {
            pool[index].visible = false;
        }
    };

    const destroy = () => {
        pool.length = 0;
        container.destroy({ children: true });
    };

    return { container, render, destroy };
};
