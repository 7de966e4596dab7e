import { gameConfig } from 'config/game';
import type { BallVisualState } from 'physics/contracts';

export interface ArenaTheme {
    readonly background: number;
    readonly border: number;
    readonly balls: Readonly<Record<BallVisualState, number>>;
}

const deepFreeze = <T>(value: T): T => {
    if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
        return value;
    }

    for (const property of Object.values(value)) {
        deepFreeze(property);
    }
    return Object.freeze(value);
};

export const ArenaTheme: ArenaTheme = deepFreeze({
    background: gameConfig.arena.background,
    border: gameConfig.arena.border,
    balls: {
        highlighted: gameConfig.palette.target,
        neutral: gameConfig.palette.neutral,
        correct: gameConfig.palette.correct,
        incorrect: gameConfig.palette.incorrect,
    },
});

export const colorForState = (state: BallVisualState, theme: ArenaTheme = ArenaTheme): number => theme.balls[state];
