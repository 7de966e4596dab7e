import type { Vector2 } from 'physics/contracts';

export interface GameInputHandlers {
    readonly onTap: (point: Vector2) => void;
    readonly onLoseTrack: () => void;
    readonly onCommand?: () => void;
}

export interface InputBindingOptions {
    /** Element whose top-left corner is the arena origin */
    readonly surface: HTMLElement;
    readonly keyTarget: Pick<EventTarget, 'addEventListener' | 'removeEventListener'>;
    readonly commandButton?: HTMLElement;
    readonly handlers: GameInputHandlers;
    /** Arena units per CSS pixel on each axis; defaults to 1 */
    readonly scale?: Readonly<Vector2>;
}

export const LOSE_TRACK_KEYS: readonly string[] = [' ', 'Spacebar'];
export const LOSE_TRACK_CODE = 'Space';

export const isLoseTrackKey = (event: Pick<KeyboardEvent, 'key' | 'code'>): boolean =>
    event.code === LOSE_TRACK_CODE || LOSE_TRACK_KEYS.includes(event.key);

export const toArenaPoint = (
    event: Pick<MouseEvent, 'clientX' | 'clientY'>,
    surface: HTMLElement,
    scale: Readonly<Vector2> = { x: 1, y: 1 },
): Vector2 => {
    const bounds = surface.getBoundingClientRect();
    return {
        x: (event.clientX - bounds.left) * scale.x,
        y: (event.clientY - bounds.top) * scale.y,
    };
};

/** Wires pointer and keyboard events to the game; returns the unbind function. */
export const bindGameInput = ({ surface, keyTarget, commandButton, handlers, scale }: InputBindingOptions): (() => void) => {
    const handlePointer = (event: Event) => {
        if (!(event instanceof MouseEvent)) {
            return;
        }
        handlers.onTap(toArenaPoint(event, surface, scale));
    };

    const handleKey = (event: Event) => {
        if (!(event instanceof KeyboardEvent) || event.repeat || !isLoseTrackKey(event)) {
            return;
        }
        event.preventDefault();
        handlers.onLoseTrack();
    };

    const handleCommand = () => {
        handlers.onCommand?.();
    };

    surface.addEventListener('pointerdown', handlePointer);
    keyTarget.addEventListener('keydown', handleKey);
    commandButton?.addEventListener('click', handleCommand);

    return () => {
        surface.removeEventListener('pointerdown', handlePointer);
        keyTarget.removeEventListener('keydown', handleKey);
        commandButton?.removeEventListener('click', handleCommand);
    };
};
