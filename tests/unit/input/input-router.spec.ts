import { afterEach, describe, expect, it, vi } from 'vitest';
import { bindGameInput, isLoseTrackKey, toArenaPoint } from 'input/input-router';

const createSurface = () => {
    const surface = document.createElement('div');
    document.body.appendChild(surface);
    vi.spyOn(surface, 'getBoundingClientRect').mockReturnValue({
        x: 10,
        y: 20,
        left: 10,
        top: 20,
        width: 350,
        height: 450,
        right: 360,
        bottom: 470,
        toJSON: () => ({}),
    });
    return surface;
};

const createHandlers = () => ({
    onTap: vi.fn(),
    onLoseTrack: vi.fn(),
    onCommand: vi.fn(),
});

describe('input router', () => {
    const unbinders: (() => void)[] = [];

    afterEach(() => {
        unbinders.splice(0).forEach((unbind) => unbind());
    });

    it('recognises the space bar by code or key', () => {
        expect(isLoseTrackKey({ code: 'Space', key: ' ' })).toBe(true);
        expect(isLoseTrackKey({ code: '', key: 'Spacebar' })).toBe(true);
        expect(isLoseTrackKey({ code: 'KeyA', key: 'a' })).toBe(false);
    });

    it('converts client coordinates to arena coordinates', () => {
        const surface = createSurface();

        expect(toArenaPoint({ clientX: 60, clientY: 80 }, surface)).toEqual({ x: 50, y: 60 });
        expect(toArenaPoint({ clientX: 60, clientY: 80 }, surface, { x: 2, y: 0.5 })).toEqual({ x: 100, y: 30 });
    });

    it('turns pointer presses into taps', () => {
        const surface = createSurface();
        const handlers = createHandlers();
        unbinders.push(bindGameInput({ surface, keyTarget: window, handlers }));

        surface.dispatchEvent(new MouseEvent('pointerdown', { clientX: 60, clientY: 80 }));

        expect(handlers.onTap).toHaveBeenCalledWith({ x: 50, y: 60 });
    });

    it('turns the space bar into a lose-track signal', () => {
        const surface = createSurface();
        const handlers = createHandlers();
        unbinders.push(bindGameInput({ surface, keyTarget: window, handlers }));

        const press = new KeyboardEvent('keydown', { code: 'Space', key: ' ', cancelable: true });
        window.dispatchEvent(press);
        window.dispatchEvent(new KeyboardEvent('keydown', { code: 'Space', key: ' ', repeat: true }));
        window.dispatchEvent(new KeyboardEvent('keydown', { code: 'Enter', key: 'Enter' }));

        expect(handlers.onLoseTrack).toHaveBeenCalledTimes(1);
        expect(press.defaultPrevented).toBe(true);
    });

    it('forwards command button clicks', () => {
        const surface = createSurface();
        const button = document.createElement('button');
        const handlers = createHandlers();
        unbinders.push(bindGameInput({ surface, keyTarget: window, commandButton: button, handlers }));

        button.click();

        expect(handlers.onCommand).toHaveBeenCalledTimes(1);
    });

    it('stops listening once unbound', () => {
        const surface = createSurface();
        const button = document.createElement('button');
        const handlers = createHandlers();
        const unbind = bindGameInput({ surface, keyTarget: window, commandButton: button, handlers });

        unbind();
        surface.dispatchEvent(new MouseEvent('pointerdown', { clientX: 60, clientY: 80 }));
        window.dispatchEvent(new KeyboardEvent('keydown', { code: 'Space', key: ' ' }));
        button.click();

        expect(handlers.onTap).not.toHaveBeenCalled();
        expect(handlers.onLoseTrack).not.toHaveBeenCalled();
        expect(handlers.onCommand).not.toHaveBeenCalled();
    });
});
