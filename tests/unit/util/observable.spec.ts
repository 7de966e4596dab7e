import { describe, expect, it, vi } from 'vitest';
import { createStateSubject } from 'util/observable';
import type { Logger } from 'util/log';

const createLoggerMock = (): Logger => {
    const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: () => logger,
    };
    return logger;
};

describe('createStateSubject', () => {
    it('replays the current value to new subscribers', () => {
        const subject = createStateSubject(1);
        subject.next(2);

        const received: number[] = [];
        subject.subscribe((value) => received.push(value));

        expect(received).toEqual([2]);
        expect(subject.value()).toBe(2);
    });

    it('broadcasts subsequent values until unsubscribed', () => {
        const subject = createStateSubject('idle');
        const received: string[] = [];
        const subscription = subject.subscribe((value) => received.push(value));

        subject.next('reveal');
        subscription.unsubscribe();
        subject.next('tracking');

        expect(received).toEqual(['idle', 'reveal']);
    });

    it('keeps notifying other observers when one throws', () => {
        const logger = createLoggerMock();
        const subject = createStateSubject(0, { logger, label: 'round' });
        const healthy = vi.fn();

        subject.subscribe((value) => {
            if (value > 0) {
                throw new Error('render failed');
            }
        });
        subject.subscribe(healthy);
        subject.next(1);

        expect(healthy).toHaveBeenLastCalledWith(1);
        expect(logger.error).toHaveBeenCalledWith('Observer failed', { subject: 'round', message: 'render failed' });
    });

    it('stops emitting after completion', () => {
        const subject = createStateSubject(0);
        const observer = vi.fn();
        subject.subscribe(observer);

        subject.complete();
        subject.next(5);
        const late = vi.fn();
        subject.subscribe(late).unsubscribe();

        expect(observer).toHaveBeenCalledTimes(1);
        expect(late).not.toHaveBeenCalled();
        expect(subject.value()).toBe(0);
    });
});
