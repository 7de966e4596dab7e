import { describe, expect, it } from 'vitest';
import { createRandomManager, mulberry32, randomAngle, randomInRange } from 'util/random';

describe('random utilities', () => {
    it('produces identical sequences for identical seeds', () => {
        const first = mulberry32(42);
        const second = mulberry32(42);

        const a = Array.from({ length: 5 }, () => first());
        const b = Array.from({ length: 5 }, () => second());

        expect(a).toEqual(b);
        a.forEach((value) => {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        });
    });

    it('treats a zero or non-finite seed as the default seed', () => {
        const fromZero = mulberry32(0);
        const fromNaN = mulberry32(Number.NaN);
        const fromOne = mulberry32(1);

        const expected = fromOne();
        expect(fromZero()).toBe(expected);
        expect(fromNaN()).toBe(expected);
    });

    it('scales draws into the requested range', () => {
        expect(randomInRange(() => 0, 15, 335)).toBe(15);
        expect(randomInRange(() => 0.5, 15, 335)).toBe(175);
        expect(randomInRange(() => 0.75, 10, 10)).toBe(10);
        expect(randomInRange(() => 0.75, 20, 10)).toBe(20);
    });

    it('maps draws onto a full turn', () => {
        expect(randomAngle(() => 0)).toBe(0);
        expect(randomAngle(() => 0.25)).toBeCloseTo(Math.PI / 2, 10);
    });

    it('reports its seed and replays sequences from it', () => {
        const manager = createRandomManager(99);
        const replay = createRandomManager(manager.seed());

        expect(manager.seed()).toBe(99);
        expect([manager.next(), manager.random(), manager.nextInt(10)]).toEqual([
            replay.next(),
            replay.random(),
            replay.nextInt(10),
        ]);
    });

    it('bounds integer draws and rejects empty ranges', () => {
        const manager = createRandomManager(7);
        for (let i = 0; i < 50; i++) {
            const value = manager.nextInt(4);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(4);
        }
        expect(() => manager.nextInt(0)).toThrow(RangeError);
    });

    it('clamps boolean thresholds', () => {
        const manager = createRandomManager(3);
        expect(manager.boolean(1)).toBe(true);
        expect(manager.boolean(5)).toBe(true);
        expect(manager.boolean(0)).toBe(false);
        expect(manager.boolean(-1)).toBe(false);
    });
});
