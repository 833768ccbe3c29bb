// src/utils/upload/pacing.test.ts
import { selectPacingDelay, pacingDelayFor, NO_SUCCESS_DELAY_MS } from './pacing';

describe('selectPacingDelay', () => {
    it.each([
        [0.96, 50],
        [0.91, 80],
        [0.75, 150],
        [0.50, 300],
    ])('rate %p waits %p ms', (rate, expected) => {
        expect(selectPacingDelay(rate)).toBe(expected);
    });

    it('uses strict thresholds', () => {
        expect(selectPacingDelay(0.95)).toBe(80);
        expect(selectPacingDelay(0.7)).toBe(300);
    });
});

describe('pacingDelayFor', () => {
    it('waits 150 ms while nothing has succeeded', () => {
        expect(pacingDelayFor(0, 5)).toBe(NO_SUCCESS_DELAY_MS);
        expect(NO_SUCCESS_DELAY_MS).toBe(150);
    });

    it('derives the rate from counts', () => {
        expect(pacingDelayFor(1, 1)).toBe(50);
        expect(pacingDelayFor(1, 2)).toBe(300);
    });
});
