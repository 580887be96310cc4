import { describe, it, expect } from 'vitest';
import { computeStartOffsetMs, MIN_TAIL_MS } from '../dropOffset';

describe('computeStartOffsetMs', () => {
    it.each([
        [240_000, 144_000],
        [180_000, 108_000],
        [100_000, 55_000],
        [60_000, 15_000],
        [45_000, 0],
        [30_000, 0],
        [10_000, 0],
        [0, 0],
    ])('%ims track starts at %ims', (durationMs, expected) => {
        expect(computeStartOffsetMs(durationMs)).toBe(expected);
    });

    it('truncates fractional offsets', () => {
        // 0.6 × 123457 = 74074.2
        expect(computeStartOffsetMs(123_457)).toBe(74_074);
    });

    it('always leaves ten seconds of track when it starts past zero', () => {
        for (let d = 0; d <= 600_000; d += 7_321) {
            const offset = computeStartOffsetMs(d);
            expect(offset).toBeGreaterThanOrEqual(0);
            if (offset > 0) {
                expect(d - offset).toBeGreaterThanOrEqual(MIN_TAIL_MS);
            }
        }
    });
});
