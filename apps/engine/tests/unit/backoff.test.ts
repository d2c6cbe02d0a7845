import { BackoffPolicy, nextBackoff } from '../../src/utils/backoff';

describe('nextBackoff', () => {
    const policy: BackoffPolicy = { initialIntervalMs: 1000, backoffCoefficient: 2, maximumIntervalMs: 30_000 };

    it('doubles from the initial interval and stops at the cap', () => {
        const delays = [1, 2, 3, 4, 5, 6, 7].map(attempt => nextBackoff(attempt, policy));
        expect(delays).toEqual([1000, 2000, 4000, 8000, 16_000, 30_000, 30_000]);
    });

    it('stays flat with a coefficient of 1', () => {
        const flat = { ...policy, backoffCoefficient: 1 };
        expect(nextBackoff(1, flat)).toBe(1000);
        expect(nextBackoff(9, flat)).toBe(1000);
    });

    it('spreads the delay by the jitter fraction', () => {
        const jittered = { ...policy, jitter: 0.1 };
        expect(nextBackoff(1, jittered, () => 0)).toBe(900);
        expect(nextBackoff(1, jittered, () => 0.5)).toBe(1000);
        expect(nextBackoff(1, jittered, () => 0.75)).toBe(1050);
    });

    it('keeps jittered delays within bounds', () => {
        const jittered = { ...policy, jitter: 0.1 };
        for (let i = 0; i < 50; i++) {
            const delay = nextBackoff(10, jittered);
            expect(delay).toBeGreaterThanOrEqual(27_000);
            expect(delay).toBeLessThanOrEqual(33_000);
        }
    });
});
