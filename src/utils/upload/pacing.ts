// src/utils/upload/pacing.ts

/** Delay used while no record has succeeded yet. */
export const NO_SUCCESS_DELAY_MS = 150;

const PACING_BUCKETS: ReadonlyArray<{ minRate: number; delayMs: number }> = [
    { minRate: 0.95, delayMs: 50 },
    { minRate: 0.90, delayMs: 80 },
    { minRate: 0.70, delayMs: 150 },
];
const SLOW_DELAY_MS = 300;

/**
 * Delay (ms) to wait before the next record, from the success rate of the records processed so far.
 * Rates strictly above a bucket's threshold select it.
 */
export function selectPacingDelay(successRate: number): number {
    for (const bucket of PACING_BUCKETS) {
        if (successRate > bucket.minRate) {
            return bucket.delayMs;
        }
    }
    return SLOW_DELAY_MS;
}

export function pacingDelayFor(successCount: number, processedCount: number): number {
    if (successCount === 0 || processedCount === 0) {
        return NO_SUCCESS_DELAY_MS;
    }
    return selectPacingDelay(successCount / processedCount);
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));
