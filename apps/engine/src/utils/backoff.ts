import { RetryPolicy } from '@keel/sdk';

export type BackoffPolicy = Pick<RetryPolicy, 'initialIntervalMs' | 'backoffCoefficient' | 'maximumIntervalMs' | 'jitter'>;

// Exponential backoff: with 1s initial, coefficient 2 and a 30s cap,
// attempts 1..7 wait 1s, 2s, 4s, 8s, 16s, 30s, 30s.
// attempt is 1-indexed: the delay before attempt+1 after attempt failed.
export function nextBackoff(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
    const delay = Math.min(
        policy.initialIntervalMs * Math.pow(policy.backoffCoefficient, attempt - 1),
        policy.maximumIntervalMs,
    );
    const jitter = policy.jitter ?? 0;
    if (jitter === 0) return delay;

    // ±jitter fraction to avoid thundering herd
    const spread = delay * jitter;
    return Math.max(0, Math.floor(delay + (random() * 2 - 1) * spread));
}
