import { ActivityOptions, FailureDetail, RetryPolicy, RetryPolicyInput } from '@keel/sdk';
import { nextBackoff } from '../utils/backoff';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
    initialIntervalMs: 1000,
    backoffCoefficient: 2,
    maximumIntervalMs: 100_000,
    maximumAttempts: 0,
    nonRetryableErrorTypes: [],
    jitter: 0,
};

export const DEFAULT_START_TO_CLOSE_TIMEOUT_MS = 5 * 60_000;

export const TIMEOUT_CATEGORY = 'Timeout';

export interface ResolvedActivityOptions {
    retryPolicy: RetryPolicy;
    startToCloseTimeoutMs: number;
    scheduleToCloseTimeoutMs?: number;
    heartbeatTimeoutMs?: number;
    taskQueue: string;
}

export type RetryDecision =
    | { retry: true; delayMs: number; nextAttempt: number }
    | { retry: false; failure: FailureDetail; reason: 'timeout' | 'non_retryable' | 'attempts_exhausted' | 'schedule_to_close' };

export interface RetryInput {
    attempt: number;
    failure: FailureDetail;
    policy: RetryPolicy;
    firstScheduledAt: number;
    scheduleToCloseTimeoutMs?: number;
    now: number;
    random?: () => number;
}

/** Later layers override earlier ones field by field; the engine default sits underneath. */
export function resolveRetryPolicy(...layers: (RetryPolicyInput | undefined)[]): RetryPolicy {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, nonRetryableErrorTypes: [...DEFAULT_RETRY_POLICY.nonRetryableErrorTypes] };
    for (const layer of layers) {
        if (!layer) continue;
        if (layer.initialIntervalMs !== undefined) policy.initialIntervalMs = layer.initialIntervalMs;
        if (layer.backoffCoefficient !== undefined) policy.backoffCoefficient = layer.backoffCoefficient;
        if (layer.maximumIntervalMs !== undefined) policy.maximumIntervalMs = layer.maximumIntervalMs;
        if (layer.maximumAttempts !== undefined) policy.maximumAttempts = layer.maximumAttempts;
        if (layer.nonRetryableErrorTypes !== undefined) policy.nonRetryableErrorTypes = [...layer.nonRetryableErrorTypes];
        if (layer.jitter !== undefined) policy.jitter = layer.jitter;
    }
    // the cap never undercuts the first interval
    policy.maximumIntervalMs = Math.max(policy.maximumIntervalMs, policy.initialIntervalMs);
    return policy;
}

/**
 * Options frozen into ActivityScheduled: the activity's registered defaults,
 * overridden by whatever the workflow passed at the call site.
 */
export function resolveActivityOptions(
    registered: ActivityOptions | undefined,
    call: ActivityOptions,
    fallbackQueue: string,
): ResolvedActivityOptions {
    const resolved: ResolvedActivityOptions = {
        retryPolicy: resolveRetryPolicy(registered?.retry, call.retry),
        startToCloseTimeoutMs: call.startToCloseTimeoutMs ?? registered?.startToCloseTimeoutMs ?? DEFAULT_START_TO_CLOSE_TIMEOUT_MS,
        taskQueue: call.taskQueue ?? registered?.taskQueue ?? fallbackQueue,
    };
    const scheduleToClose = call.scheduleToCloseTimeoutMs ?? registered?.scheduleToCloseTimeoutMs;
    const heartbeat = call.heartbeatTimeoutMs ?? registered?.heartbeatTimeoutMs;
    if (scheduleToClose !== undefined) resolved.scheduleToCloseTimeoutMs = scheduleToClose;
    if (heartbeat !== undefined) resolved.heartbeatTimeoutMs = heartbeat;
    return resolved;
}

export function shouldRetry(attempt: number, category: string, policy: RetryPolicy, nonRetryable = false): boolean {
    const underLimit = policy.maximumAttempts === 0 || attempt < policy.maximumAttempts;
    return underLimit && !nonRetryable && !policy.nonRetryableErrorTypes.includes(category);
}

/**
 * Retry or give up after `attempt` failed. Timeouts are terminal for the
 * invocation, and no retry is scheduled to start past the schedule-to-close deadline.
 */
export function decideRetry(input: RetryInput): RetryDecision {
    const { attempt, failure, policy } = input;

    if (failure.category === TIMEOUT_CATEGORY) {
        return { retry: false, failure, reason: 'timeout' };
    }
    if (!shouldRetry(attempt, failure.category, policy, failure.nonRetryable)) {
        const exhausted = policy.maximumAttempts !== 0 && attempt >= policy.maximumAttempts;
        return { retry: false, failure, reason: exhausted ? 'attempts_exhausted' : 'non_retryable' };
    }

    const delayMs = nextBackoff(attempt, policy, input.random);
    if (input.scheduleToCloseTimeoutMs !== undefined) {
        const deadline = input.firstScheduledAt + input.scheduleToCloseTimeoutMs;
        if (input.now + delayMs >= deadline) {
            return {
                retry: false,
                reason: 'schedule_to_close',
                failure: {
                    category: TIMEOUT_CATEGORY,
                    message: `schedule-to-close timeout of ${input.scheduleToCloseTimeoutMs}ms exceeded after attempt ${attempt}`,
                    cause: failure,
                },
            };
        }
    }

    return { retry: true, delayMs, nextAttempt: attempt + 1 };
}
