import { ActivityDefinition, ActivityHandler, ActivityOptions, RetryPolicyInput } from './types';
import { validateName } from './workflow';

function assertPositiveMs(activity: string, field: string, value: number | undefined): void {
    if (value === undefined) return;
    if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`Activity "${activity}": ${field} must be a positive number of milliseconds`);
    }
}

export function validateRetryPolicy(activity: string, retry: RetryPolicyInput | undefined): void {
    if (!retry) return;
    assertPositiveMs(activity, 'retry.initialIntervalMs', retry.initialIntervalMs);
    assertPositiveMs(activity, 'retry.maximumIntervalMs', retry.maximumIntervalMs);

    if (retry.backoffCoefficient !== undefined && !(retry.backoffCoefficient >= 1)) {
        throw new Error(`Activity "${activity}": retry.backoffCoefficient must be >= 1`);
    }
    if (retry.maximumAttempts !== undefined && (!Number.isInteger(retry.maximumAttempts) || retry.maximumAttempts < 0)) {
        throw new Error(`Activity "${activity}": retry.maximumAttempts must be a non-negative integer`);
    }
    if (
        retry.initialIntervalMs !== undefined &&
        retry.maximumIntervalMs !== undefined &&
        retry.maximumIntervalMs < retry.initialIntervalMs
    ) {
        throw new Error(`Activity "${activity}": retry.maximumIntervalMs must be >= retry.initialIntervalMs`);
    }
    if (retry.jitter !== undefined && (retry.jitter < 0 || retry.jitter >= 1)) {
        throw new Error(`Activity "${activity}": retry.jitter must be in [0, 1)`);
    }
}

export function validateActivityOptions(activity: string, options: ActivityOptions): void {
    assertPositiveMs(activity, 'startToCloseTimeoutMs', options.startToCloseTimeoutMs);
    assertPositiveMs(activity, 'scheduleToCloseTimeoutMs', options.scheduleToCloseTimeoutMs);
    assertPositiveMs(activity, 'heartbeatTimeoutMs', options.heartbeatTimeoutMs);
    if (options.taskQueue !== undefined) validateName('Task queue', options.taskQueue);
    validateRetryPolicy(activity, options.retry);
}

/**
 * Maps activity type names to handlers and their declared defaults.
 * Definitions are validated here so a bad policy fails at startup, not at schedule time.
 */
export class ActivityRegistry {
    private activities = new Map<string, ActivityDefinition>();

    register<I, O>(name: string, handler: ActivityHandler<I, O>, options: ActivityOptions = {}): ActivityDefinition<I, O> {
        validateName('Activity', name);
        if (typeof handler !== 'function') {
            throw new Error(`Activity "${name}" handler must be a function`);
        }
        if (this.activities.has(name)) {
            throw new Error(`Activity "${name}" is already registered.`);
        }
        validateActivityOptions(name, options);

        const def: ActivityDefinition<I, O> = { name, options, handler };
        this.activities.set(name, def);
        return def;
    }

    get(name: string): ActivityDefinition | undefined {
        return this.activities.get(name);
    }

    has(name: string): boolean {
        return this.activities.has(name);
    }

    list(): string[] {
        return Array.from(this.activities.keys());
    }
}

export const activityRegistry = new ActivityRegistry();

/**
 * Register an activity type on the process-wide registry.
 *
 * Activities run at least once: a worker may crash after the handler's side
 * effects land but before the outcome is recorded, so handlers must be idempotent.
 *
 * @example
 * export const chargeCard = activity('charge-card', async (order: Order) => {
 *   return payments.charge(order.id, order.total);
 * }, { retry: { maximumAttempts: 5, nonRetryableErrorTypes: ['CardDeclined'] } });
 */
export function activity<I = unknown, O = unknown>(
    name: string,
    handler: ActivityHandler<I, O>,
    options?: ActivityOptions,
): ActivityDefinition<I, O> {
    return activityRegistry.register(name, handler, options);
}
