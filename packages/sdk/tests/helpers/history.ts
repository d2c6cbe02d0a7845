import { FailureDetail, newEvent, NewEvent, RetryPolicy, WorkflowEvent } from '../../src';

export const RUN_ID = 'run-1';
export const T0 = 1_700_000_000_000;

export const TEST_POLICY: RetryPolicy = {
    initialIntervalMs: 100,
    backoffCoefficient: 2,
    maximumIntervalMs: 1000,
    maximumAttempts: 3,
    nonRetryableErrorTypes: [],
};

export function sequenced(events: NewEvent[], runId = RUN_ID): WorkflowEvent[] {
    return events.map((event, i) => ({ ...event, runId, sequence: i + 1 }));
}

export function started(workflowType: string, input: unknown = null): NewEvent {
    return newEvent('WorkflowStarted', { workflowId: 'wf-1', workflowType, taskQueue: 'default', input }, T0);
}

export function scheduled(activityId: string, activityType: string, input: unknown, attempt = 1): NewEvent {
    return newEvent('ActivityScheduled', {
        activityId,
        activityType,
        input,
        attempt,
        taskQueue: 'default',
        retryPolicy: TEST_POLICY,
        startToCloseTimeoutMs: 1000,
        firstScheduledAt: T0,
    }, T0);
}

export function completed(activityId: string, result: unknown, attempt = 1): NewEvent {
    return newEvent('ActivityCompleted', { activityId, attempt, result }, T0);
}

export function failed(activityId: string, failure: FailureDetail, attempt = 1): NewEvent {
    return newEvent('ActivityFailed', { activityId, attempt, failure }, T0);
}

export function timerStarted(timerId: string, durationMs: number): NewEvent {
    return newEvent('TimerStarted', { timerId, durationMs, fireAt: T0 + durationMs }, T0);
}

export function timerFired(timerId: string, firedAt: number): NewEvent {
    return newEvent('TimerFired', { timerId, firedAt }, firedAt);
}
