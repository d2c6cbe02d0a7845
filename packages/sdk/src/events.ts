import { FailureDetail, RetryPolicy } from './types';

export interface WorkflowStartedPayload {
    workflowId: string;
    workflowType: string;
    taskQueue: string;
    input: unknown;
    executionTimeoutMs?: number;
}

export interface ActivityScheduledPayload {
    activityId: string;
    activityType: string;
    input: unknown;
    attempt: number;
    taskQueue: string;
    retryPolicy: RetryPolicy;
    startToCloseTimeoutMs: number;
    scheduleToCloseTimeoutMs?: number;
    heartbeatTimeoutMs?: number;
    firstScheduledAt: number;
    lastFailure?: FailureDetail;
}

export interface ActivityCompletedPayload {
    activityId: string;
    attempt: number;
    result: unknown;
}

export interface ActivityFailedPayload {
    activityId: string;
    attempt: number;
    failure: FailureDetail;
}

export interface TimerStartedPayload {
    timerId: string;
    durationMs: number;
    fireAt: number;
}

export interface TimerFiredPayload {
    timerId: string;
    firedAt: number;
}

export interface EventPayloads {
    WorkflowStarted: WorkflowStartedPayload;
    ActivityScheduled: ActivityScheduledPayload;
    ActivityCompleted: ActivityCompletedPayload;
    ActivityFailed: ActivityFailedPayload;
    TimerStarted: TimerStartedPayload;
    TimerFired: TimerFiredPayload;
    WorkflowCancelRequested: { reason: string };
    WorkflowCompleted: { result: unknown };
    WorkflowFailed: { failure: FailureDetail };
    WorkflowCanceled: { reason: string };
    WorkflowTimedOut: { timeoutMs: number };
}

export type EventKind = keyof EventPayloads;

/** An event not yet appended: the log assigns runId and sequence. */
export type NewEvent = {
    [K in EventKind]: { kind: K; timestamp: number; payload: EventPayloads[K] };
}[EventKind];

export type WorkflowEvent = NewEvent & { runId: string; sequence: number };

export type EventOf<K extends EventKind> = Extract<WorkflowEvent, { kind: K }>;

export const TERMINAL_EVENT_KINDS: ReadonlySet<EventKind> = new Set<EventKind>([
    'WorkflowCompleted',
    'WorkflowFailed',
    'WorkflowCanceled',
    'WorkflowTimedOut',
]);

export function newEvent<K extends EventKind>(kind: K, payload: EventPayloads[K], timestamp: number = Date.now()) {
    return { kind, payload, timestamp };
}

export function isEventKind<K extends EventKind>(event: WorkflowEvent, kind: K): event is EventOf<K> {
    return event.kind === kind;
}
