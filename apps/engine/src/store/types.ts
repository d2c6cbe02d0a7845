import { FailureDetail, NewEvent, runStatus, WorkflowEvent } from '@keel/sdk';

export interface RunRecord {
    runId: string;
    workflowId: string;
    workflowType: string;
    taskQueue: string;
    input: unknown;
    status: runStatus;
    /** Sequence of the last appended event */
    version: number;
    createdAt: number;
    updatedAt: number;
    closedAt?: number;
    result?: unknown;
    failure?: FailureDetail;
    executionDeadline?: number;
}

export interface NewRun {
    runId: string;
    workflowId: string;
    workflowType: string;
    taskQueue: string;
    input: unknown;
    executionTimeoutMs?: number;
    startedAt: number;
}

export type IdReusePolicy = 'reject_duplicate' | 'allow_duplicate';

export interface TaskPayloads {
    decision: { runId: string; workflowId: string };
    activity: {
        runId: string;
        workflowId: string;
        activityId: string;
        activityType: string;
        attempt: number;
    };
    timer: { runId: string; workflowId: string; timerId: string };
}

export type TaskKind = keyof TaskPayloads;

export type TaskSpec = {
    [K in TaskKind]: { kind: K; queueName: string; payload: TaskPayloads[K]; delayMs?: number };
}[TaskKind];

export interface TaskHandle {
    taskId: string;
    leaseId: string;
}

export type LeasedTask = TaskSpec & {
    taskId: string;
    createdAt: number;
    /** 1 on first delivery, incremented each time a lapsed lease is redelivered */
    deliveryCount: number;
    leaseExpiresAt: number;
    handle: TaskHandle;
};

export interface ExpiredLease {
    taskId: string;
    queueName: string;
    kind: TaskKind;
    deliveryCount: number;
}

/**
 * Append-only, per-run ordered history. The run projection is maintained
 * here from the appended events; nothing else writes it.
 */
export interface EventLog {
    /**
     * Creates the run projection together with its WorkflowStarted event.
     * @throws AlreadyExistsError when policy is reject_duplicate and the workflow id has an open run
     */
    createRun(run: NewRun, policy: IdReusePolicy): Promise<RunRecord>;
    /**
     * @returns the new version (sequence of the last event appended)
     * @throws ConcurrencyConflictError when expectedVersion is not the current length
     * @throws RunClosedError when the run has already reached a terminal state
     */
    append(runId: string, expectedVersion: number, events: NewEvent[]): Promise<number>;
    /** Lazy and restartable: every call starts a fresh pass over events after fromVersion. */
    read(runId: string, fromVersion?: number): AsyncIterable<WorkflowEvent>;
    getRun(runId: string): Promise<RunRecord | null>;
    findLatestRun(workflowId: string): Promise<RunRecord | null>;
    findExpiredRuns(now: number, limit: number): Promise<RunRecord[]>;
}

/** Leased, at-least-once delivery. A task is never leased to two holders at once. */
export interface TaskQueue {
    enqueue(task: TaskSpec): Promise<string>;
    dequeue(queueName: string, visibilityTimeoutMs: number): Promise<LeasedTask | null>;
    ack(handle: TaskHandle): Promise<void>;
    /** Gives the lease up now, or after delayMs */
    nack(handle: TaskHandle, delayMs?: number): Promise<void>;
    extendLease(handle: TaskHandle, visibilityTimeoutMs: number): Promise<void>;
    releaseExpired(limit: number): Promise<ExpiredLease[]>;
}

export interface EngineStore {
    readonly events: EventLog;
    readonly tasks: TaskQueue;
    /** Creates the run with its WorkflowStarted event and enqueues tasks, atomically. */
    startRun(run: NewRun, policy: IdReusePolicy, tasks: TaskSpec[]): Promise<RunRecord>;
    /** Appends events and enqueues tasks, atomically. */
    commit(runId: string, expectedVersion: number, events: NewEvent[], tasks: TaskSpec[]): Promise<number>;
    ping(): Promise<void>;
    close(): Promise<void>;
}

export async function readHistory(log: EventLog, runId: string): Promise<WorkflowEvent[]> {
    const history: WorkflowEvent[] = [];
    for await (const event of log.read(runId, 0)) {
        history.push(event);
    }
    return history;
}
