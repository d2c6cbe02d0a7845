/**
 * Lifecycle states of a workflow run.
 * Runs progress: RUNNING → COMPLETED/FAILED/TERMINATED/TIMED_OUT
 */
export enum runStatus {
    RUNNING = 'RUNNING',
    COMPLETED = 'COMPLETED',
    FAILED = 'FAILED',
    TERMINATED = 'TERMINATED',
    TIMED_OUT = 'TIMED_OUT',
}

export const CLOSED_STATUSES: ReadonlySet<runStatus> = new Set([
    runStatus.COMPLETED,
    runStatus.FAILED,
    runStatus.TERMINATED,
    runStatus.TIMED_OUT,
]);

export interface FailureDetail {
    category: string;
    message: string;
    stack?: string;
    nonRetryable?: boolean;
    details?: unknown;
    cause?: FailureDetail;
}

export interface RetryPolicy {
    initialIntervalMs: number;
    backoffCoefficient: number;
    maximumIntervalMs: number;
    /** 0 means unlimited, bounded only by the schedule-to-close timeout */
    maximumAttempts: number;
    nonRetryableErrorTypes: string[];
    /** Fraction of the delay applied as ± jitter, 0 disables it */
    jitter?: number;
}

export type RetryPolicyInput = Partial<RetryPolicy>;

export interface ActivityOptions {
    retry?: RetryPolicyInput;
    startToCloseTimeoutMs?: number;
    scheduleToCloseTimeoutMs?: number;
    heartbeatTimeoutMs?: number;
    taskQueue?: string;
}

export interface ActivityCallOptions extends ActivityOptions {
    /** Stable id for the invocation; defaults to the call order within the run */
    activityId?: string;
}

export interface WorkflowInfo {
    workflowId: string;
    runId: string;
    workflowType: string;
    taskQueue: string;
    startedAt: number;
}

export interface ActivityInfo {
    runId: string;
    workflowId: string;
    activityId: string;
    activityType: string;
    attempt: number;
    taskQueue: string;
}

export interface ActivityContext {
    info: ActivityInfo;
    /** Aborted when the start-to-close deadline passes or the worker shuts down */
    signal: AbortSignal;
    heartbeat(details?: unknown): void;
}

export interface ActivityDefinition<I = unknown, O = unknown> {
    readonly name: string;
    readonly options: ActivityOptions;
    handler(input: I, ctx: ActivityContext): Promise<O>;
}

export type ActivityHandler<I = unknown, O = unknown> = (input: I, ctx: ActivityContext) => Promise<O>;

/**
 * What workflow code sees while it runs. Everything here is replay-safe:
 * results come from history when they exist, time and randomness are derived
 * from recorded events instead of the host.
 */
export interface WorkflowContext<I = unknown> {
    readonly input: I;
    readonly info: WorkflowInfo;
    activity<AI, AO>(definition: ActivityDefinition<AI, AO>, input: AI, options?: ActivityCallOptions): Promise<AO>;
    activity<AO = unknown>(activityType: string, input?: unknown, options?: ActivityCallOptions): Promise<AO>;
    sleep(durationMs: number): Promise<void>;
    /** Logical time: the start timestamp, advanced by every observed timer */
    now(): number;
    /** Seeded from the run id, so identical across replays */
    random(): number;
}

export interface WorkflowDefinition<I = unknown, O = unknown> {
    readonly name: string;
    handler(ctx: WorkflowContext<I>): Promise<O>;
}

export type WorkflowHandler<I = unknown, O = unknown> = (ctx: WorkflowContext<I>) => Promise<O>;

export interface WorkflowLookup {
    get(name: string): WorkflowDefinition | undefined;
}
