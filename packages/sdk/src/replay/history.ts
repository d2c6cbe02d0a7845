import { ActivityScheduledPayload, EventOf, NewEvent, WorkflowEvent, WorkflowStartedPayload } from '../events';
import { FailureDetail, runStatus } from '../types';

export type ActivityOutcome =
    | { kind: 'completed'; result: unknown }
    | { kind: 'failed'; failure: FailureDetail };

export interface ActivityRecord {
    activityId: string;
    activityType: string;
    input: unknown;
    attempt: number;
    scheduledAt: number;
    /** Payload of the latest ActivityScheduled, i.e. the current attempt */
    scheduled: ActivityScheduledPayload;
    outcome?: ActivityOutcome;
}

export interface TimerRecord {
    timerId: string;
    durationMs: number;
    fireAt: number;
    firedAt?: number;
}

export type ClosingEvent = EventOf<'WorkflowCompleted' | 'WorkflowFailed' | 'WorkflowCanceled' | 'WorkflowTimedOut'>;

export class MalformedHistoryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedHistoryError';
    }
}

/**
 * Folds a run's events into lookup tables keyed by activity and timer id.
 * Rejects histories that could not have been produced by the engine.
 */
export class HistoryIndex {
    readonly activities = new Map<string, ActivityRecord>();
    readonly timers = new Map<string, TimerRecord>();
    cancelRequest: EventOf<'WorkflowCancelRequested'> | null = null;
    closedBy: ClosingEvent | null = null;
    lastSequence = 0;

    private constructor(
        readonly runId: string,
        readonly started: WorkflowStartedPayload,
        readonly startedAt: number,
    ) { }

    static build(history: readonly WorkflowEvent[]): HistoryIndex {
        const first = history[0];
        if (!first || first.kind !== 'WorkflowStarted') {
            throw new MalformedHistoryError('history must begin with WorkflowStarted');
        }

        const index = new HistoryIndex(first.runId, first.payload, first.timestamp);
        for (const event of history) {
            index.apply(event);
        }
        return index;
    }

    private apply(event: WorkflowEvent): void {
        if (event.sequence !== this.lastSequence + 1) {
            throw new MalformedHistoryError(`expected sequence ${this.lastSequence + 1}, got ${event.sequence}`);
        }
        if (this.closedBy) {
            throw new MalformedHistoryError(`event ${event.sequence} (${event.kind}) follows ${this.closedBy.kind}`);
        }
        this.lastSequence = event.sequence;

        switch (event.kind) {
            case 'WorkflowStarted':
                if (event.sequence !== 1) throw new MalformedHistoryError('WorkflowStarted must be the first event');
                return;
            case 'ActivityScheduled': {
                const { activityId, activityType, input, attempt } = event.payload;
                const existing = this.activities.get(activityId);
                if (!existing) {
                    this.activities.set(activityId, {
                        activityId,
                        activityType,
                        input,
                        attempt,
                        scheduledAt: event.timestamp,
                        scheduled: event.payload,
                    });
                    return;
                }
                if (existing.outcome) {
                    throw new MalformedHistoryError(`activity ${activityId} rescheduled after its outcome`);
                }
                if (existing.activityType !== activityType || attempt <= existing.attempt) {
                    throw new MalformedHistoryError(`activity ${activityId} rescheduled out of order`);
                }
                existing.attempt = attempt;
                existing.scheduled = event.payload;
                return;
            }
            case 'ActivityCompleted':
                this.requireOpenActivity(event.payload.activityId).outcome = { kind: 'completed', result: event.payload.result };
                return;
            case 'ActivityFailed':
                this.requireOpenActivity(event.payload.activityId).outcome = { kind: 'failed', failure: event.payload.failure };
                return;
            case 'TimerStarted': {
                const { timerId, durationMs, fireAt } = event.payload;
                if (this.timers.has(timerId)) throw new MalformedHistoryError(`timer ${timerId} started twice`);
                this.timers.set(timerId, { timerId, durationMs, fireAt });
                return;
            }
            case 'TimerFired': {
                const timer = this.timers.get(event.payload.timerId);
                if (!timer || timer.firedAt !== undefined) {
                    throw new MalformedHistoryError(`timer ${event.payload.timerId} fired without a pending start`);
                }
                timer.firedAt = event.payload.firedAt;
                return;
            }
            case 'WorkflowCancelRequested':
                if (!this.cancelRequest) this.cancelRequest = event;
                return;
            case 'WorkflowCompleted':
            case 'WorkflowFailed':
            case 'WorkflowCanceled':
            case 'WorkflowTimedOut':
                this.closedBy = event;
                return;
        }
    }

    private requireOpenActivity(activityId: string): ActivityRecord {
        const record = this.activities.get(activityId);
        if (!record) throw new MalformedHistoryError(`outcome for unscheduled activity ${activityId}`);
        if (record.outcome) throw new MalformedHistoryError(`activity ${activityId} has two outcomes`);
        return record;
    }

    get status(): runStatus {
        return this.closedBy ? closeOutcome(this.closedBy).status : runStatus.RUNNING;
    }

    pendingActivities(): string[] {
        return [...this.activities.values()].filter(a => !a.outcome).map(a => a.activityId);
    }

    pendingTimers(): string[] {
        return [...this.timers.values()].filter(t => t.firedAt === undefined).map(t => t.timerId);
    }
}

export interface CloseOutcome {
    status: runStatus;
    result?: unknown;
    failure?: FailureDetail;
}

export function closeOutcome(event: ClosingEvent): CloseOutcome;
export function closeOutcome(event: NewEvent): CloseOutcome | null;
export function closeOutcome(event: NewEvent): CloseOutcome | null {
    switch (event.kind) {
        case 'WorkflowCompleted':
            return { status: runStatus.COMPLETED, result: event.payload.result };
        case 'WorkflowFailed':
            return { status: runStatus.FAILED, failure: event.payload.failure };
        case 'WorkflowCanceled':
            return { status: runStatus.TERMINATED, failure: { category: 'Cancelled', message: event.payload.reason } };
        case 'WorkflowTimedOut':
            return {
                status: runStatus.TIMED_OUT,
                failure: { category: 'Timeout', message: `workflow exceeded execution timeout of ${event.payload.timeoutMs}ms` },
            };
        default:
            return null;
    }
}
