import { closeOutcome, CLOSED_STATUSES, newEvent, NewEvent, runStatus, WorkflowStartedPayload } from '@keel/sdk';
import { RunClosedError } from '../errors';
import { NewRun, RunRecord } from './types';

export function startedEvent(run: NewRun): NewEvent {
    const payload: WorkflowStartedPayload = {
        workflowId: run.workflowId,
        workflowType: run.workflowType,
        taskQueue: run.taskQueue,
        input: run.input,
    };
    if (run.executionTimeoutMs !== undefined) payload.executionTimeoutMs = run.executionTimeoutMs;
    return newEvent('WorkflowStarted', payload, run.startedAt);
}

export function startedRun(run: NewRun): RunRecord {
    const record: RunRecord = {
        runId: run.runId,
        workflowId: run.workflowId,
        workflowType: run.workflowType,
        taskQueue: run.taskQueue,
        input: run.input,
        status: runStatus.RUNNING,
        version: 1,
        createdAt: run.startedAt,
        updatedAt: run.startedAt,
    };
    if (run.executionTimeoutMs !== undefined) {
        record.executionDeadline = run.startedAt + run.executionTimeoutMs;
    }
    return record;
}

/**
 * Refuses batches the log must never hold: anything after a terminal
 * event, and a second WorkflowStarted.
 */
export function assertAppendable(run: RunRecord, events: NewEvent[]): void {
    if (CLOSED_STATUSES.has(run.status)) {
        throw new RunClosedError(run.runId, run.status);
    }
    let closedBy: runStatus | null = null;
    for (const event of events) {
        if (closedBy) throw new RunClosedError(run.runId, closedBy);
        if (event.kind === 'WorkflowStarted') {
            throw new Error(`Run ${run.runId}: WorkflowStarted can only be written when the run is created`);
        }
        closedBy = closeOutcome(event)?.status ?? null;
    }
}

/** Folds an appended batch into the run projection. */
export function projectRun(run: RunRecord, events: NewEvent[], version: number, now: number): RunRecord {
    const next: RunRecord = { ...run, version, updatedAt: now };
    for (const event of events) {
        const outcome = closeOutcome(event);
        if (!outcome) continue;
        next.status = outcome.status;
        next.closedAt = event.timestamp;
        if (outcome.result !== undefined) next.result = outcome.result;
        if (outcome.failure) next.failure = outcome.failure;
    }
    return next;
}
