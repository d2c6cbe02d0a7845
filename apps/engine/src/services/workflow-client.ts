import { CLOSED_STATUSES, FailureDetail, runStatus, validateName, WorkflowEvent } from '@keel/sdk';
import { v7 as uuid } from 'uuid';
import { InvalidArgumentError, RunNotFoundError } from '../errors';
import { EngineStore, IdReusePolicy, readHistory, RunRecord } from '../store/types';
import { Orchestrator } from './orchestrator';
import { RunNotifier } from './run-notifier';

export interface StartWorkflowOptions {
    workflowId?: string;
    taskQueue?: string;
    idReusePolicy?: IdReusePolicy;
    executionTimeoutMs?: number;
}

export interface StartedWorkflow {
    workflowId: string;
    runId: string;
}

export interface WorkflowStatus {
    workflowId: string;
    runId: string;
    status: runStatus;
    updatedAt: number;
}

export type WorkflowResult =
    | { status: runStatus.COMPLETED; result: unknown }
    | { status: runStatus.FAILED | runStatus.TERMINATED | runStatus.TIMED_OUT; failure: FailureDetail }
    | { status: runStatus.RUNNING };

export interface WorkflowClientOptions {
    defaultTaskQueue: string;
    notifier?: RunNotifier;
    /** How often GetResult re-reads the run while it waits */
    pollIntervalMs?: number;
    now?: () => number;
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function checkName(kind: string, name: string): void {
    try {
        validateName(kind, name);
    } catch (err) {
        throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
    }
}

function toResult(run: RunRecord): WorkflowResult {
    switch (run.status) {
        case runStatus.RUNNING:
            return { status: runStatus.RUNNING };
        case runStatus.COMPLETED:
            return { status: runStatus.COMPLETED, result: run.result };
        case runStatus.FAILED:
        case runStatus.TERMINATED:
        case runStatus.TIMED_OUT:
            return {
                status: run.status,
                failure: run.failure ?? { category: 'Unknown', message: `run ${run.runId} closed as ${run.status} without a failure` },
            };
    }
}

/**
 * Submission interface. Every call addresses a workflow id and acts on its
 * most recent run.
 */
export class WorkflowClient {
    private readonly pollIntervalMs: number;
    private readonly now: () => number;

    constructor(
        private readonly store: EngineStore,
        private readonly orchestrator: Orchestrator,
        private readonly options: WorkflowClientOptions,
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 500;
        this.now = options.now ?? Date.now;
    }

    /**
     * @throws AlreadyExistsError when the id has an open run under reject_duplicate (the default)
     * @throws InvalidArgumentError on a malformed name, id or timeout
     */
    async startWorkflow(workflowType: string, input: unknown, options: StartWorkflowOptions = {}): Promise<StartedWorkflow> {
        checkName('Workflow', workflowType);
        const taskQueue = options.taskQueue ?? this.options.defaultTaskQueue;
        checkName('Task queue', taskQueue);

        const workflowId = options.workflowId ?? uuid();
        if (workflowId.trim() === '') {
            throw new InvalidArgumentError('Workflow id cannot be empty');
        }
        const timeout = options.executionTimeoutMs;
        if (timeout !== undefined && (!Number.isFinite(timeout) || timeout <= 0)) {
            throw new InvalidArgumentError('executionTimeoutMs must be a positive number of milliseconds');
        }

        const runId = uuid();
        await this.orchestrator.startWorkflow({
            runId,
            workflowId,
            workflowType,
            taskQueue,
            input,
            executionTimeoutMs: timeout,
            startedAt: this.now(),
        }, options.idReusePolicy ?? 'reject_duplicate');

        return { workflowId, runId };
    }

    async getStatus(workflowId: string): Promise<WorkflowStatus> {
        const run = await this.latestRun(workflowId);
        return { workflowId, runId: run.runId, status: run.status, updatedAt: run.updatedAt };
    }

    /**
     * Without a timeout, answers at once, RUNNING included. With one, waits
     * up to timeoutMs for the run to close.
     */
    async getResult(workflowId: string, options: { timeoutMs?: number } = {}): Promise<WorkflowResult> {
        let run = await this.latestRun(workflowId);
        const timeoutMs = options.timeoutMs ?? 0;
        if (timeoutMs <= 0 || CLOSED_STATUSES.has(run.status)) return toResult(run);

        const deadline = this.now() + timeoutMs;
        while (!CLOSED_STATUSES.has(run.status)) {
            const remaining = deadline - this.now();
            if (remaining <= 0) break;

            const wait = Math.min(remaining, this.pollIntervalMs);
            if (this.options.notifier) {
                await this.options.notifier.waitForClose(run.runId, wait);
            } else {
                await sleep(wait);
            }
            run = await this.requireRun(run.runId);
        }
        return toResult(run);
    }

    /** @returns false when the run had already closed */
    async cancelWorkflow(workflowId: string, reason = ''): Promise<boolean> {
        const run = await this.latestRun(workflowId);
        if (CLOSED_STATUSES.has(run.status)) return false;
        const outcome = await this.orchestrator.requestCancel(run.runId, reason);
        return outcome !== 'closed';
    }

    async getHistory(workflowId: string): Promise<WorkflowEvent[]> {
        const run = await this.latestRun(workflowId);
        return readHistory(this.store.events, run.runId);
    }

    private async latestRun(workflowId: string): Promise<RunRecord> {
        const run = await this.store.events.findLatestRun(workflowId);
        if (!run) throw new RunNotFoundError(workflowId);
        return run;
    }

    private async requireRun(runId: string): Promise<RunRecord> {
        const run = await this.store.events.getRun(runId);
        if (!run) throw new RunNotFoundError(runId);
        return run;
    }
}
