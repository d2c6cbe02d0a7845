import { clonePayload, NewEvent, runStatus, WorkflowEvent } from '@keel/sdk';
import { v7 as uuid } from 'uuid';
import { AlreadyExistsError, ConcurrencyConflictError, LeaseExpiredError, RunNotFoundError } from '../errors';
import { assertAppendable, projectRun, startedEvent, startedRun } from './projection';
import {
    EngineStore,
    EventLog,
    ExpiredLease,
    IdReusePolicy,
    LeasedTask,
    NewRun,
    RunRecord,
    TaskHandle,
    TaskQueue,
    TaskSpec,
} from './types';

// Hands out detached copies through the storage encoding, so callers see
// exactly what a database round trip would give them.
function copy<T>(value: T): T {
    const cloned = clonePayload(value);
    if (cloned === undefined) throw new Error('value did not survive serialization');
    return cloned;
}

interface RunEntry {
    run: RunRecord;
    events: WorkflowEvent[];
}

export class InMemoryEventLog implements EventLog {
    private readonly runs = new Map<string, RunEntry>();
    private readonly runsByWorkflow = new Map<string, string[]>();

    constructor(
        private readonly now: () => number = Date.now,
        private readonly pageSize = 100,
    ) { }

    async createRun(run: NewRun, policy: IdReusePolicy): Promise<RunRecord> {
        return this.createRunSync(run, policy);
    }

    createRunSync(run: NewRun, policy: IdReusePolicy): RunRecord {
        if (this.runs.has(run.runId)) {
            throw new Error(`Run ${run.runId} already exists`);
        }
        if (policy === 'reject_duplicate') {
            const latest = this.latest(run.workflowId);
            if (latest?.status === runStatus.RUNNING) {
                throw new AlreadyExistsError(run.workflowId, latest.runId);
            }
        }

        const first: WorkflowEvent = { ...copy(startedEvent(run)), runId: run.runId, sequence: 1 };
        const record = copy(startedRun(run));
        this.runs.set(run.runId, { run: record, events: [first] });

        const ids = this.runsByWorkflow.get(run.workflowId) ?? [];
        ids.push(run.runId);
        this.runsByWorkflow.set(run.workflowId, ids);
        return copy(record);
    }

    async append(runId: string, expectedVersion: number, events: NewEvent[]): Promise<number> {
        return this.appendSync(runId, expectedVersion, events);
    }

    appendSync(runId: string, expectedVersion: number, events: NewEvent[]): number {
        const entry = this.runs.get(runId);
        if (!entry) throw new RunNotFoundError(runId);
        if (entry.run.version !== expectedVersion) {
            throw new ConcurrencyConflictError(runId, expectedVersion, entry.run.version);
        }
        assertAppendable(entry.run, events);
        if (events.length === 0) return entry.run.version;

        const staged: WorkflowEvent[] = events.map((event, i) => ({
            ...copy(event),
            runId,
            sequence: expectedVersion + i + 1,
        }));
        const version = expectedVersion + staged.length;

        entry.events.push(...staged);
        entry.run = projectRun(entry.run, events, version, this.now());
        return version;
    }

    async *read(runId: string, fromVersion = 0): AsyncGenerator<WorkflowEvent> {
        let cursor = fromVersion;
        for (;;) {
            const entry = this.runs.get(runId);
            if (!entry) return;

            const page = entry.events.slice(cursor, cursor + this.pageSize);
            for (const event of page) {
                yield copy(event);
            }
            if (page.length < this.pageSize) return;
            cursor += page.length;
        }
    }

    async getRun(runId: string): Promise<RunRecord | null> {
        const entry = this.runs.get(runId);
        return entry ? copy(entry.run) : null;
    }

    async findLatestRun(workflowId: string): Promise<RunRecord | null> {
        const latest = this.latest(workflowId);
        return latest ? copy(latest) : null;
    }

    async findExpiredRuns(now: number, limit: number): Promise<RunRecord[]> {
        return [...this.runs.values()]
            .map(entry => entry.run)
            .filter(run => run.status === runStatus.RUNNING && run.executionDeadline !== undefined && run.executionDeadline <= now)
            .sort((a, b) => (a.executionDeadline ?? 0) - (b.executionDeadline ?? 0))
            .slice(0, limit)
            .map(run => copy(run));
    }

    private latest(workflowId: string): RunRecord | null {
        const ids = this.runsByWorkflow.get(workflowId);
        const last = ids?.[ids.length - 1];
        return last ? this.runs.get(last)?.run ?? null : null;
    }
}

interface QueuedTask {
    spec: TaskSpec;
    taskId: string;
    seq: number;
    createdAt: number;
    visibleAt: number;
    leaseId: string | null;
    leaseExpiresAt: number | null;
    deliveryCount: number;
}

export class InMemoryTaskQueue implements TaskQueue {
    private readonly tasks = new Map<string, QueuedTask>();
    private seq = 0;

    constructor(private readonly now: () => number = Date.now) { }

    async enqueue(task: TaskSpec): Promise<string> {
        return this.enqueueSync(task);
    }

    enqueueSync(task: TaskSpec): string {
        const now = this.now();
        const taskId = uuid();
        this.tasks.set(taskId, {
            spec: copy(task),
            taskId,
            seq: ++this.seq,
            createdAt: now,
            visibleAt: now + (task.delayMs ?? 0),
            leaseId: null,
            leaseExpiresAt: null,
            deliveryCount: 0,
        });
        return taskId;
    }

    async dequeue(queueName: string, visibilityTimeoutMs: number): Promise<LeasedTask | null> {
        const now = this.now();
        let next: QueuedTask | undefined;

        for (const task of this.tasks.values()) {
            if (task.spec.queueName !== queueName || !isAvailable(task, now)) continue;
            if (!next || task.visibleAt < next.visibleAt || (task.visibleAt === next.visibleAt && task.seq < next.seq)) {
                next = task;
            }
        }
        if (!next) return null;

        const leaseId = uuid();
        next.leaseId = leaseId;
        next.leaseExpiresAt = now + visibilityTimeoutMs;
        next.deliveryCount += 1;

        return {
            ...copy(next.spec),
            taskId: next.taskId,
            createdAt: next.createdAt,
            deliveryCount: next.deliveryCount,
            leaseExpiresAt: next.leaseExpiresAt,
            handle: { taskId: next.taskId, leaseId },
        };
    }

    async ack(handle: TaskHandle): Promise<void> {
        this.held(handle);
        this.tasks.delete(handle.taskId);
    }

    async nack(handle: TaskHandle, delayMs = 0): Promise<void> {
        const task = this.held(handle);
        task.leaseId = null;
        task.leaseExpiresAt = null;
        task.visibleAt = this.now() + delayMs;
    }

    async extendLease(handle: TaskHandle, visibilityTimeoutMs: number): Promise<void> {
        this.held(handle).leaseExpiresAt = this.now() + visibilityTimeoutMs;
    }

    async releaseExpired(limit: number): Promise<ExpiredLease[]> {
        const now = this.now();
        const released: ExpiredLease[] = [];

        for (const task of this.tasks.values()) {
            if (released.length >= limit) break;
            if (task.leaseId === null || task.leaseExpiresAt === null || task.leaseExpiresAt > now) continue;

            task.leaseId = null;
            task.leaseExpiresAt = null;
            task.visibleAt = now;
            released.push({
                taskId: task.taskId,
                queueName: task.spec.queueName,
                kind: task.spec.kind,
                deliveryCount: task.deliveryCount,
            });
        }
        return released;
    }

    /** Tasks still in the queue, leased or not. */
    count(queueName?: string): number {
        let total = 0;
        for (const task of this.tasks.values()) {
            if (queueName === undefined || task.spec.queueName === queueName) total += 1;
        }
        return total;
    }

    private held(handle: TaskHandle): QueuedTask {
        const task = this.tasks.get(handle.taskId);
        if (!task || task.leaseId !== handle.leaseId) {
            throw new LeaseExpiredError(handle.taskId, handle.leaseId);
        }
        return task;
    }
}

function isAvailable(task: QueuedTask, now: number): boolean {
    if (task.leaseId === null) return task.visibleAt <= now;
    return task.leaseExpiresAt !== null && task.leaseExpiresAt <= now;
}

/**
 * Single-process store. Every commit runs without yielding, which gives the
 * same all-or-nothing behaviour as a database transaction.
 */
export class InMemoryEngineStore implements EngineStore {
    readonly events: InMemoryEventLog;
    readonly tasks: InMemoryTaskQueue;

    constructor(now: () => number = Date.now) {
        this.events = new InMemoryEventLog(now);
        this.tasks = new InMemoryTaskQueue(now);
    }

    async startRun(run: NewRun, policy: IdReusePolicy, tasks: TaskSpec[]): Promise<RunRecord> {
        const staged = tasks.map(task => copy(task));
        const record = this.events.createRunSync(run, policy);
        for (const task of staged) this.tasks.enqueueSync(task);
        return record;
    }

    async commit(runId: string, expectedVersion: number, events: NewEvent[], tasks: TaskSpec[]): Promise<number> {
        const staged = tasks.map(task => copy(task));
        const version = this.events.appendSync(runId, expectedVersion, events);
        for (const task of staged) this.tasks.enqueueSync(task);
        return version;
    }

    async ping(): Promise<void> {
        return;
    }

    async close(): Promise<void> {
        return;
    }
}
