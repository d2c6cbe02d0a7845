import { NewEvent, runStatus, WorkflowEvent } from '@keel/sdk';
import { DbPool, Queryable } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { AlreadyExistsError, ConcurrencyConflictError, isUniqueViolation, RunNotFoundError } from '../errors';
import { EventRepository } from '../repositories/event.repository';
import { TaskQueueRepository } from '../repositories/task-queue.repository';
import { assertAppendable, projectRun, startedEvent, startedRun } from './projection';
import { EngineStore, EventLog, IdReusePolicy, NewRun, RunRecord, TaskSpec } from './types';

const DEFAULT_PAGE_SIZE = 200;

/** Must run inside a transaction: the run row lock is held until COMMIT. */
async function appendInTransaction(
    client: Queryable,
    runId: string,
    expectedVersion: number,
    events: NewEvent[],
    now: number,
): Promise<number> {
    const repo = new EventRepository(client);
    const run = await repo.lockRun(runId);
    if (!run) throw new RunNotFoundError(runId);
    if (run.version !== expectedVersion) {
        throw new ConcurrencyConflictError(runId, expectedVersion, run.version);
    }
    assertAppendable(run, events);
    if (events.length === 0) return run.version;

    const staged: WorkflowEvent[] = events.map((event, i) => ({ ...event, runId, sequence: expectedVersion + i + 1 }));
    const version = expectedVersion + staged.length;

    try {
        await repo.insertEvents(staged);
    } catch (err) {
        if (isUniqueViolation(err)) throw new ConcurrencyConflictError(runId, expectedVersion, null);
        throw err;
    }
    await repo.updateProjection(projectRun(run, events, version, now));
    return version;
}

async function createRunInTransaction(client: Queryable, run: NewRun, policy: IdReusePolicy): Promise<RunRecord> {
    const repo = new EventRepository(client);
    await repo.lockWorkflowId(run.workflowId);

    if (policy === 'reject_duplicate') {
        const latest = await repo.findLatestByWorkflowId(run.workflowId);
        if (latest?.status === runStatus.RUNNING) {
            throw new AlreadyExistsError(run.workflowId, latest.runId);
        }
    }

    const record = startedRun(run);
    await repo.insertRun(record);
    await repo.insertEvents([{ ...startedEvent(run), runId: run.runId, sequence: 1 }]);
    return record;
}

export class PostgresEventLog implements EventLog {
    private readonly repo: EventRepository;

    constructor(
        pool: DbPool,
        private readonly tx: TransactionManager = new TransactionManager(pool),
        private readonly now: () => number = Date.now,
        private readonly pageSize = DEFAULT_PAGE_SIZE,
    ) {
        this.repo = new EventRepository(pool);
    }

    createRun(run: NewRun, policy: IdReusePolicy): Promise<RunRecord> {
        return this.tx.run(client => createRunInTransaction(client, run, policy));
    }

    append(runId: string, expectedVersion: number, events: NewEvent[]): Promise<number> {
        return this.tx.run(client => appendInTransaction(client, runId, expectedVersion, events, this.now()));
    }

    async *read(runId: string, fromVersion = 0): AsyncGenerator<WorkflowEvent> {
        let cursor = fromVersion;
        for (;;) {
            const page = await this.repo.readPage(runId, cursor, this.pageSize);
            for (const event of page) {
                yield event;
            }
            const last = page[page.length - 1];
            if (!last || page.length < this.pageSize) return;
            cursor = last.sequence;
        }
    }

    getRun(runId: string): Promise<RunRecord | null> {
        return this.repo.findById(runId);
    }

    findLatestRun(workflowId: string): Promise<RunRecord | null> {
        return this.repo.findLatestByWorkflowId(workflowId);
    }

    findExpiredRuns(now: number, limit: number): Promise<RunRecord[]> {
        return this.repo.findExpired(now, limit);
    }
}

/**
 * Event log and task queue over one Postgres database. Events and the tasks
 * they imply are written in one transaction.
 */
export class PostgresEngineStore implements EngineStore {
    readonly events: PostgresEventLog;
    readonly tasks: TaskQueueRepository;
    private readonly tx: TransactionManager;

    constructor(private readonly pool: DbPool, private readonly now: () => number = Date.now) {
        this.tx = new TransactionManager(pool);
        this.events = new PostgresEventLog(pool, this.tx, now);
        this.tasks = new TaskQueueRepository(pool, now);
    }

    startRun(run: NewRun, policy: IdReusePolicy, tasks: TaskSpec[]): Promise<RunRecord> {
        return this.tx.run(async client => {
            const record = await createRunInTransaction(client, run, policy);
            const queue = new TaskQueueRepository(client, this.now);
            for (const task of tasks) await queue.enqueue(task);
            return record;
        });
    }

    commit(runId: string, expectedVersion: number, events: NewEvent[], tasks: TaskSpec[]): Promise<number> {
        return this.tx.run(async client => {
            const version = await appendInTransaction(client, runId, expectedVersion, events, this.now());
            const queue = new TaskQueueRepository(client, this.now);
            for (const task of tasks) await queue.enqueue(task);
            return version;
        });
    }

    async ping(): Promise<void> {
        await this.pool.query('SELECT 1');
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
