import { deserialize, FailureDetail, runStatus, serialize, WorkflowEvent } from '@keel/sdk';
import { Queryable } from '../db';
import { WorkflowEventRow } from '../db/workflow_events.entity';
import { WorkflowRunRow } from '../db/workflow_runs.entity';
import { RunRecord } from '../store/types';

const RUN_STATUSES: readonly runStatus[] = Object.values(runStatus);

function toStatus(value: string): runStatus {
    const status = RUN_STATUSES.find(s => s === value);
    if (!status) throw new Error(`Unknown run status "${value}"`);
    return status;
}

function toMillis(value: string | null): number | undefined {
    return value === null ? undefined : Number(value);
}

export function toRunRecord(row: WorkflowRunRow): RunRecord {
    const run: RunRecord = {
        runId: row.run_id,
        workflowId: row.workflow_id,
        workflowType: row.workflow_type,
        taskQueue: row.task_queue,
        input: deserialize<unknown>(row.input),
        status: toStatus(row.status),
        version: row.version,
        createdAt: Number(row.created_at),
        updatedAt: Number(row.updated_at),
    };

    const closedAt = toMillis(row.closed_at);
    const deadline = toMillis(row.execution_deadline);
    const result = deserialize<unknown>(row.result);
    const failure = deserialize<FailureDetail>(row.failure);
    if (closedAt !== undefined) run.closedAt = closedAt;
    if (deadline !== undefined) run.executionDeadline = deadline;
    if (result !== undefined) run.result = result;
    if (failure !== undefined) run.failure = failure;
    return run;
}

export function toWorkflowEvent(row: WorkflowEventRow): WorkflowEvent {
    const event = deserialize<WorkflowEvent>(row.body);
    if (!event) throw new Error(`Event ${row.run_id}#${row.sequence} has an empty body`);
    return event;
}

/**
 * SQL for workflow_runs and workflow_events. Callers decide the transaction
 * boundary by handing in either the pool or a client inside BEGIN.
 */
export class EventRepository {
    constructor(private readonly db: Queryable) { }

    async insertRun(run: RunRecord): Promise<void> {
        await this.db.query(
            `INSERT INTO workflow_runs
                (run_id, workflow_id, workflow_type, task_queue, status, version, input, created_at, updated_at, execution_deadline)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
            [
                run.runId,
                run.workflowId,
                run.workflowType,
                run.taskQueue,
                run.status,
                run.version,
                serialize(run.input),
                run.createdAt,
                run.updatedAt,
                run.executionDeadline ?? null,
            ],
        );
    }

    async findById(runId: string): Promise<RunRecord | null> {
        const res = await this.db.query<WorkflowRunRow>('SELECT * FROM workflow_runs WHERE run_id = $1', [runId]);
        const row = res.rows[0];
        return row ? toRunRecord(row) : null;
    }

    /** Row-locks the projection; the lock is what serializes appends to one run. */
    async lockRun(runId: string): Promise<RunRecord | null> {
        const res = await this.db.query<WorkflowRunRow>('SELECT * FROM workflow_runs WHERE run_id = $1 FOR UPDATE', [runId]);
        const row = res.rows[0];
        return row ? toRunRecord(row) : null;
    }

    /** Serializes concurrent starts of the same workflow id until the transaction ends. */
    async lockWorkflowId(workflowId: string): Promise<void> {
        await this.db.query('SELECT pg_advisory_xact_lock(hashtext($1))', [workflowId]);
    }

    async findLatestByWorkflowId(workflowId: string): Promise<RunRecord | null> {
        const res = await this.db.query<WorkflowRunRow>(
            'SELECT * FROM workflow_runs WHERE workflow_id = $1 ORDER BY created_at DESC, run_id DESC LIMIT 1',
            [workflowId],
        );
        const row = res.rows[0];
        return row ? toRunRecord(row) : null;
    }

    async findExpired(now: number, limit: number): Promise<RunRecord[]> {
        const res = await this.db.query<WorkflowRunRow>(
            `SELECT * FROM workflow_runs
             WHERE status = $1 AND execution_deadline IS NOT NULL AND execution_deadline <= $2
             ORDER BY execution_deadline ASC
             LIMIT $3`,
            [runStatus.RUNNING, now, limit],
        );
        return res.rows.map(toRunRecord);
    }

    async updateProjection(run: RunRecord): Promise<void> {
        await this.db.query(
            `UPDATE workflow_runs
             SET status = $1, version = $2, updated_at = $3, closed_at = $4, result = $5, failure = $6
             WHERE run_id = $7`,
            [
                run.status,
                run.version,
                run.updatedAt,
                run.closedAt ?? null,
                run.result === undefined ? null : serialize(run.result),
                run.failure === undefined ? null : serialize(run.failure),
                run.runId,
            ],
        );
    }

    async insertEvents(events: WorkflowEvent[]): Promise<void> {
        if (events.length === 0) return;

        const values: unknown[] = [];
        const tuples = events.map((event, i) => {
            const o = i * 5;
            values.push(event.runId, event.sequence, event.kind, serialize(event), event.timestamp);
            return `($${o + 1}, $${o + 2}, $${o + 3}, $${o + 4}, $${o + 5})`;
        });

        await this.db.query(
            `INSERT INTO workflow_events (run_id, sequence, kind, body, created_at) VALUES ${tuples.join(', ')}`,
            values,
        );
    }

    async readPage(runId: string, afterSequence: number, limit: number): Promise<WorkflowEvent[]> {
        const res = await this.db.query<WorkflowEventRow>(
            `SELECT * FROM workflow_events
             WHERE run_id = $1 AND sequence > $2
             ORDER BY sequence ASC
             LIMIT $3`,
            [runId, afterSequence, limit],
        );
        return res.rows.map(toWorkflowEvent);
    }
}
