import { deserialize, serialize } from '@keel/sdk';
import { v7 as uuid } from 'uuid';
import { Queryable } from '../db';
import { TaskQueueRow } from '../db/task_queue.entity';
import { LeaseExpiredError } from '../errors';
import { ExpiredLease, LeasedTask, TaskHandle, TaskKind, TaskQueue, TaskSpec } from '../store/types';

const TASK_KINDS: readonly TaskKind[] = ['decision', 'activity', 'timer'];

function toKind(value: string): TaskKind {
    const kind = TASK_KINDS.find(k => k === value);
    if (!kind) throw new Error(`Unknown task kind "${value}"`);
    return kind;
}

function toLeasedTask(row: TaskQueueRow): LeasedTask {
    const spec = deserialize<TaskSpec>(row.body);
    if (!spec || row.lease_id === null || row.lease_expires_at === null) {
        throw new Error(`Task ${row.task_id} came back from dequeue without a body or lease`);
    }
    return {
        ...spec,
        taskId: row.task_id,
        createdAt: Number(row.created_at),
        deliveryCount: row.delivery_count,
        leaseExpiresAt: Number(row.lease_expires_at),
        handle: { taskId: row.task_id, leaseId: row.lease_id },
    };
}

/**
 * Postgres-backed task queue. A dequeue takes the oldest visible task, or one
 * whose lease has lapsed, under FOR UPDATE SKIP LOCKED so concurrent pollers
 * never lease the same row.
 */
export class TaskQueueRepository implements TaskQueue {
    constructor(
        private readonly db: Queryable,
        private readonly now: () => number = Date.now,
    ) { }

    async enqueue(task: TaskSpec): Promise<string> {
        const now = this.now();
        const taskId = uuid();
        await this.db.query(
            `INSERT INTO task_queue (task_id, queue_name, kind, body, created_at, visible_at)
             VALUES ($1, $2, $3, $4, $5, $6)`,
            [taskId, task.queueName, task.kind, serialize(task), now, now + (task.delayMs ?? 0)],
        );
        return taskId;
    }

    async dequeue(queueName: string, visibilityTimeoutMs: number): Promise<LeasedTask | null> {
        const now = this.now();
        const query = `
            WITH next_task AS (
                SELECT task_id FROM task_queue
                WHERE queue_name = $1
                  AND ((lease_id IS NULL AND visible_at <= $2) OR (lease_id IS NOT NULL AND lease_expires_at <= $2))
                ORDER BY visible_at ASC, created_at ASC
                LIMIT 1
                FOR UPDATE SKIP LOCKED
            )
            UPDATE task_queue
            SET
                lease_id = $3,
                lease_expires_at = $4,
                delivery_count = task_queue.delivery_count + 1
            FROM next_task
            WHERE task_queue.task_id = next_task.task_id
            RETURNING task_queue.*
        `;
        const res = await this.db.query<TaskQueueRow>(query, [queueName, now, uuid(), now + visibilityTimeoutMs]);
        const row = res.rows[0];
        return row ? toLeasedTask(row) : null;
    }

    async ack(handle: TaskHandle): Promise<void> {
        const res = await this.db.query(
            'DELETE FROM task_queue WHERE task_id = $1 AND lease_id = $2',
            [handle.taskId, handle.leaseId],
        );
        this.requireHeld(res.rowCount, handle);
    }

    async nack(handle: TaskHandle, delayMs = 0): Promise<void> {
        const res = await this.db.query(
            `UPDATE task_queue
             SET lease_id = NULL, lease_expires_at = NULL, visible_at = $3
             WHERE task_id = $1 AND lease_id = $2`,
            [handle.taskId, handle.leaseId, this.now() + delayMs],
        );
        this.requireHeld(res.rowCount, handle);
    }

    async extendLease(handle: TaskHandle, visibilityTimeoutMs: number): Promise<void> {
        const res = await this.db.query(
            'UPDATE task_queue SET lease_expires_at = $3 WHERE task_id = $1 AND lease_id = $2',
            [handle.taskId, handle.leaseId, this.now() + visibilityTimeoutMs],
        );
        this.requireHeld(res.rowCount, handle);
    }

    async releaseExpired(limit: number): Promise<ExpiredLease[]> {
        const now = this.now();
        const res = await this.db.query<TaskQueueRow>(
            `WITH expired AS (
                SELECT task_id FROM task_queue
                WHERE lease_id IS NOT NULL AND lease_expires_at <= $1
                ORDER BY lease_expires_at ASC
                LIMIT $2
                FOR UPDATE SKIP LOCKED
            )
            UPDATE task_queue
            SET lease_id = NULL, lease_expires_at = NULL, visible_at = $1
            FROM expired
            WHERE task_queue.task_id = expired.task_id
            RETURNING task_queue.*`,
            [now, limit],
        );
        return res.rows.map(row => ({
            taskId: row.task_id,
            queueName: row.queue_name,
            kind: toKind(row.kind),
            deliveryCount: row.delivery_count,
        }));
    }

    private requireHeld(rowCount: number | null, handle: TaskHandle): void {
        if (!rowCount) throw new LeaseExpiredError(handle.taskId, handle.leaseId);
    }
}
