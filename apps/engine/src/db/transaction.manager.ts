import { DbPool, Queryable } from './index';

/**
 * Runs a callback inside BEGIN/COMMIT on one pooled connection,
 * rolling back when it throws.
 */
export class TransactionManager {
    constructor(private readonly pool: DbPool) { }

    /**
     * @throws whatever the callback threw, after rollback
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO workflow_events ...');
     *   await client.query('INSERT INTO task_queue ...');
     * });
     */
    async run<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
