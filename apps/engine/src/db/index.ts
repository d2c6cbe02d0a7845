/**
 * Database connection management for Postgres and Redis.
 * Pools are created by the entry point, never at import time.
 */
import Redis from 'ioredis';
import { Pool, QueryResult, QueryResultRow } from 'pg';

/** The slice of a pg Pool or PoolClient the repositories use */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface DbClient extends Queryable {
    release(): void;
}

export interface DbPool extends Queryable {
    connect(): Promise<DbClient>;
    end(): Promise<void>;
}

/**
 * Postgres connection pool:
 * - max: 20 connections (suitable for moderate load)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string | undefined): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for run-closed pub/sub */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: null });
}
