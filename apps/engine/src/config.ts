import { parseList } from './workflow-loader';

export type StorageKind = 'postgres' | 'memory';

export interface EngineConfig {
    port: number;
    storage: StorageKind;
    databaseUrl?: string;
    redisUrl?: string;
    taskQueues: string[];
    workerConcurrency: number;
    /** 0 replays on the main thread */
    decisionThreads: number;
    workflowModules: string[];
    reaperInterval: number;
    heartbeatInterval: number;
    visibilityTimeout: number;
    maxEventLoopLag: number;
    maxDecisionQueue: number;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = parseInt(raw, 10);
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

function storageFromEnv(env: Env): StorageKind {
    const raw = env.KEEL_STORAGE ?? (env.DATABASE_URL ? 'postgres' : 'memory');
    if (raw !== 'postgres' && raw !== 'memory') {
        throw new Error(`KEEL_STORAGE must be "postgres" or "memory", got "${raw}"`);
    }
    return raw;
}

export function loadConfig(env: Env = process.env): EngineConfig {
    const storage = storageFromEnv(env);
    if (storage === 'postgres' && !env.DATABASE_URL) {
        throw new Error('DATABASE_URL is required when KEEL_STORAGE=postgres');
    }

    const taskQueues = parseList(env.KEEL_TASK_QUEUES);
    const heartbeatInterval = intFromEnv(env, 'HEARTBEAT_INTERVAL', 5000);
    const visibilityTimeout = intFromEnv(env, 'VISIBILITY_TIMEOUT', 30_000);
    if (heartbeatInterval >= visibilityTimeout) {
        throw new Error('HEARTBEAT_INTERVAL must be shorter than VISIBILITY_TIMEOUT');
    }

    return {
        port: intFromEnv(env, 'PORT', 50051),
        storage,
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL,
        taskQueues: taskQueues.length > 0 ? taskQueues : ['default'],
        workerConcurrency: Math.max(1, intFromEnv(env, 'KEEL_WORKER_CONCURRENCY', 10)),
        decisionThreads: intFromEnv(env, 'KEEL_DECISION_THREADS', 0),
        workflowModules: parseList(env.KEEL_WORKFLOWS),
        reaperInterval: intFromEnv(env, 'REAPER_INTERVAL', 10_000),
        heartbeatInterval,
        visibilityTimeout,
        maxEventLoopLag: intFromEnv(env, 'MAX_EVENT_LOOP_LAG', 100),
        maxDecisionQueue: intFromEnv(env, 'MAX_QUEUE_SIZE', 1000),
    };
}
