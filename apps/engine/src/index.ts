import 'dotenv/config';
import { Server } from '@grpc/grpc-js';
import { activityRegistry, globalRegistry } from '@keel/sdk';
import { loadConfig } from './config';
import { createPool, createRedis } from './db';
import { createGrpcServer, startGrpcServer } from './grpc/server';
import {
    DecisionExecutor,
    EventLoopMonitor,
    InlineDecisionExecutor,
    LocalRunNotifier,
    Orchestrator,
    Reaper,
    RedisRunNotifier,
    RunNotifier,
    ThreadedDecisionExecutor,
    WorkflowClient,
} from './services';
import { EngineStore, InMemoryEngineStore, PostgresEngineStore } from './store';
import { Worker } from './worker';
import { loadWorkflowModules } from './workflow-loader';

const TAG = '[keel]';
const DRAIN_TIMEOUT_MS = 10_000;

const config = loadConfig();

// Components
let store: EngineStore | null = null;
let notifier: RunNotifier | null = null;
let decisions: DecisionExecutor | null = null;
let grpcServer: Server | null = null;
let reaper: Reaper | null = null;
let worker: Worker | null = null;
let monitor: EventLoopMonitor | null = null;
const closers: (() => Promise<unknown>)[] = [];

function createStore(): EngineStore {
    if (config.storage === 'memory') {
        console.warn(`${TAG} using in-memory storage: nothing survives a restart`);
        return new InMemoryEngineStore();
    }
    const pool = createPool(config.databaseUrl);
    pool.on('error', err => console.error(`${TAG} idle client error:`, err));
    return new PostgresEngineStore(pool);
}

async function createNotifier(): Promise<RunNotifier> {
    if (!config.redisUrl) return new LocalRunNotifier();

    const publisher = createRedis(config.redisUrl);
    const subscriber = createRedis(config.redisUrl);
    closers.push(() => publisher.quit());

    await publisher.ping();
    console.log(`${TAG} redis connected`);

    const redisNotifier = new RedisRunNotifier(publisher, subscriber);
    await redisNotifier.start();
    return redisNotifier;
}

function stopGrpc(server: Server): Promise<void> {
    return new Promise(resolve => {
        server.tryShutdown(err => {
            if (err) {
                console.error(`${TAG} grpc shutdown error:`, err);
                server.forceShutdown();
            }
            resolve();
        });
    });
}

async function main() {
    console.log(`${TAG} starting engine (storage: ${config.storage}, queues: ${config.taskQueues.join(', ')})`);

    if (config.workflowModules.length === 0) {
        console.warn(`${TAG} WARNING: KEEL_WORKFLOWS is not set. No workflows or activities will be registered.`);
    }
    loadWorkflowModules(config.workflowModules);

    store = createStore();
    await store.ping();
    console.log(`${TAG} ${config.storage} store ready`);

    notifier = await createNotifier();

    decisions = config.decisionThreads > 0
        ? new ThreadedDecisionExecutor({ maxThreads: config.decisionThreads, workflowModules: config.workflowModules })
        : new InlineDecisionExecutor(globalRegistry);

    const orchestrator = new Orchestrator(store, activityRegistry, { notifier });
    const client = new WorkflowClient(store, orchestrator, {
        defaultTaskQueue: config.taskQueues[0],
        notifier,
    });

    // gRPC
    grpcServer = createGrpcServer(client, store);
    await startGrpcServer(grpcServer, config.port);

    // Reaper
    reaper = new Reaper(store, orchestrator, { intervalMs: config.reaperInterval });
    reaper.start();

    // Backpressure
    const lagMonitor = new EventLoopMonitor();
    monitor = lagMonitor;
    const decisionQueue = decisions;
    const checkBackpressure = () => {
        const queueSize = decisionQueue.queueSize;
        if (queueSize >= config.maxDecisionQueue) {
            console.warn(`${TAG} [backpressure] Decision queue ${queueSize} >= ${config.maxDecisionQueue}`);
            return true;
        }
        if (lagMonitor.exceeds(config.maxEventLoopLag)) {
            console.warn(`${TAG} [backpressure] Event loop lag ${lagMonitor.lag.toFixed(2)}ms >= ${config.maxEventLoopLag}ms`);
            return true;
        }
        return false;
    };

    worker = new Worker(store, orchestrator, decisions, activityRegistry, {
        taskQueues: config.taskQueues,
        concurrency: config.workerConcurrency,
        visibilityTimeoutMs: config.visibilityTimeout,
        heartbeatIntervalMs: config.heartbeatInterval,
        checkBackpressure,
    });
    worker.start();

    console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
    console.log(`${TAG} ${signal} received, shutting down...`);

    if (worker) await worker.stop(DRAIN_TIMEOUT_MS);
    if (reaper) await reaper.stop();
    if (grpcServer) await stopGrpc(grpcServer);
    if (decisions) await decisions.destroy();
    if (notifier) await notifier.close();
    for (const close of closers) await close();
    if (store) await store.close();
    monitor?.disable();

    console.log(`${TAG} shutdown complete`);
    process.exit(0);
}

function onSignal(signal: string) {
    shutdown(signal).catch(err => {
        console.error(`${TAG} shutdown failed:`, err);
        process.exit(1);
    });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

main().catch((err) => {
    console.error(`${TAG} fatal:`, err);
    process.exit(1);
});
