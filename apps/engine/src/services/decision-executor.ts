import os from 'os';
import path from 'path';
import Piscina from 'piscina';
import {
    deserialize,
    MalformedHistoryError,
    replay,
    ReplayResult,
    serialize,
    WorkflowEvent,
    WorkflowLookup,
    WorkflowNondeterminismError,
} from '@keel/sdk';
import type { DecisionRequest, DecisionResponse } from '../workers/decision.worker';

const TAG = '[decisions]';

/** Where workflow code is replayed. */
export interface DecisionExecutor {
    decide(history: WorkflowEvent[]): Promise<ReplayResult>;
    /** Decisions waiting for a thread; feeds backpressure */
    readonly queueSize: number;
    destroy(): Promise<void>;
}

/** Replays on the calling thread; used in tests and by the in-memory engine. */
export class InlineDecisionExecutor implements DecisionExecutor {
    readonly queueSize = 0;

    constructor(private readonly workflows: WorkflowLookup) { }

    decide(history: WorkflowEvent[]): Promise<ReplayResult> {
        return replay(history, this.workflows);
    }

    async destroy(): Promise<void> {
        return;
    }
}

export interface ThreadedDecisionOptions {
    maxThreads?: number;
    workflowModules: string[];
}

function isDecisionResponse(value: unknown): value is DecisionResponse {
    return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

// Errors cross the thread boundary as name + message; the ones the
// orchestrator reacts to are rebuilt with their own class.
export function rebuildError(error: { name: string; message: string }): Error {
    switch (error.name) {
        case 'WorkflowNondeterminismError':
            return new WorkflowNondeterminismError(error.message);
        case 'MalformedHistoryError':
            return new MalformedHistoryError(error.message);
        default: {
            const rebuilt = new Error(error.message);
            rebuilt.name = error.name;
            return rebuilt;
        }
    }
}

export function unwrapDecision(value: unknown): ReplayResult {
    if (!isDecisionResponse(value)) {
        throw new Error('decision worker returned an unexpected response');
    }
    if (!value.ok) throw rebuildError(value.error);

    const result = deserialize<ReplayResult>(value.result);
    if (!result) throw new Error('decision worker returned an empty result');
    return result;
}

/**
 * Replays on a piscina pool so a CPU-heavy workflow cannot stall the poller
 * and heartbeats. Each thread loads the workflow modules itself.
 */
export class ThreadedDecisionExecutor implements DecisionExecutor {
    private readonly pool: Piscina;

    constructor(options: ThreadedDecisionOptions) {
        const isTs = path.extname(__filename) === '.ts';
        const workerPath = path.resolve(__dirname, `../workers/decision.worker${isTs ? '.ts' : '.js'}`);
        const maxThreads = options.maxThreads ?? Math.max(2, os.cpus().length - 1);

        this.pool = new Piscina({
            filename: workerPath,
            execArgv: isTs ? ['--import', 'tsx'] : [],
            maxThreads,
            minThreads: 1,
            maxQueue: 10000,
            idleTimeout: 30000,
            env: {
                ...process.env,
                KEEL_WORKFLOWS: options.workflowModules.join(','),
            },
        });

        console.log(`${TAG} piscina pool: ${maxThreads} threads, maxQueue=10000`);
    }

    async decide(history: WorkflowEvent[]): Promise<ReplayResult> {
        const request: DecisionRequest = { history: serialize(history, Number.MAX_SAFE_INTEGER) };
        const response: unknown = await this.pool.run(request);
        return unwrapDecision(response);
    }

    get queueSize(): number {
        return this.pool.queueSize;
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
    }
}
