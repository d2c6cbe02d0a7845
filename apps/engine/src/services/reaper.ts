import { EngineStore, ExpiredLease } from '../store/types';
import { Orchestrator } from './orchestrator';

const TAG = '[reaper]';

export interface ReapResult {
    releasedLeases: ExpiredLease[];
    timedOutRuns: string[];
}

export interface ReaperOptions {
    intervalMs?: number;
    batchSize?: number;
    now?: () => number;
}

// Hands lapsed leases back to the queue and closes runs past their execution
// deadline. Safe to run on every replica at once: lease release skips locked
// rows and timing out a run is an optimistic append like any other.
export class Reaper {
    private readonly intervalMs: number;
    private readonly batchSize: number;
    private readonly now: () => number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly store: EngineStore,
        private readonly orchestrator: Orchestrator,
        options: ReaperOptions = {},
    ) {
        this.intervalMs = options.intervalMs ?? 10_000;
        this.batchSize = options.batchSize ?? 100;
        this.now = options.now ?? Date.now;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);

        // Fire immediately, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => void this.reap(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<ReapResult> {
        const result: ReapResult = { releasedLeases: [], timedOutRuns: [] };
        if (this.isReaping) return result;
        this.isReaping = true;

        try {
            result.releasedLeases = await this.store.tasks.releaseExpired(this.batchSize);
            for (const lease of result.releasedLeases) {
                console.warn(
                    `${TAG} WorkerLeaseExpired: ${lease.kind} task ${lease.taskId} on ${lease.queueName} ` +
                    `(delivery ${lease.deliveryCount}) returned to the queue`,
                );
            }

            const expired = await this.store.events.findExpiredRuns(this.now(), this.batchSize);
            for (const run of expired) {
                const outcome = await this.orchestrator.timeOutRun(run.runId);
                if (outcome === 'recorded') result.timedOutRuns.push(run.runId);
            }

            if (result.timedOutRuns.length > 0) {
                console.log(`${TAG} timed out ${result.timedOutRuns.length} runs: ${result.timedOutRuns.join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return result;
    }
}
