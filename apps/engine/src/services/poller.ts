import { LeasedTask, TaskQueue } from '../store/types';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    queueName: string;
    visibilityTimeoutMs: number;
    onTaskReceived: (task: LeasedTask) => Promise<void>;
    batchSize?: number;
    /** Free execution slots; the poller never leases more than this */
    capacity?: () => number;
    checkBackpressure?: () => boolean;
    minIntervalMs?: number;
    maxIntervalMs?: number;
}

export class Poller {
    private interval: number;
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private readonly batchSize: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly config: PollerConfig;

    constructor(
        private readonly queue: Pick<TaskQueue, 'dequeue'>,
        config: PollerConfig,
    ) {
        this.config = config;
        this.batchSize = config.batchSize || 10;
        this.minInterval = config.minIntervalMs ?? 100;
        this.maxInterval = config.maxIntervalMs ?? 500;
        this.interval = this.minInterval;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started on ${this.config.queueName} (worker: ${this.config.workerId})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped on ${this.config.queueName}`);
    }

    isRunning(): boolean {
        return this.running;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.config.checkBackpressure?.()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            this.schedule(1000);
            return;
        }

        try {
            const room = Math.min(this.batchSize, this.config.capacity?.() ?? this.batchSize);
            let received = 0;

            while (this.running && received < room) {
                const task = await this.queue.dequeue(this.config.queueName, this.config.visibilityTimeoutMs);
                if (!task) break;
                received++;
                this.config.onTaskReceived(task).catch(
                    err => console.error(`${TAG} task ${task.taskId} callback error:`, err),
                );
            }

            // backoff: 100 -> 200 -> 400 -> 500ms cap
            this.interval = received > 0 ? this.minInterval : Math.min(this.interval * 2, this.maxInterval);
        } catch (err) {
            console.error(`${TAG} dequeue error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule(this.interval);
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => void this.poll(), delayMs);
    }
}
