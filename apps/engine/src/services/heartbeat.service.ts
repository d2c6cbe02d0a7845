import { LeaseExpiredError } from '../errors';
import { TaskHandle, TaskQueue } from '../store/types';

const TAG = '[heartbeat]';

interface Tracked {
    handle: TaskHandle;
    interval: NodeJS.Timeout;
}

/**
 * Keeps the leases of in-flight tasks alive by pushing their visibility
 * deadline forward on every tick. When the worker dies the ticks stop and
 * the lease lapses, which is what makes the task redeliverable.
 */
export class HeartbeatService {
    private readonly tracked = new Map<string, Tracked>();

    constructor(
        private readonly tasks: Pick<TaskQueue, 'extendLease'>,
        private readonly visibilityTimeoutMs: number,
        private readonly intervalMs: number = 5000,
    ) { }

    start(handle: TaskHandle): void {
        if (this.tracked.has(handle.taskId)) {
            console.warn(`${TAG} already running for task ${handle.taskId}`);
            return;
        }
        const interval = setInterval(() => void this.tick(handle), this.intervalMs);
        this.tracked.set(handle.taskId, { handle, interval });
    }

    stop(taskId: string): void {
        const entry = this.tracked.get(taskId);
        if (!entry) return;
        clearInterval(entry.interval);
        this.tracked.delete(taskId);
    }

    stopAll(): void {
        for (const taskId of [...this.tracked.keys()]) {
            this.stop(taskId);
        }
    }

    isRunning(taskId: string): boolean {
        return this.tracked.has(taskId);
    }

    get activeCount(): number {
        return this.tracked.size;
    }

    private async tick(handle: TaskHandle): Promise<void> {
        try {
            await this.tasks.extendLease(handle, this.visibilityTimeoutMs);
        } catch (err) {
            if (err instanceof LeaseExpiredError) {
                // someone else holds the task now; our outcome will be discarded
                console.warn(`${TAG} lease lost for task ${handle.taskId}, no longer extending`);
                this.stop(handle.taskId);
                return;
            }
            console.error(`${TAG} failed to extend lease for task ${handle.taskId}:`, err);
        }
    }
}
