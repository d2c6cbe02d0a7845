import { v7 as uuid } from 'uuid';
import { ActivityExecutor, ActivityLookup } from './services/activity-executor';
import { DecisionExecutor } from './services/decision-executor';
import { HeartbeatService } from './services/heartbeat.service';
import { Orchestrator } from './services/orchestrator';
import { Poller } from './services/poller';
import { EngineStore, LeasedTask } from './store/types';
import { TaskRunner } from './task-runner';

const TAG = '[worker]';

export interface WorkerOptions {
    workerId?: string;
    taskQueues: string[];
    /** Tasks executed at once across all queues */
    concurrency?: number;
    visibilityTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    minPollIntervalMs?: number;
    maxPollIntervalMs?: number;
    checkBackpressure?: () => boolean;
    now?: () => number;
}

/**
 * Polls task queues and runs what it leases: decisions through the decision
 * executor, activities through the registered handlers, timers through the
 * orchestrator. Holds nothing durable; killing it only delays work.
 */
export class Worker {
    readonly workerId: string;
    readonly heartbeat: HeartbeatService;
    private readonly runner: TaskRunner;
    private readonly pollers: Poller[];
    private readonly concurrency: number;
    private readonly inFlight = new Set<Promise<void>>();

    constructor(
        store: EngineStore,
        orchestrator: Orchestrator,
        decisions: DecisionExecutor,
        activities: ActivityLookup,
        options: WorkerOptions,
    ) {
        this.workerId = options.workerId ?? `worker-${uuid().slice(-8)}`;
        this.concurrency = options.concurrency ?? 10;
        const visibilityTimeoutMs = options.visibilityTimeoutMs ?? 30_000;

        this.heartbeat = new HeartbeatService(store.tasks, visibilityTimeoutMs, options.heartbeatIntervalMs);
        this.runner = new TaskRunner({
            events: store.events,
            tasks: store.tasks,
            orchestrator,
            decisions,
            activities: new ActivityExecutor(activities, options.now),
            heartbeat: this.heartbeat,
        });

        this.pollers = options.taskQueues.map(queueName => new Poller(store.tasks, {
            workerId: this.workerId,
            queueName,
            visibilityTimeoutMs,
            capacity: () => this.concurrency - this.inFlight.size,
            checkBackpressure: options.checkBackpressure,
            minIntervalMs: options.minPollIntervalMs,
            maxIntervalMs: options.maxPollIntervalMs,
            onTaskReceived: task => this.execute(task),
        }));
    }

    start(): void {
        console.log(`${TAG} ${this.workerId} starting (concurrency: ${this.concurrency})`);
        for (const poller of this.pollers) poller.start();
    }

    get inFlightCount(): number {
        return this.inFlight.size;
    }

    /**
     * Stops leasing new work, waits up to drainTimeoutMs for in-flight tasks,
     * then stops extending leases. Tasks still running after that are
     * redelivered elsewhere once their leases lapse.
     */
    async stop(drainTimeoutMs = 0): Promise<void> {
        await Promise.all(this.pollers.map(poller => poller.stop()));

        if (drainTimeoutMs > 0 && this.inFlight.size > 0) {
            console.log(`${TAG} ${this.workerId} draining ${this.inFlight.size} tasks`);
            let timer: NodeJS.Timeout | undefined;
            const timeout = new Promise<void>(resolve => {
                timer = setTimeout(resolve, drainTimeoutMs);
            });
            await Promise.race([Promise.allSettled([...this.inFlight]), timeout]);
            clearTimeout(timer);
        }

        this.heartbeat.stopAll();
        console.log(`${TAG} ${this.workerId} stopped (${this.inFlight.size} tasks abandoned)`);
    }

    private execute(task: LeasedTask): Promise<void> {
        const running: Promise<void> = this.runner.run(task)
            .catch(err => console.error(`${TAG} ${task.kind} task ${task.taskId} failed:`, err))
            .finally(() => this.inFlight.delete(running));
        this.inFlight.add(running);
        return running;
    }
}
