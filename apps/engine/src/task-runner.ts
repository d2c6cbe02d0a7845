import { HistoryIndex } from '@keel/sdk';
import { LeaseExpiredError } from './errors';
import { ActivityExecutor } from './services/activity-executor';
import { DecisionExecutor } from './services/decision-executor';
import { HeartbeatService } from './services/heartbeat.service';
import { Orchestrator } from './services/orchestrator';
import { EventLog, LeasedTask, readHistory, TaskHandle, TaskQueue } from './store/types';

const TAG = '[engine]';

type TaskOf<K extends LeasedTask['kind']> = Extract<LeasedTask, { kind: K }>;

export interface TaskRunnerDeps {
    events: EventLog;
    tasks: TaskQueue;
    orchestrator: Orchestrator;
    decisions: DecisionExecutor;
    activities: ActivityExecutor;
    heartbeat: HeartbeatService;
}

/**
 * Executes one leased task and settles its lease. A task whose processing
 * throws is left leased on purpose: the lease lapses and the task is
 * delivered again.
 */
export class TaskRunner {
    constructor(private readonly deps: TaskRunnerDeps) { }

    async run(task: LeasedTask): Promise<void> {
        this.deps.heartbeat.start(task.handle);
        try {
            switch (task.kind) {
                case 'decision':
                    return await this.runDecision(task);
                case 'activity':
                    return await this.runActivity(task);
                case 'timer':
                    return await this.runTimer(task);
            }
        } finally {
            this.deps.heartbeat.stop(task.taskId);
        }
    }

    private async runDecision(task: TaskOf<'decision'>): Promise<void> {
        const { runId } = task.payload;
        const outcome = await this.deps.orchestrator.runDecision(runId, history => this.deps.decisions.decide(history));

        if (outcome === 'conflict') {
            // another cycle advanced the run; replay again against the newer history
            await this.settle(task.handle, 'nack');
            return;
        }
        if (outcome === 'missing') {
            console.warn(`${TAG} decision task ${task.taskId} references unknown run ${runId}, dropping`);
        }
        await this.settle(task.handle);
    }

    private async runActivity(task: TaskOf<'activity'>): Promise<void> {
        const { payload } = task;
        const label = `${payload.activityType} (${payload.activityId}) attempt ${payload.attempt} of run ${payload.runId}`;

        const history = await readHistory(this.deps.events, payload.runId);
        if (history.length === 0) {
            console.warn(`${TAG} activity task ${task.taskId} references unknown run ${payload.runId}, dropping`);
            await this.settle(task.handle);
            return;
        }

        const index = HistoryIndex.build(history);
        const record = index.activities.get(payload.activityId);
        if (index.closedBy || !record || record.outcome || record.attempt !== payload.attempt) {
            console.log(`${TAG} skipping ${label}: already settled or superseded`);
            await this.settle(task.handle);
            return;
        }

        console.log(`${TAG} running ${label} (delivery ${task.deliveryCount})`);
        const outcome = await this.deps.activities.execute(payload, record.scheduled, task.queueName);

        const recorded = outcome.ok
            ? await this.deps.orchestrator.recordActivityCompleted(payload, outcome.result)
            : await this.deps.orchestrator.recordActivityFailure(payload, outcome.failure);
        if (recorded !== 'recorded') {
            console.log(`${TAG} outcome of ${label} discarded (${recorded})`);
        }
        await this.settle(task.handle);
    }

    private async runTimer(task: TaskOf<'timer'>): Promise<void> {
        await this.deps.orchestrator.fireTimer(task.payload);
        await this.settle(task.handle);
    }

    private async settle(handle: TaskHandle, how: 'ack' | 'nack' = 'ack'): Promise<void> {
        try {
            if (how === 'ack') await this.deps.tasks.ack(handle);
            else await this.deps.tasks.nack(handle);
        } catch (err) {
            if (!(err instanceof LeaseExpiredError)) throw err;
            // the task was redelivered meanwhile; whatever this worker recorded is deduplicated by history
            console.warn(`${TAG} WorkerLeaseExpired: ${err.message}`);
        }
    }
}
