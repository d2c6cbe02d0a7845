import {
    ActivityOptions,
    ActivityScheduledPayload,
    closeOutcome,
    Command,
    FailureDetail,
    HistoryIndex,
    isTerminalCommand,
    MAX_PAYLOAD_SIZE,
    newEvent,
    NewEvent,
    PayloadTooLargeError,
    ReplayResult,
    serialize,
    SerializationError,
    WorkflowEvent,
    WorkflowNondeterminismError,
} from '@keel/sdk';
import { ConcurrencyConflictError, RunClosedError, RunNotFoundError } from '../errors';
import { EngineStore, IdReusePolicy, NewRun, readHistory, RunRecord, TaskPayloads, TaskSpec } from '../store/types';
import { decideRetry, resolveActivityOptions } from './retry-policy';
import { RunNotifier } from './run-notifier';

const TAG = '[orchestrator]';
const DEFAULT_MAX_APPEND_ATTEMPTS = 5;
// the log adds a run id and sequence to every stored event
const ENVELOPE_BYTES = 1024;

export type Decide = (history: WorkflowEvent[]) => Promise<ReplayResult>;

export type DecisionOutcome = 'committed' | 'noop' | 'conflict' | 'closed' | 'missing';

/** skipped: the change was already recorded or superseded; closed: the run had already finished */
export type RecordOutcome = 'recorded' | 'skipped' | 'closed';

export interface ActivityDefaults {
    get(name: string): { readonly options: ActivityOptions } | undefined;
}

export interface OrchestratorOptions {
    now?: () => number;
    random?: () => number;
    notifier?: RunNotifier;
    maxAppendAttempts?: number;
}

interface Change {
    events: NewEvent[];
    tasks: TaskSpec[];
}

/** Returns why an event cannot be stored, or null when it fits. */
function unstorable(event: NewEvent): FailureDetail | null {
    try {
        serialize(event, MAX_PAYLOAD_SIZE - ENVELOPE_BYTES);
        return null;
    } catch (err) {
        if (!(err instanceof SerializationError)) throw err;
        return {
            category: err instanceof PayloadTooLargeError ? 'PayloadTooLarge' : 'SerializationFailed',
            message: err.message,
            nonRetryable: true,
        };
    }
}

function decisionTask(index: HistoryIndex): TaskSpec {
    return {
        kind: 'decision',
        queueName: index.started.taskQueue,
        payload: { runId: index.runId, workflowId: index.started.workflowId },
    };
}

/**
 * Turns decisions and activity outcomes into appended events plus the tasks
 * they imply. Holds no state between calls: every operation re-reads the
 * run's history and commits against the version it read.
 */
export class Orchestrator {
    private readonly now: () => number;
    private readonly random: () => number;
    private readonly notifier?: RunNotifier;
    private readonly maxAppendAttempts: number;

    constructor(
        private readonly store: EngineStore,
        private readonly activities: ActivityDefaults,
        options: OrchestratorOptions = {},
    ) {
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
        this.notifier = options.notifier;
        this.maxAppendAttempts = options.maxAppendAttempts ?? DEFAULT_MAX_APPEND_ATTEMPTS;
    }

    async startWorkflow(run: NewRun, policy: IdReusePolicy): Promise<RunRecord> {
        const task: TaskSpec = {
            kind: 'decision',
            queueName: run.taskQueue,
            payload: { runId: run.runId, workflowId: run.workflowId },
        };
        const record = await this.store.startRun(run, policy, [task]);
        console.log(`${TAG} started run ${run.runId} (${run.workflowType}, workflow ${run.workflowId})`);
        return record;
    }

    /**
     * One decision cycle: replay the full history, translate the commands and
     * commit them at the version that was read. A conflict means another cycle
     * advanced the run first; the caller lets the task redeliver.
     */
    async runDecision(runId: string, decide: Decide): Promise<DecisionOutcome> {
        const history = await readHistory(this.store.events, runId);
        if (history.length === 0) return 'missing';

        const index = HistoryIndex.build(history);
        if (index.closedBy) return 'closed';

        const commands = await this.decide(index, history, decide);
        if (commands.length === 0) return 'noop';

        const change = this.storable(this.translate(index, commands));
        try {
            await this.store.commit(runId, index.lastSequence, change.events, change.tasks);
        } catch (err) {
            if (err instanceof ConcurrencyConflictError) {
                console.warn(`${TAG} ${err.message}, discarding decision`);
                return 'conflict';
            }
            if (err instanceof RunClosedError) return 'closed';
            throw err;
        }

        await this.notifyIfClosed(index, change.events);
        return 'committed';
    }

    recordActivityCompleted(task: TaskPayloads['activity'], result: unknown): Promise<RecordOutcome> {
        return this.appendWithRetry(task.runId, index => {
            const record = this.isCurrentAttempt(index, task);
            if (!record) return null;

            const completed = newEvent('ActivityCompleted', { activityId: task.activityId, attempt: task.attempt, result }, this.now());
            const problem = unstorable(completed);
            if (problem) {
                return this.failureChange(index, record.scheduled, task, {
                    ...problem,
                    message: `Result of activity ${task.activityType} (${task.activityId}) cannot be recorded: ${problem.message}`,
                });
            }
            return { events: [completed], tasks: [decisionTask(index)] };
        });
    }

    /** Applies the invocation's frozen retry policy: either a new attempt or a terminal ActivityFailed. */
    recordActivityFailure(task: TaskPayloads['activity'], failure: FailureDetail): Promise<RecordOutcome> {
        return this.appendWithRetry(task.runId, index => {
            const record = this.isCurrentAttempt(index, task);
            if (!record) return null;
            return this.failureChange(index, record.scheduled, task, failure);
        });
    }

    private failureChange(
        index: HistoryIndex,
        scheduled: ActivityScheduledPayload,
        task: TaskPayloads['activity'],
        failure: FailureDetail,
    ): Change {
        const now = this.now();
        const decision = decideRetry({
            attempt: task.attempt,
            failure,
            policy: scheduled.retryPolicy,
            firstScheduledAt: scheduled.firstScheduledAt,
            scheduleToCloseTimeoutMs: scheduled.scheduleToCloseTimeoutMs,
            now,
            random: this.random,
        });

        if (decision.retry) {
            console.log(
                `${TAG} activity ${task.activityType} (${task.activityId}) attempt ${task.attempt} failed: ${failure.message}, ` +
                `retrying in ${decision.delayMs}ms`,
            );
            const next: ActivityScheduledPayload = { ...scheduled, attempt: decision.nextAttempt, lastFailure: failure };
            return {
                events: [newEvent('ActivityScheduled', next, now)],
                tasks: [{
                    kind: 'activity',
                    queueName: scheduled.taskQueue,
                    delayMs: decision.delayMs,
                    payload: { ...task, attempt: decision.nextAttempt },
                }],
            };
        }

        console.log(
            `${TAG} activity ${task.activityType} (${task.activityId}) failed terminally after attempt ${task.attempt} ` +
            `(${decision.reason}): ${decision.failure.message}`,
        );
        return {
            events: [newEvent('ActivityFailed', { activityId: task.activityId, attempt: task.attempt, failure: decision.failure }, now)],
            tasks: [decisionTask(index)],
        };
    }

    fireTimer(task: TaskPayloads['timer']): Promise<RecordOutcome> {
        return this.appendWithRetry(task.runId, index => {
            const timer = index.timers.get(task.timerId);
            if (!timer || timer.firedAt !== undefined) return null;
            const now = this.now();
            return {
                events: [newEvent('TimerFired', { timerId: task.timerId, firedAt: now }, now)],
                tasks: [decisionTask(index)],
            };
        });
    }

    requestCancel(runId: string, reason: string): Promise<RecordOutcome> {
        return this.appendWithRetry(runId, index => {
            if (index.cancelRequest) return null;
            return {
                events: [newEvent('WorkflowCancelRequested', { reason }, this.now())],
                tasks: [decisionTask(index)],
            };
        });
    }

    /** Closes the run as TIMED_OUT when its execution deadline has passed. */
    timeOutRun(runId: string): Promise<RecordOutcome> {
        return this.appendWithRetry(runId, index => {
            const timeoutMs = index.started.executionTimeoutMs;
            const now = this.now();
            if (timeoutMs === undefined || now < index.startedAt + timeoutMs) return null;
            return { events: [newEvent('WorkflowTimedOut', { timeoutMs }, now)], tasks: [] };
        });
    }

    private async decide(index: HistoryIndex, history: WorkflowEvent[], decide: Decide): Promise<Command[]> {
        try {
            const { commands } = await decide(history);
            return commands;
        } catch (err) {
            if (!(err instanceof WorkflowNondeterminismError)) throw err;
            console.error(`${TAG} nondeterminism detected, failing run ${index.runId}: ${err.message}`);
            return [{
                kind: 'FailWorkflow',
                failure: { category: 'Nondeterminism', message: err.message, nonRetryable: true },
            }];
        }
    }

    private translate(index: HistoryIndex, commands: Command[]): Change {
        const now = this.now();
        const { runId } = index;
        const { workflowId, taskQueue } = index.started;

        // once the workflow finishes, anything it scheduled alongside is moot
        const terminal = commands.find(isTerminalCommand);
        if (terminal) {
            if (terminal.kind === 'CompleteWorkflow') {
                return { events: [newEvent('WorkflowCompleted', { result: terminal.result }, now)], tasks: [] };
            }
            if (terminal.failure.category === 'Cancelled' && index.cancelRequest) {
                return { events: [newEvent('WorkflowCanceled', { reason: terminal.failure.message }, now)], tasks: [] };
            }
            return { events: [newEvent('WorkflowFailed', { failure: terminal.failure }, now)], tasks: [] };
        }

        const change: Change = { events: [], tasks: [] };
        for (const command of commands) {
            if (command.kind === 'ScheduleActivity') {
                const options = resolveActivityOptions(
                    this.activities.get(command.activityType)?.options,
                    command.options,
                    taskQueue,
                );
                const payload: ActivityScheduledPayload = {
                    activityId: command.activityId,
                    activityType: command.activityType,
                    input: command.input,
                    attempt: 1,
                    taskQueue: options.taskQueue,
                    retryPolicy: options.retryPolicy,
                    startToCloseTimeoutMs: options.startToCloseTimeoutMs,
                    firstScheduledAt: now,
                };
                if (options.scheduleToCloseTimeoutMs !== undefined) payload.scheduleToCloseTimeoutMs = options.scheduleToCloseTimeoutMs;
                if (options.heartbeatTimeoutMs !== undefined) payload.heartbeatTimeoutMs = options.heartbeatTimeoutMs;

                change.events.push(newEvent('ActivityScheduled', payload, now));
                change.tasks.push({
                    kind: 'activity',
                    queueName: options.taskQueue,
                    payload: { runId, workflowId, activityId: command.activityId, activityType: command.activityType, attempt: 1 },
                });
            } else if (command.kind === 'StartTimer') {
                change.events.push(newEvent('TimerStarted', {
                    timerId: command.timerId,
                    durationMs: command.durationMs,
                    fireAt: now + command.durationMs,
                }, now));
                change.tasks.push({
                    kind: 'timer',
                    queueName: taskQueue,
                    delayMs: command.durationMs,
                    payload: { runId, workflowId, timerId: command.timerId },
                });
            }
        }
        return change;
    }

    // A decision whose events cannot be stored would be retried forever, so
    // it closes the run instead.
    private storable(change: Change): Change {
        for (const event of change.events) {
            const problem = unstorable(event);
            if (!problem) continue;
            console.error(`${TAG} ${event.kind} cannot be recorded, failing run: ${problem.message}`);
            const failure: FailureDetail = { ...problem, message: `${event.kind} event cannot be recorded: ${problem.message}` };
            return { events: [newEvent('WorkflowFailed', { failure }, this.now())], tasks: [] };
        }
        return change;
    }

    private isCurrentAttempt(index: HistoryIndex, task: TaskPayloads['activity']) {
        const record = index.activities.get(task.activityId);
        if (!record || record.outcome || record.attempt !== task.attempt) return null;
        return record;
    }

    // Outcome recording must not be lost to a racing decision, so conflicts
    // re-read the history and try again.
    private async appendWithRetry(runId: string, build: (index: HistoryIndex) => Change | null): Promise<RecordOutcome> {
        for (let attempt = 1; ; attempt++) {
            const history = await readHistory(this.store.events, runId);
            if (history.length === 0) throw new RunNotFoundError(runId);

            const index = HistoryIndex.build(history);
            if (index.closedBy) return 'closed';

            const change = build(index);
            if (!change) return 'skipped';

            try {
                await this.store.commit(runId, index.lastSequence, change.events, change.tasks);
            } catch (err) {
                if (err instanceof ConcurrencyConflictError && attempt < this.maxAppendAttempts) continue;
                if (err instanceof RunClosedError) return 'closed';
                throw err;
            }

            await this.notifyIfClosed(index, change.events);
            return 'recorded';
        }
    }

    private async notifyIfClosed(index: HistoryIndex, events: NewEvent[]): Promise<void> {
        for (const event of events) {
            const outcome = closeOutcome(event);
            if (!outcome) continue;

            console.log(`${TAG} run ${index.runId} closed as ${outcome.status}`);
            if (!this.notifier) return;
            try {
                await this.notifier.publish({ runId: index.runId, workflowId: index.started.workflowId, status: outcome.status });
            } catch (err) {
                console.error(`${TAG} failed to publish close of run ${index.runId}:`, err);
            }
            return;
        }
    }
}
