import { Command } from '../commands';
import { validateActivityOptions } from '../activity';
import { ActivityFailedError } from '../errors';
import {
    ActivityCallOptions,
    ActivityDefinition,
    ActivityOptions,
    WorkflowContext,
    WorkflowInfo,
} from '../types';
import { hashSeed, seededRandom } from '../utils/random';
import { HistoryIndex } from './history';

// Suspends workflow code on an outcome that is not in history yet.
function pending<T>(): Promise<T> {
    return new Promise<T>(() => undefined);
}

function stripActivityId(options: ActivityCallOptions): ActivityOptions {
    const { activityId: _activityId, ...rest } = options;
    return rest;
}

// Call-site options win field by field, retry policy included.
function mergeOptions(defaults: ActivityOptions, overrides: ActivityOptions): ActivityOptions {
    const merged: ActivityOptions = { ...defaults, ...overrides };
    if (defaults.retry || overrides.retry) {
        merged.retry = { ...defaults.retry, ...overrides.retry };
    }
    return merged;
}

/**
 * WorkflowContext backed by a history index. Calls are matched to recorded
 * events in call order; anything without a recorded counterpart becomes a
 * command, and any mismatch is recorded as a divergence.
 */
export class ReplayWorkflowContext<I = unknown> implements WorkflowContext<I> {
    readonly commands: Command[] = [];
    readonly info: WorkflowInfo;
    readonly input: I;
    divergence: string | null = null;

    private activitySeq = 0;
    private timerSeq = 0;
    private readonly requestedActivities = new Set<string>();
    private readonly requestedTimers = new Set<string>();
    private clock: number;
    private readonly rng: () => number;

    constructor(private readonly history: HistoryIndex, input: I) {
        this.input = input;
        this.info = {
            workflowId: history.started.workflowId,
            runId: history.runId,
            workflowType: history.started.workflowType,
            taskQueue: history.started.taskQueue,
            startedAt: history.startedAt,
        };
        this.clock = history.startedAt;
        this.rng = seededRandom(hashSeed(history.runId));
    }

    activity<AI, AO>(definition: ActivityDefinition<AI, AO>, input: AI, options?: ActivityCallOptions): Promise<AO>;
    activity<AO = unknown>(activityType: string, input?: unknown, options?: ActivityCallOptions): Promise<AO>;
    activity(target: string | ActivityDefinition, input?: unknown, options: ActivityCallOptions = {}): Promise<unknown> {
        const activityType = typeof target === 'string' ? target : target.name;
        const seq = ++this.activitySeq;
        const activityId = options.activityId ?? String(seq);

        if (this.requestedActivities.has(activityId)) {
            return Promise.reject(new Error(`Activity id "${activityId}" is already used in this run`));
        }
        this.requestedActivities.add(activityId);

        const record = this.history.activities.get(activityId);
        if (!record) {
            const merged = mergeOptions(typeof target === 'string' ? {} : target.options, stripActivityId(options));
            try {
                validateActivityOptions(activityType, merged);
            } catch (err) {
                return Promise.reject(err);
            }
            this.commands.push({ kind: 'ScheduleActivity', activityId, activityType, input, options: merged });
            return pending();
        }

        if (record.activityType !== activityType) {
            this.diverge(`activity ${activityId}: history has ${record.activityType}, workflow requested ${activityType}`);
            return pending();
        }
        if (!record.outcome) return pending();
        if (record.outcome.kind === 'completed') return Promise.resolve(record.outcome.result);
        return Promise.reject(new ActivityFailedError(activityId, activityType, record.outcome.failure));
    }

    sleep(durationMs: number): Promise<void> {
        if (!Number.isFinite(durationMs) || durationMs < 0) {
            return Promise.reject(new Error(`sleep duration must be a non-negative number, got ${durationMs}`));
        }
        if (durationMs === 0) return Promise.resolve();

        const timerId = String(++this.timerSeq);
        this.requestedTimers.add(timerId);

        const record = this.history.timers.get(timerId);
        if (!record) {
            this.commands.push({ kind: 'StartTimer', timerId, durationMs });
            return pending();
        }
        if (record.durationMs !== durationMs) {
            this.diverge(`timer ${timerId}: history has ${record.durationMs}ms, workflow requested ${durationMs}ms`);
            return pending();
        }
        const firedAt = record.firedAt;
        if (firedAt === undefined) return pending();
        return Promise.resolve().then(() => {
            this.clock = Math.max(this.clock, firedAt);
        });
    }

    now(): number {
        return this.clock;
    }

    random(): number {
        return this.rng();
    }

    /** Recorded activities or timers the code never asked for. */
    findUnrequested(): string | null {
        for (const id of this.history.activities.keys()) {
            if (!this.requestedActivities.has(id)) return `activity ${id} is in history but was not requested`;
        }
        for (const id of this.history.timers.keys()) {
            if (!this.requestedTimers.has(id)) return `timer ${id} is in history but was not requested`;
        }
        return null;
    }

    private diverge(reason: string): void {
        if (!this.divergence) this.divergence = reason;
    }
}
