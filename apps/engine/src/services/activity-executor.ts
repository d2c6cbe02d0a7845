import { ActivityContext, ActivityDefinition, ActivityScheduledPayload, FailureDetail, toFailureDetail } from '@keel/sdk';
import { TaskPayloads } from '../store/types';
import { TIMEOUT_CATEGORY } from './retry-policy';

export type AttemptOutcome =
    | { ok: true; result: unknown }
    | { ok: false; failure: FailureDetail };

export interface ActivityLookup {
    get(name: string): ActivityDefinition | undefined;
}

interface Deadline {
    ms: number;
    kind: 'start-to-close' | 'schedule-to-close';
}

function attemptDeadline(scheduled: ActivityScheduledPayload, now: number): Deadline {
    const startToClose: Deadline = { ms: scheduled.startToCloseTimeoutMs, kind: 'start-to-close' };
    if (scheduled.scheduleToCloseTimeoutMs === undefined) return startToClose;

    const remaining = scheduled.firstScheduledAt + scheduled.scheduleToCloseTimeoutMs - now;
    return remaining < startToClose.ms ? { ms: remaining, kind: 'schedule-to-close' } : startToClose;
}

function timeoutFailure(activityType: string, kind: string, ms: number): FailureDetail {
    return {
        category: TIMEOUT_CATEGORY,
        message: `Activity ${activityType} exceeded its ${kind} timeout of ${ms}ms`,
        nonRetryable: true,
    };
}

/**
 * Runs one attempt of an activity handler. The attempt is bounded by its
 * start-to-close timeout, clipped to whatever the schedule-to-close budget
 * has left; when the bound passes the handler's signal is aborted and the
 * attempt resolves as a Timeout. A missed heartbeat deadline resolves as a
 * retryable HeartbeatTimeout.
 */
export class ActivityExecutor {
    constructor(
        private readonly activities: ActivityLookup,
        private readonly now: () => number = Date.now,
    ) { }

    async execute(
        task: TaskPayloads['activity'],
        scheduled: ActivityScheduledPayload,
        taskQueue: string,
    ): Promise<AttemptOutcome> {
        const definition = this.activities.get(task.activityType);
        if (!definition) {
            return {
                ok: false,
                failure: {
                    category: 'ActivityTypeNotFound',
                    message: `Activity "${task.activityType}" is not registered on this worker`,
                    nonRetryable: true,
                },
            };
        }

        const deadline = attemptDeadline(scheduled, this.now());
        if (deadline.ms <= 0) {
            return { ok: false, failure: timeoutFailure(task.activityType, deadline.kind, scheduled.scheduleToCloseTimeoutMs ?? 0) };
        }

        const controller = new AbortController();
        const timers: { deadline?: NodeJS.Timeout; heartbeat?: NodeJS.Timeout } = {};
        let settle: (outcome: AttemptOutcome) => void = () => undefined;
        let done = false;
        const expired = new Promise<AttemptOutcome>(resolve => {
            settle = resolve;
        });

        const fail = (failure: FailureDetail) => {
            controller.abort(new Error(failure.message));
            settle({ ok: false, failure });
        };
        timers.deadline = setTimeout(() => fail(timeoutFailure(task.activityType, deadline.kind, deadline.ms)), deadline.ms);

        const heartbeatTimeoutMs = scheduled.heartbeatTimeoutMs;
        const armHeartbeat = () => {
            // a handler may keep heartbeating after its attempt has settled
            if (done || heartbeatTimeoutMs === undefined || controller.signal.aborted) return;
            clearTimeout(timers.heartbeat);
            timers.heartbeat = setTimeout(() => fail({
                category: 'HeartbeatTimeout',
                message: `Activity ${task.activityType} sent no heartbeat for ${heartbeatTimeoutMs}ms`,
            }), heartbeatTimeoutMs);
        };
        armHeartbeat();

        const ctx: ActivityContext = {
            info: {
                runId: task.runId,
                workflowId: task.workflowId,
                activityId: task.activityId,
                activityType: task.activityType,
                attempt: task.attempt,
                taskQueue,
            },
            signal: controller.signal,
            heartbeat: () => armHeartbeat(),
        };

        const attempt = (async (): Promise<AttemptOutcome> => {
            try {
                return { ok: true, result: await definition.handler(scheduled.input, ctx) };
            } catch (err) {
                return { ok: false, failure: toFailureDetail(err) };
            }
        })();

        try {
            return await Promise.race([attempt, expired]);
        } finally {
            done = true;
            clearTimeout(timers.deadline);
            clearTimeout(timers.heartbeat);
        }
    }
}
