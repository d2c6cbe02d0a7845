import { FailureDetail } from './types';

/**
 * Raised by activity or workflow code to control how a failure is classified.
 * `category` is matched against a retry policy's nonRetryableErrorTypes.
 */
export class ApplicationFailure extends Error {
    constructor(
        message: string,
        public readonly category: string = 'ApplicationFailure',
        public readonly nonRetryable: boolean = false,
        public readonly details?: unknown,
    ) {
        super(message);
        this.name = 'ApplicationFailure';
    }

    static retryable(message: string, category?: string, details?: unknown): ApplicationFailure {
        return new ApplicationFailure(message, category, false, details);
    }

    static nonRetryable(message: string, category?: string, details?: unknown): ApplicationFailure {
        return new ApplicationFailure(message, category, true, details);
    }
}

/** What workflow code receives when an activity fails terminally. */
export class ActivityFailedError extends Error {
    constructor(
        public readonly activityId: string,
        public readonly activityType: string,
        public readonly failure: FailureDetail,
    ) {
        super(`Activity ${activityType} (${activityId}) failed: ${failure.message}`);
        this.name = 'ActivityFailedError';
    }
}

export class WorkflowNondeterminismError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkflowNondeterminismError';
    }
}

export function toFailureDetail(err: unknown): FailureDetail {
    if (err instanceof ApplicationFailure) {
        const detail: FailureDetail = { category: err.category, message: err.message, stack: err.stack };
        if (err.nonRetryable) detail.nonRetryable = true;
        if (err.details !== undefined) detail.details = err.details;
        return detail;
    }
    if (err instanceof ActivityFailedError) {
        return {
            category: 'ActivityFailure',
            message: err.message,
            details: { activityId: err.activityId, activityType: err.activityType },
            cause: err.failure,
        };
    }
    if (err instanceof Error) {
        return { category: err.name, message: err.message, stack: err.stack };
    }
    return { category: 'Error', message: String(err) };
}
