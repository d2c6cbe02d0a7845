import { runStatus } from '@keel/sdk';

export class RunNotFoundError extends Error {
    constructor(public readonly id: string) {
        super(`Workflow run ${id} not found`);
        this.name = 'RunNotFoundError';
    }
}

export class RunClosedError extends Error {
    constructor(public readonly runId: string, public readonly status: runStatus) {
        super(`Run ${runId} is already ${status}`);
        this.name = 'RunClosedError';
    }
}

export class AlreadyExistsError extends Error {
    constructor(public readonly workflowId: string, public readonly runId: string) {
        super(`Workflow ${workflowId} already has an open run (${runId})`);
        this.name = 'AlreadyExistsError';
    }
}

export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}
