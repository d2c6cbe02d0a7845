export class LeaseExpiredError extends Error {
    constructor(public readonly taskId: string, public readonly leaseId: string) {
        super(`Lease ${leaseId} on task ${taskId} is no longer held`);
        this.name = 'LeaseExpiredError';
    }
}
