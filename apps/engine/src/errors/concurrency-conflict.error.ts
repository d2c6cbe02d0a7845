/**
 * Another writer appended to the run first. Benign: re-read history and decide again.
 */
export class ConcurrencyConflictError extends Error {
    constructor(
        public readonly runId: string,
        public readonly expectedVersion: number,
        public readonly actualVersion: number | null,
    ) {
        super(
            actualVersion === null
                ? `Run ${runId}: append at version ${expectedVersion} lost a race`
                : `Run ${runId}: expected version ${expectedVersion}, log is at ${actualVersion}`,
        );
        this.name = 'ConcurrencyConflictError';
    }
}
