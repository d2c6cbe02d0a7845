export { ConcurrencyConflictError } from './concurrency-conflict.error';
export { LeaseExpiredError } from './lease-expired.error';
export { RunNotFoundError, RunClosedError, AlreadyExistsError, InvalidArgumentError } from './run.errors';

export function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}
