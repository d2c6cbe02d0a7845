export * from './types';
export { InMemoryEngineStore, InMemoryEventLog, InMemoryTaskQueue } from './memory.store';
export { PostgresEngineStore, PostgresEventLog } from './postgres.store';
