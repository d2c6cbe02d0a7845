// public api for @keel/sdk
// usage:
//   import { workflow, activity } from '@keel/sdk';
//   const greet = activity('greet', async (name: string) => `Hello, ${name}!`);
//   export const hello = workflow('hello', async (ctx) => ctx.activity(greet, 'World'));

export * from './types';
export * from './events';
export * from './commands';
export * from './errors';
export { workflow, WorkflowRegistry, globalRegistry, validateName } from './workflow';
export { activity, ActivityRegistry, activityRegistry, validateActivityOptions, validateRetryPolicy } from './activity';
export { replay } from './replay/replayer';
export type { WorkflowState, ReplayResult } from './replay/replayer';
export { HistoryIndex, MalformedHistoryError, closeOutcome } from './replay/history';
export type { ActivityRecord, ActivityOutcome, TimerRecord, CloseOutcome } from './replay/history';
export { serialize, deserialize, clonePayload, SerializationError, PayloadTooLargeError, MAX_PAYLOAD_SIZE } from './utils/serialization';
