export { ActivityExecutor } from './activity-executor';
export type { ActivityLookup, AttemptOutcome } from './activity-executor';
export { InlineDecisionExecutor, ThreadedDecisionExecutor } from './decision-executor';
export type { DecisionExecutor } from './decision-executor';
export { EventLoopMonitor } from './event-loop-monitor';
export { HeartbeatService } from './heartbeat.service';
export { Orchestrator } from './orchestrator';
export type { DecisionOutcome, RecordOutcome } from './orchestrator';
export { Poller } from './poller';
export { Reaper } from './reaper';
export type { ReapResult } from './reaper';
export { decideRetry, resolveActivityOptions, resolveRetryPolicy, shouldRetry, DEFAULT_RETRY_POLICY } from './retry-policy';
export { LocalRunNotifier, RedisRunNotifier, RUN_CLOSED_CHANNEL } from './run-notifier';
export type { RunNotifier } from './run-notifier';
export { WorkflowClient } from './workflow-client';
export type { StartWorkflowOptions, WorkflowResult, WorkflowStatus } from './workflow-client';
