import { ActivityOptions, FailureDetail } from './types';

export interface ScheduleActivityCommand {
    kind: 'ScheduleActivity';
    activityId: string;
    activityType: string;
    input: unknown;
    options: ActivityOptions;
}

export interface StartTimerCommand {
    kind: 'StartTimer';
    timerId: string;
    durationMs: number;
}

export interface CompleteWorkflowCommand {
    kind: 'CompleteWorkflow';
    result: unknown;
}

export interface FailWorkflowCommand {
    kind: 'FailWorkflow';
    failure: FailureDetail;
}

export type Command =
    | ScheduleActivityCommand
    | StartTimerCommand
    | CompleteWorkflowCommand
    | FailWorkflowCommand;

export function isTerminalCommand(command: Command): command is CompleteWorkflowCommand | FailWorkflowCommand {
    return command.kind === 'CompleteWorkflow' || command.kind === 'FailWorkflow';
}
