import { Command } from '../commands';
import { toFailureDetail, WorkflowNondeterminismError } from '../errors';
import { WorkflowEvent } from '../events';
import { FailureDetail, runStatus, WorkflowLookup } from '../types';
import { closeOutcome, HistoryIndex } from './history';
import { ReplayWorkflowContext } from './workflow-context';

export interface WorkflowState {
    runId: string;
    workflowId: string;
    workflowType: string;
    status: runStatus;
    result?: unknown;
    failure?: FailureDetail;
    cancelRequested: boolean;
    pendingActivities: string[];
    pendingTimers: string[];
    /** Sequence of the last event folded in, i.e. the version a commit must expect */
    version: number;
}

export interface ReplayResult {
    state: WorkflowState;
    commands: Command[];
}

type Settled =
    | { kind: 'pending' }
    | { kind: 'completed'; value: unknown }
    | { kind: 'failed'; error: unknown };

// Every outcome handed to workflow code is already settled or never settles,
// so one macrotask turn drains all the continuations it can run.
function drainMicrotasks(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

function baseState(index: HistoryIndex): WorkflowState {
    const state: WorkflowState = {
        runId: index.runId,
        workflowId: index.started.workflowId,
        workflowType: index.started.workflowType,
        status: index.status,
        cancelRequested: index.cancelRequest !== null,
        pendingActivities: index.pendingActivities(),
        pendingTimers: index.pendingTimers(),
        version: index.lastSequence,
    };

    if (index.closedBy) {
        const { result, failure } = closeOutcome(index.closedBy);
        if (result !== undefined) state.result = result;
        if (failure) state.failure = failure;
    }
    return state;
}

/**
 * Re-runs workflow code against its recorded history and returns the state
 * it reaches plus the commands it issues beyond what is already recorded.
 *
 * Identical histories always produce identical commands. Activities are never
 * executed here: recorded outcomes are handed back to the code, and anything
 * not yet recorded parks the code on a promise that never settles.
 *
 * @throws WorkflowNondeterminismError when the code asks for something other than what history recorded
 */
export async function replay(history: readonly WorkflowEvent[], workflows: WorkflowLookup): Promise<ReplayResult> {
    const index = HistoryIndex.build(history);
    const state = baseState(index);

    if (index.closedBy) {
        return { state, commands: [] };
    }

    if (index.cancelRequest) {
        return {
            state,
            commands: [{
                kind: 'FailWorkflow',
                failure: { category: 'Cancelled', message: index.cancelRequest.payload.reason || 'cancellation requested' },
            }],
        };
    }

    const definition = workflows.get(index.started.workflowType);
    if (!definition) {
        return {
            state,
            commands: [{
                kind: 'FailWorkflow',
                failure: {
                    category: 'WorkflowTypeNotFound',
                    message: `Workflow "${index.started.workflowType}" is not registered on this worker`,
                    nonRetryable: true,
                },
            }],
        };
    }

    const ctx = new ReplayWorkflowContext(index, index.started.input);
    const run: { settled: Settled } = { settled: { kind: 'pending' } };

    void new Promise<unknown>(resolve => resolve(definition.handler(ctx))).then(
        value => { run.settled = { kind: 'completed', value }; },
        error => { run.settled = { kind: 'failed', error }; },
    );
    await drainMicrotasks();

    const divergence = ctx.divergence ?? ctx.findUnrequested();
    if (divergence) {
        throw new WorkflowNondeterminismError(
            `run ${index.runId} (${index.started.workflowType}) diverged from history: ${divergence}`,
        );
    }

    const commands: Command[] = [...ctx.commands];
    const outcome = run.settled;
    if (outcome.kind === 'completed') {
        commands.push({ kind: 'CompleteWorkflow', result: outcome.value });
    } else if (outcome.kind === 'failed') {
        commands.push({ kind: 'FailWorkflow', failure: toFailureDetail(outcome.error) });
    }

    return { state, commands };
}
