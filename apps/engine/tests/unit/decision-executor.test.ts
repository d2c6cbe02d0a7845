import {
    globalRegistry,
    MalformedHistoryError,
    newEvent,
    serialize,
    WorkflowContext,
    WorkflowEvent,
    WorkflowNondeterminismError,
    WorkflowRegistry,
} from '@keel/sdk';
import { InlineDecisionExecutor, rebuildError, unwrapDecision } from '../../src/services/decision-executor';
import decide from '../../src/workers/decision.worker';

const T0 = 1_700_000_000_000;

function history(workflowType: string): WorkflowEvent[] {
    const started = newEvent('WorkflowStarted', { workflowId: 'wf-1', workflowType, taskQueue: 'default', input: 'x' }, T0);
    return [{ ...started, runId: 'run-1', sequence: 1 }];
}

globalRegistry.register('threaded-echo', async (ctx: WorkflowContext<string>) => `echo:${ctx.input}`);

describe('InlineDecisionExecutor', () => {
    it('replays against its own registry', async () => {
        const workflows = new WorkflowRegistry();
        workflows.register('local', async () => 42);
        const executor = new InlineDecisionExecutor(workflows);

        const { commands } = await executor.decide(history('local'));
        expect(commands).toEqual([{ kind: 'CompleteWorkflow', result: 42 }]);
        expect(executor.queueSize).toBe(0);
        await executor.destroy();
    });
});

describe('decision worker', () => {
    it('replays a serialized history against the global registry', async () => {
        const response = await decide({ history: serialize(history('threaded-echo')) });
        const result = unwrapDecision(response);

        expect(result.commands).toEqual([{ kind: 'CompleteWorkflow', result: 'echo:x' }]);
        expect(result.state.version).toBe(1);
    });

    it('reports replay errors by name', async () => {
        const broken = history('threaded-echo').map(event => ({ ...event, sequence: 2 }));
        const response = await decide({ history: serialize(broken) });

        expect(response).toEqual({ ok: false, error: { name: 'MalformedHistoryError', message: 'expected sequence 1, got 2' } });
        expect(() => unwrapDecision(response)).toThrow(MalformedHistoryError);
    });
});

describe('unwrapDecision', () => {
    it('rejects responses of the wrong shape', () => {
        expect(() => unwrapDecision(undefined)).toThrow('decision worker returned an unexpected response');
        expect(() => unwrapDecision({ ok: 'yes' })).toThrow('decision worker returned an unexpected response');
        expect(() => unwrapDecision({ ok: true, result: '' })).toThrow('decision worker returned an empty result');
    });
});

describe('rebuildError', () => {
    it('restores the errors the orchestrator reacts to', () => {
        expect(rebuildError({ name: 'WorkflowNondeterminismError', message: 'diverged' })).toBeInstanceOf(WorkflowNondeterminismError);
        expect(rebuildError({ name: 'MalformedHistoryError', message: 'gap' })).toBeInstanceOf(MalformedHistoryError);
    });

    it('keeps the name of anything else', () => {
        const error = rebuildError({ name: 'TypeError', message: 'x is not a function' });
        expect(error.name).toBe('TypeError');
        expect(error.message).toBe('x is not a function');
    });
});
