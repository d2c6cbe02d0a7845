import { ActivityRegistry, runStatus, WorkflowContext, WorkflowRegistry } from '@keel/sdk';
import { Reaper } from '../../src/services/reaper';
import { createTestEngine, T0, TestEngine, VISIBILITY_TIMEOUT_MS } from '../helpers/engine';

const workflows = new WorkflowRegistry();
workflows.register('wait-forever', async (ctx: WorkflowContext) => {
    await ctx.sleep(3_600_000);
    return 'woke';
});

describe('Reaper', () => {
    let engine: TestEngine;
    let reaper: Reaper;

    beforeEach(() => {
        engine = createTestEngine({ workflows, activities: new ActivityRegistry() });
        reaper = new Reaper(engine.store, engine.orchestrator, { intervalMs: 100, now: engine.clock.now });
    });

    afterEach(async () => {
        await reaper.stop();
    });

    it('returns lapsed leases to the queue', async () => {
        await engine.client.startWorkflow('wait-forever', null, { workflowId: 'wf-1' });
        const task = await engine.lease();
        expect(task?.kind).toBe('decision');

        expect((await reaper.reap()).releasedLeases).toEqual([]);

        engine.clock.advance(VISIBILITY_TIMEOUT_MS);
        const { releasedLeases } = await reaper.reap();
        expect(releasedLeases).toEqual([{ taskId: task?.taskId, queueName: 'default', kind: 'decision', deliveryCount: 1 }]);

        const again = await engine.lease();
        expect(again?.taskId).toBe(task?.taskId);
        expect(again?.deliveryCount).toBe(2);
    });

    it('times out runs past their execution deadline', async () => {
        const { runId } = await engine.client.startWorkflow('wait-forever', null, { workflowId: 'wf-1', executionTimeoutMs: 5000 });
        await engine.drain();

        engine.clock.advance(4999);
        expect((await reaper.reap()).timedOutRuns).toEqual([]);

        engine.clock.advance(1);
        expect((await reaper.reap()).timedOutRuns).toEqual([runId]);

        const result = await engine.client.getResult('wf-1');
        expect(result).toEqual({
            status: runStatus.TIMED_OUT,
            failure: { category: 'Timeout', message: 'workflow exceeded execution timeout of 5000ms' },
        });
        const run = await engine.store.events.getRun(runId);
        expect(run?.closedAt).toBe(T0 + 5000);
    });

    it('leaves closed runs alone', async () => {
        await engine.client.startWorkflow('wait-forever', null, { workflowId: 'wf-1', executionTimeoutMs: 5000 });
        await engine.client.cancelWorkflow('wf-1', 'no longer needed');
        await engine.drain();

        engine.clock.advance(10_000);
        expect((await reaper.reap()).timedOutRuns).toEqual([]);
        expect((await engine.client.getStatus('wf-1')).status).toBe(runStatus.TERMINATED);
    });

    it('runs on an interval once started', async () => {
        const reap = jest.spyOn(reaper, 'reap');
        reaper.start();
        expect(reaper.isRunning()).toBe(true);
        await new Promise(resolve => setTimeout(resolve, 250));
        await reaper.stop();

        expect(reap.mock.calls.length).toBeGreaterThanOrEqual(2);
        expect(reaper.isRunning()).toBe(false);
    });
});
