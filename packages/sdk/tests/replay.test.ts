import {
    ActivityRegistry,
    newEvent,
    replay,
    runStatus,
    WorkflowContext,
    WorkflowNondeterminismError,
    WorkflowRegistry,
} from '../src';
import { completed, failed, scheduled, sequenced, started, T0, timerFired, timerStarted } from './helpers/history';

const activities = new ActivityRegistry();
const charge = activities.register('charge', async (amount: number) => amount, {
    startToCloseTimeoutMs: 1000,
    retry: { maximumAttempts: 3 },
});

const workflows = new WorkflowRegistry();

workflows.register('greet-twice', async (ctx: WorkflowContext<{ name: string }>) => {
    const greeting = await ctx.activity<string>('greet', ctx.input.name);
    const loud = await ctx.activity<string>('shout', greeting);
    return `${greeting}|${loud}`;
});

workflows.register('fan-out', async (ctx: WorkflowContext) => {
    return Promise.all([ctx.activity('left', 1), ctx.activity('right', 2)]);
});

workflows.register('nap', async (ctx: WorkflowContext) => {
    await ctx.sleep(5000);
    return ctx.now();
});

workflows.register('pay', async (ctx: WorkflowContext<number>) => {
    return ctx.activity(charge, ctx.input, { activityId: 'payment', retry: { initialIntervalMs: 50 } });
});

workflows.register('bad-options', async (ctx: WorkflowContext) => {
    try {
        await ctx.activity('greet', 'x', { startToCloseTimeoutMs: -1 });
        return 'scheduled';
    } catch (err) {
        return err instanceof Error ? err.message : 'unknown';
    }
});

workflows.register('dice', async (ctx: WorkflowContext) => [ctx.random(), ctx.random()]);

workflows.register('nothing', async () => 'done');

describe('replay', () => {
    test('schedules the first activity of a fresh run', async () => {
        const { state, commands } = await replay(sequenced([started('greet-twice', { name: 'Ada' })]), workflows);

        expect(state.status).toBe(runStatus.RUNNING);
        expect(state.version).toBe(1);
        expect(commands).toEqual([
            { kind: 'ScheduleActivity', activityId: '1', activityType: 'greet', input: 'Ada', options: {} },
        ]);
    });

    test('feeds recorded results back and schedules the next step', async () => {
        const history = sequenced([
            started('greet-twice', { name: 'Ada' }),
            scheduled('1', 'greet', 'Ada'),
            completed('1', 'Hello, Ada'),
        ]);
        const { commands, state } = await replay(history, workflows);

        expect(commands).toEqual([
            { kind: 'ScheduleActivity', activityId: '2', activityType: 'shout', input: 'Hello, Ada', options: {} },
        ]);
        expect(state.pendingActivities).toEqual([]);
    });

    test('completes once every step has a recorded result', async () => {
        const history = sequenced([
            started('greet-twice', { name: 'Ada' }),
            scheduled('1', 'greet', 'Ada'),
            completed('1', 'Hello, Ada'),
            scheduled('2', 'shout', 'Hello, Ada'),
            completed('2', 'HELLO, ADA'),
        ]);
        const { commands } = await replay(history, workflows);
        expect(commands).toEqual([{ kind: 'CompleteWorkflow', result: 'Hello, Ada|HELLO, ADA' }]);
    });

    test('issues nothing while an activity is still in flight', async () => {
        const history = sequenced([started('greet-twice', { name: 'Ada' }), scheduled('1', 'greet', 'Ada')]);
        const { commands, state } = await replay(history, workflows);
        expect(commands).toEqual([]);
        expect(state.pendingActivities).toEqual(['1']);
    });

    test('fails the workflow with the activity failure as cause', async () => {
        const failure = { category: 'Upstream', message: 'boom' };
        const history = sequenced([
            started('greet-twice', { name: 'Ada' }),
            scheduled('1', 'greet', 'Ada'),
            failed('1', failure),
        ]);
        const { commands } = await replay(history, workflows);

        expect(commands).toHaveLength(1);
        const [command] = commands;
        if (command.kind !== 'FailWorkflow') throw new Error(`unexpected ${command.kind}`);
        expect(command.failure.category).toBe('ActivityFailure');
        expect(command.failure.message).toBe('Activity greet (1) failed: boom');
        expect(command.failure.cause).toEqual(failure);
    });

    test('schedules concurrent activities in call order', async () => {
        const { commands } = await replay(sequenced([started('fan-out')]), workflows);
        expect(commands.map(c => c.kind === 'ScheduleActivity' ? c.activityType : c.kind)).toEqual(['left', 'right']);
    });

    test('starts a timer, then advances logical time when it fires', async () => {
        const first = await replay(sequenced([started('nap')]), workflows);
        expect(first.commands).toEqual([{ kind: 'StartTimer', timerId: '1', durationMs: 5000 }]);

        const waiting = await replay(sequenced([started('nap'), timerStarted('1', 5000)]), workflows);
        expect(waiting.commands).toEqual([]);
        expect(waiting.state.pendingTimers).toEqual(['1']);

        const fired = await replay(
            sequenced([started('nap'), timerStarted('1', 5000), timerFired('1', T0 + 5000)]),
            workflows,
        );
        expect(fired.commands).toEqual([{ kind: 'CompleteWorkflow', result: T0 + 5000 }]);
    });

    test('merges call-site options over the activity defaults', async () => {
        const { commands } = await replay(sequenced([started('pay', 42)]), workflows);
        expect(commands).toEqual([{
            kind: 'ScheduleActivity',
            activityId: 'payment',
            activityType: 'charge',
            input: 42,
            options: { startToCloseTimeoutMs: 1000, retry: { maximumAttempts: 3, initialIntervalMs: 50 } },
        }]);
    });

    test('rejects invalid call-site options inside the workflow', async () => {
        const { commands } = await replay(sequenced([started('bad-options')]), workflows);
        expect(commands).toEqual([{
            kind: 'CompleteWorkflow',
            result: 'Activity "greet": startToCloseTimeoutMs must be a positive number of milliseconds',
        }]);
    });

    test('derives random values from the run id', async () => {
        const a = await replay(sequenced([started('dice')], 'run-a'), workflows);
        const again = await replay(sequenced([started('dice')], 'run-a'), workflows);
        const b = await replay(sequenced([started('dice')], 'run-b'), workflows);

        expect(again.commands).toEqual(a.commands);
        expect(b.commands).not.toEqual(a.commands);
    });

    test('answers a cancel request with a Cancelled failure', async () => {
        const history = sequenced([
            started('greet-twice', { name: 'Ada' }),
            scheduled('1', 'greet', 'Ada'),
            newEvent('WorkflowCancelRequested', { reason: 'operator' }, T0),
        ]);
        const { commands, state } = await replay(history, workflows);

        expect(state.cancelRequested).toBe(true);
        expect(commands).toEqual([{ kind: 'FailWorkflow', failure: { category: 'Cancelled', message: 'operator' } }]);
    });

    test('fails runs of unregistered workflow types', async () => {
        const { commands } = await replay(sequenced([started('ghost')]), workflows);
        expect(commands).toEqual([{
            kind: 'FailWorkflow',
            failure: {
                category: 'WorkflowTypeNotFound',
                message: 'Workflow "ghost" is not registered on this worker',
                nonRetryable: true,
            },
        }]);
    });

    test('returns the recorded outcome of a closed run without running code', async () => {
        const history = sequenced([started('greet-twice'), newEvent('WorkflowCompleted', { result: 'cached' }, T0)]);
        const { commands, state } = await replay(history, workflows);

        expect(commands).toEqual([]);
        expect(state.status).toBe(runStatus.COMPLETED);
        expect(state.result).toBe('cached');
    });

    describe('nondeterminism', () => {
        test('detects a different activity type at a recorded position', async () => {
            const history = sequenced([started('greet-twice', { name: 'Ada' }), scheduled('1', 'wave', 'Ada')]);
            await expect(replay(history, workflows)).rejects.toThrow(WorkflowNondeterminismError);
            await expect(replay(history, workflows)).rejects.toThrow('activity 1: history has wave, workflow requested greet');
        });

        test('detects recorded activities the code no longer asks for', async () => {
            const history = sequenced([started('nothing'), scheduled('1', 'greet', 'x')]);
            await expect(replay(history, workflows)).rejects.toThrow('activity 1 is in history but was not requested');
        });

        test('detects a changed timer duration', async () => {
            const history = sequenced([started('nap'), timerStarted('1', 10)]);
            await expect(replay(history, workflows)).rejects.toThrow('timer 1: history has 10ms, workflow requested 5000ms');
        });
    });
});
