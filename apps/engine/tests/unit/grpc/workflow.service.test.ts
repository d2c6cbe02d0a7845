import { sendUnaryData, ServerErrorResponse, status, StatusObject } from '@grpc/grpc-js';
import { ActivityRegistry, ApplicationFailure, SerializationError, WorkflowContext, WorkflowRegistry } from '@keel/sdk';
import { AlreadyExistsError, InvalidArgumentError, RunNotFoundError } from '../../../src/errors';
import {
    decodePayload,
    encodePayload,
    StartWorkflowRequest,
    toServiceError,
    WorkflowServiceImpl,
} from '../../../src/grpc/workflow.service';
import { createTestEngine, TestEngine } from '../../helpers/engine';

const activities = new ActivityRegistry();
activities.register('total', async (items: number[]) => items.reduce((sum, n) => sum + n, 0));
activities.register('reject', async () => {
    throw ApplicationFailure.nonRetryable('not allowed', 'Forbidden');
});

const workflows = new WorkflowRegistry();
workflows.register('sum', async (ctx: WorkflowContext<{ items: number[] }>) => ({
    total: await ctx.activity<number>('total', ctx.input.items),
}));
workflows.register('forbidden', async (ctx: WorkflowContext) => ctx.activity('reject'));

interface Captured<T> {
    error: ServerErrorResponse | Partial<StatusObject> | null;
    value?: T | null;
}

type Handler<Req, Res> = (call: { request: Req }, callback: sendUnaryData<Res>) => Promise<void>;

// Runs a handler and captures what it passes to the callback.
async function invoke<Req, Res>(handler: Handler<Req, Res>, request: Req): Promise<Captured<Res>> {
    let captured: Captured<Res> = { error: null };
    await handler({ request }, (error, value) => {
        captured = { error, value };
    });
    return captured;
}

function startRequest(overrides: Partial<StartWorkflowRequest> = {}): StartWorkflowRequest {
    return {
        workflow_type: 'sum',
        input: Buffer.from(JSON.stringify({ items: [1, 2, 3] })),
        workflow_id: 'order-1',
        task_queue: '',
        allow_duplicate: false,
        execution_timeout_ms: '0',
        ...overrides,
    };
}

const json = (bytes: Buffer | undefined): unknown => (bytes && bytes.length > 0 ? JSON.parse(bytes.toString('utf-8')) : undefined);

describe('WorkflowServiceImpl', () => {
    let engine: TestEngine;
    let service: WorkflowServiceImpl;

    beforeEach(() => {
        engine = createTestEngine({ workflows, activities });
        service = new WorkflowServiceImpl(engine.client);
    });

    it('starts a workflow and reports its status', async () => {
        const started = await invoke(service.startWorkflow.bind(service), startRequest());
        expect(started.error).toBeNull();
        expect(started.value?.workflow_id).toBe('order-1');

        const found = await invoke(service.getStatus.bind(service), { workflow_id: 'order-1' });
        expect(found.value).toEqual({
            workflow_id: 'order-1',
            run_id: started.value?.run_id,
            status: 'RUNNING',
            updated_at: String(engine.clock.value),
        });
    });

    it('returns the JSON output of a completed run', async () => {
        await invoke(service.startWorkflow.bind(service), startRequest());
        await engine.drain();

        const result = await invoke(service.getResult.bind(service), { workflow_id: 'order-1', timeout_ms: '0' });
        expect(result.value?.status).toBe('COMPLETED');
        expect(json(result.value?.output)).toEqual({ total: 6 });
        expect(result.value?.failure.length).toBe(0);
    });

    it('returns the failure of a failed run', async () => {
        await invoke(service.startWorkflow.bind(service), startRequest({ workflow_type: 'forbidden', input: Buffer.alloc(0) }));
        await engine.drain();

        const result = await invoke(service.getResult.bind(service), { workflow_id: 'order-1', timeout_ms: '' });
        expect(result.value?.status).toBe('FAILED');
        expect(result.value?.output.length).toBe(0);
        expect(json(result.value?.failure)).toMatchObject({ category: 'ActivityFailure', cause: { category: 'Forbidden' } });
    });

    it('maps a duplicate start to ALREADY_EXISTS', async () => {
        await invoke(service.startWorkflow.bind(service), startRequest());
        const again = await invoke(service.startWorkflow.bind(service), startRequest());
        expect(again.error?.code).toBe(status.ALREADY_EXISTS);

        const allowed = await invoke(service.startWorkflow.bind(service), startRequest({ allow_duplicate: true }));
        expect(allowed.error).toBeNull();
    });

    it('maps bad input to INVALID_ARGUMENT', async () => {
        const badJson = await invoke(service.startWorkflow.bind(service), startRequest({ input: Buffer.from('{oops') }));
        expect(badJson.error?.code).toBe(status.INVALID_ARGUMENT);

        const badTimeout = await invoke(service.startWorkflow.bind(service), startRequest({ execution_timeout_ms: '-5' }));
        expect(badTimeout.error).toEqual({ code: status.INVALID_ARGUMENT, message: 'execution_timeout_ms must be a non-negative integer' });

        const badName = await invoke(service.startWorkflow.bind(service), startRequest({ workflow_type: 'no spaces' }));
        expect(badName.error?.code).toBe(status.INVALID_ARGUMENT);
    });

    it('maps unknown ids to NOT_FOUND', async () => {
        const found = await invoke(service.getStatus.bind(service), { workflow_id: 'missing' });
        expect(found.error).toEqual({ code: status.NOT_FOUND, message: 'Workflow run missing not found' });
    });

    it('cancels an open run', async () => {
        await invoke(service.startWorkflow.bind(service), startRequest());
        const cancelled = await invoke(service.cancelWorkflow.bind(service), { workflow_id: 'order-1', reason: 'test' });
        expect(cancelled.value).toEqual({ accepted: true });

        await engine.drain();
        const found = await invoke(service.getStatus.bind(service), { workflow_id: 'order-1' });
        expect(found.value?.status).toBe('TERMINATED');
    });
});

describe('decodePayload', () => {
    it('treats empty bytes as null', () => {
        expect(decodePayload(Buffer.alloc(0))).toBeNull();
        expect(decodePayload(undefined)).toBeNull();
    });

    it('parses JSON', () => {
        expect(decodePayload(Buffer.from('[1,"a"]'))).toEqual([1, 'a']);
    });
});

describe('encodePayload', () => {
    it('sends undefined as empty bytes', () => {
        expect(encodePayload(undefined).length).toBe(0);
    });

    it('flattens values JSON cannot carry', () => {
        const value = { at: new Date(Date.UTC(2024, 0, 2)), tags: new Set(['a']), totals: new Map([['a', 1]]) };

        expect(encodePayload(value).toString('utf-8')).toBe('{"at":"2024-01-02T00:00:00.000Z","tags":{},"totals":{}}');
    });
});

describe('toServiceError', () => {
    it('maps engine errors to status codes', () => {
        expect(toServiceError(new AlreadyExistsError('wf', 'run')).code).toBe(status.ALREADY_EXISTS);
        expect(toServiceError(new RunNotFoundError('wf')).code).toBe(status.NOT_FOUND);
        expect(toServiceError(new InvalidArgumentError('bad')).code).toBe(status.INVALID_ARGUMENT);
        expect(toServiceError(new SerializationError('too big')).code).toBe(status.INVALID_ARGUMENT);
        expect(toServiceError('weird')).toEqual({ code: status.INTERNAL, message: 'Unknown error' });
    });
});
