import { sendUnaryData, ServerUnaryCall, status } from '@grpc/grpc-js';
import { runStatus, SerializationError } from '@keel/sdk';
import { AlreadyExistsError, InvalidArgumentError, RunNotFoundError } from '../errors';
import { WorkflowClient } from '../services/workflow-client';

const TAG = '[WorkflowService]';

type StatusName = 'WORKFLOW_STATUS_UNSPECIFIED' | runStatus;

// Shapes as produced by proto-loader with keepCase, longs as strings and enums as names.
export interface StartWorkflowRequest {
    workflow_type: string;
    input: Buffer;
    workflow_id: string;
    task_queue: string;
    allow_duplicate: boolean;
    execution_timeout_ms: string;
}

export interface StartWorkflowResponse {
    workflow_id: string;
    run_id: string;
}

export interface GetStatusRequest {
    workflow_id: string;
}

export interface GetStatusResponse {
    workflow_id: string;
    run_id: string;
    status: StatusName;
    updated_at: string;
}

export interface GetResultRequest {
    workflow_id: string;
    timeout_ms: string;
}

export interface GetResultResponse {
    status: StatusName;
    output: Buffer;
    failure: Buffer;
}

export interface CancelWorkflowRequest {
    workflow_id: string;
    reason: string;
}

export interface CancelWorkflowResponse {
    accepted: boolean;
}

type Call<Req, Res> = Pick<ServerUnaryCall<Req, Res>, 'request'>;

export function decodePayload(bytes: Buffer | undefined): unknown {
    if (!bytes || bytes.length === 0) return null;
    try {
        const value: unknown = JSON.parse(bytes.toString('utf-8'));
        return value;
    } catch (err) {
        throw new InvalidArgumentError(`input is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
}

// Plain JSON: a Date leaves as its ISO string, and a Map or Set as {}.
export function encodePayload(value: unknown): Buffer {
    if (value === undefined) return Buffer.alloc(0);
    return Buffer.from(JSON.stringify(value));
}

function parseMillis(field: string, raw: string): number | undefined {
    const value = Number(raw || '0');
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new InvalidArgumentError(`${field} must be a non-negative integer`);
    }
    return value === 0 ? undefined : value;
}

export function toServiceError(err: unknown): { code: status; message: string } {
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (err instanceof AlreadyExistsError) return { code: status.ALREADY_EXISTS, message };
    if (err instanceof RunNotFoundError) return { code: status.NOT_FOUND, message };
    if (err instanceof InvalidArgumentError || err instanceof SerializationError) {
        return { code: status.INVALID_ARGUMENT, message };
    }
    return { code: status.INTERNAL, message };
}

/**
 * gRPC face of the workflow client. Inputs, results and failures travel as
 * JSON bytes; empty input bytes mean null.
 */
export class WorkflowServiceImpl {
    constructor(private readonly client: WorkflowClient) { }

    async startWorkflow(
        call: Call<StartWorkflowRequest, StartWorkflowResponse>,
        callback: sendUnaryData<StartWorkflowResponse>,
    ): Promise<void> {
        try {
            const req = call.request;
            const started = await this.client.startWorkflow(req.workflow_type, decodePayload(req.input), {
                workflowId: req.workflow_id || undefined,
                taskQueue: req.task_queue || undefined,
                idReusePolicy: req.allow_duplicate ? 'allow_duplicate' : 'reject_duplicate',
                executionTimeoutMs: parseMillis('execution_timeout_ms', req.execution_timeout_ms),
            });
            callback(null, { workflow_id: started.workflowId, run_id: started.runId });
        } catch (error) {
            this.fail('startWorkflow', error, callback);
        }
    }

    async getStatus(
        call: Call<GetStatusRequest, GetStatusResponse>,
        callback: sendUnaryData<GetStatusResponse>,
    ): Promise<void> {
        try {
            const found = await this.client.getStatus(call.request.workflow_id);
            callback(null, {
                workflow_id: found.workflowId,
                run_id: found.runId,
                status: found.status,
                updated_at: String(found.updatedAt),
            });
        } catch (error) {
            this.fail('getStatus', error, callback);
        }
    }

    async getResult(
        call: Call<GetResultRequest, GetResultResponse>,
        callback: sendUnaryData<GetResultResponse>,
    ): Promise<void> {
        try {
            const { workflow_id, timeout_ms } = call.request;
            const outcome = await this.client.getResult(workflow_id, {
                timeoutMs: parseMillis('timeout_ms', timeout_ms),
            });

            let output: Buffer = Buffer.alloc(0);
            let failure: Buffer = Buffer.alloc(0);
            if (outcome.status === runStatus.COMPLETED) {
                output = encodePayload(outcome.result);
            } else if (outcome.status !== runStatus.RUNNING) {
                failure = encodePayload(outcome.failure);
            }
            callback(null, { status: outcome.status, output, failure });
        } catch (error) {
            this.fail('getResult', error, callback);
        }
    }

    async cancelWorkflow(
        call: Call<CancelWorkflowRequest, CancelWorkflowResponse>,
        callback: sendUnaryData<CancelWorkflowResponse>,
    ): Promise<void> {
        try {
            const accepted = await this.client.cancelWorkflow(call.request.workflow_id, call.request.reason);
            callback(null, { accepted });
        } catch (error) {
            this.fail('cancelWorkflow', error, callback);
        }
    }

    private fail<T>(method: string, error: unknown, callback: sendUnaryData<T>): void {
        const serviceError = toServiceError(error);
        if (serviceError.code === status.INTERNAL) {
            console.error(`${TAG} ${method} error:`, error);
        }
        callback(serviceError);
    }
}
