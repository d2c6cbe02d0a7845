import { sendUnaryData, ServerUnaryCall, ServerWritableStream } from '@grpc/grpc-js';

export interface HealthCheckRequest {
    service: string;
}

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckResponse {
    status: ServingStatus;
}

export interface Pingable {
    ping(): Promise<void>;
}

/**
 * Standard gRPC health check service implementation.
 * Serving while the store answers.
 */
export class HealthService {
    constructor(private readonly store: Pingable) { }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        callback(null, { status: await this.currentStatus() });
    }

    async watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>): Promise<void> {
        call.write({ status: await this.currentStatus() });
        call.end();
    }

    private async currentStatus(): Promise<ServingStatus> {
        try {
            await this.store.ping();
            return 'SERVING';
        } catch (error) {
            console.error('Health check failed:', error);
            return 'NOT_SERVING';
        }
    }
}
