import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import path from 'path';
import { WorkflowClient } from '../services/workflow-client';
import { HealthService, Pingable } from './health.service';
import { WorkflowServiceImpl } from './workflow.service';

const PROTO_DIR = path.dirname(require.resolve('@keel/proto/package.json'));

const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

function isNamespace(node: GrpcNode): node is grpc.GrpcObject {
    return typeof node === 'object' && !('format' in node);
}

function isService(node: GrpcNode): node is grpc.ServiceClientConstructor {
    return typeof node === 'function' && 'service' in node;
}

export function lookupService(root: grpc.GrpcObject, qualifiedName: string): grpc.ServiceDefinition {
    let node: GrpcNode = root;
    for (const part of qualifiedName.split('.')) {
        if (!isNamespace(node) || node[part] === undefined) {
            throw new Error(`gRPC service ${qualifiedName} not found in loaded protos`);
        }
        node = node[part];
    }
    if (!isService(node)) {
        throw new Error(`${qualifiedName} is not a gRPC service`);
    }
    return node.service;
}

export function loadProto(file: string): grpc.GrpcObject {
    return grpc.loadPackageDefinition(protoLoader.loadSync(path.join(PROTO_DIR, file), protoOptions));
}

export function createGrpcServer(client: WorkflowClient, store: Pingable): grpc.Server {
    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    const healthService = new HealthService(store);
    server.addService(lookupService(loadProto('health.proto'), 'grpc.health.v1.Health'), {
        check: healthService.check.bind(healthService),
        watch: healthService.watch.bind(healthService),
    });

    const workflowService = new WorkflowServiceImpl(client);
    server.addService(lookupService(loadProto('keel.proto'), 'keel.WorkflowService'), {
        startWorkflow: workflowService.startWorkflow.bind(workflowService),
        getStatus: workflowService.getStatus.bind(workflowService),
        getResult: workflowService.getResult.bind(workflowService),
        cancelWorkflow: workflowService.cancelWorkflow.bind(workflowService),
    });

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(
            `0.0.0.0:${port}`,
            grpc.ServerCredentials.createInsecure(),
            (err, boundPort) => {
                if (err) {
                    reject(err);
                } else {
                    console.log(`[keel] grpc server listening on port ${boundPort}`);
                    resolve(boundPort);
                }
            },
        );
    });
}
