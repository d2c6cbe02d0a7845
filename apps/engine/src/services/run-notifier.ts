import { deserialize, runStatus, serialize } from '@keel/sdk';
import { EventEmitter } from 'events';

const TAG = '[notifier]';

export const RUN_CLOSED_CHANNEL = 'keel:run-closed';

export interface RunClosed {
    runId: string;
    workflowId: string;
    status: runStatus;
}

/** Wakes GetResult callers when a run reaches a terminal state. Best effort: callers also poll. */
export interface RunNotifier {
    publish(event: RunClosed): Promise<void>;
    /** Resolves true when the run closes within timeoutMs, false otherwise. */
    waitForClose(runId: string, timeoutMs: number): Promise<boolean>;
    close(): Promise<void>;
}

function waitOn(emitter: EventEmitter, runId: string, timeoutMs: number): Promise<boolean> {
    return new Promise(resolve => {
        const onClose = () => {
            clearTimeout(timer);
            resolve(true);
        };
        const timer = setTimeout(() => {
            emitter.off(runId, onClose);
            resolve(false);
        }, timeoutMs);
        emitter.once(runId, onClose);
    });
}

export class LocalRunNotifier implements RunNotifier {
    private readonly emitter = new EventEmitter();

    constructor() {
        this.emitter.setMaxListeners(0);
    }

    async publish(event: RunClosed): Promise<void> {
        this.emitter.emit(event.runId, event);
    }

    waitForClose(runId: string, timeoutMs: number): Promise<boolean> {
        return waitOn(this.emitter, runId, timeoutMs);
    }

    async close(): Promise<void> {
        this.emitter.removeAllListeners();
    }
}

/** The ioredis calls used for publishing */
export interface RedisPublisher {
    publish(channel: string, message: string): Promise<number>;
}

/** A connection in subscriber mode; ioredis needs one separate from the publisher */
export interface RedisSubscriber {
    subscribe(channel: string): Promise<unknown>;
    on(event: 'message', listener: (channel: string, message: string) => void): unknown;
    quit(): Promise<unknown>;
}

/** Fans run-closed notifications out to every engine replica over Redis pub/sub. */
export class RedisRunNotifier implements RunNotifier {
    private readonly emitter = new EventEmitter();
    private subscribed = false;

    constructor(
        private readonly publisher: RedisPublisher,
        private readonly subscriber: RedisSubscriber,
    ) {
        this.emitter.setMaxListeners(0);
    }

    async start(): Promise<void> {
        if (this.subscribed) return;
        this.subscriber.on('message', (channel, message) => this.onMessage(channel, message));
        await this.subscriber.subscribe(RUN_CLOSED_CHANNEL);
        this.subscribed = true;
        console.log(`${TAG} subscribed to ${RUN_CLOSED_CHANNEL}`);
    }

    async publish(event: RunClosed): Promise<void> {
        await this.publisher.publish(RUN_CLOSED_CHANNEL, serialize(event));
    }

    waitForClose(runId: string, timeoutMs: number): Promise<boolean> {
        return waitOn(this.emitter, runId, timeoutMs);
    }

    async close(): Promise<void> {
        this.emitter.removeAllListeners();
        await this.subscriber.quit();
    }

    private onMessage(channel: string, message: string): void {
        if (channel !== RUN_CLOSED_CHANNEL) return;
        try {
            const event = deserialize<RunClosed>(message);
            if (event?.runId) this.emitter.emit(event.runId, event);
        } catch (err) {
            console.error(`${TAG} dropping malformed message on ${channel}:`, err);
        }
    }
}
