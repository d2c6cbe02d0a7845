import { runStatus } from '@keel/sdk';
import { LocalRunNotifier, RedisRunNotifier, RUN_CLOSED_CHANNEL } from '../../src/services/run-notifier';
import { FakeRedisBus, FakeSubscriber } from '../helpers/fake-redis';

const closed = { runId: 'run-1', workflowId: 'wf-1', status: runStatus.COMPLETED };

describe('LocalRunNotifier', () => {
    it('wakes waiters for the closed run only', async () => {
        const notifier = new LocalRunNotifier();
        const waiting = notifier.waitForClose('run-1', 1000);
        const other = notifier.waitForClose('run-2', 50);

        await notifier.publish(closed);

        await expect(waiting).resolves.toBe(true);
        await expect(other).resolves.toBe(false);
    });

    it('gives up after the timeout', async () => {
        const notifier = new LocalRunNotifier();
        await expect(notifier.waitForClose('run-1', 20)).resolves.toBe(false);
    });
});

describe('RedisRunNotifier', () => {
    let bus: FakeRedisBus;
    let subscriberA: FakeSubscriber;
    let subscriberB: FakeSubscriber;
    let replicaA: RedisRunNotifier;
    let replicaB: RedisRunNotifier;

    beforeEach(async () => {
        bus = new FakeRedisBus();
        subscriberA = bus.subscriber();
        subscriberB = bus.subscriber();
        replicaA = new RedisRunNotifier(bus, subscriberA);
        replicaB = new RedisRunNotifier(bus, subscriberB);
        await replicaA.start();
        await replicaB.start();
    });

    it('subscribes to the run-closed channel', () => {
        expect([...subscriberA.channels]).toEqual([RUN_CLOSED_CHANNEL]);
    });

    it('fans a close out to every replica', async () => {
        const onA = replicaA.waitForClose('run-1', 1000);
        const onB = replicaB.waitForClose('run-1', 1000);

        await replicaA.publish(closed);

        await expect(onA).resolves.toBe(true);
        await expect(onB).resolves.toBe(true);
    });

    it('drops malformed messages', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const waiting = replicaB.waitForClose('run-1', 30);

        subscriberB.deliver(RUN_CLOSED_CHANNEL, '{not superjson');

        await expect(waiting).resolves.toBe(false);
        expect(error).toHaveBeenCalledTimes(1);
        error.mockRestore();
    });

    it('quits its subscriber connection on close', async () => {
        await replicaA.close();
        expect(subscriberA.quitCalled).toBe(true);
    });
});
