import { LeaseExpiredError } from '../../src/errors';
import { HeartbeatService } from '../../src/services/heartbeat.service';
import { TaskHandle } from '../../src/store/types';
import { sleep } from '../helpers/poll';

const handle = (taskId: string): TaskHandle => ({ taskId, leaseId: `lease-${taskId}` });

describe('HeartbeatService', () => {
    let extendLease: jest.Mock<Promise<void>, [TaskHandle, number]>;
    let heartbeat: HeartbeatService;

    beforeEach(() => {
        extendLease = jest.fn<Promise<void>, [TaskHandle, number]>().mockResolvedValue(undefined);
        heartbeat = new HeartbeatService({ extendLease }, 30_000, 50); // 50ms interval
    });

    afterEach(() => {
        heartbeat.stopAll();
    });

    it('extends the lease of a running task', async () => {
        heartbeat.start(handle('task-1'));
        await sleep(150); // allow ~2-3 ticks

        expect(extendLease).toHaveBeenCalledWith(handle('task-1'), 30_000);
        expect(heartbeat.isRunning('task-1')).toBe(true);
        heartbeat.stop('task-1');
        expect(heartbeat.isRunning('task-1')).toBe(false);
    });

    it('supports multiple concurrent tasks', async () => {
        heartbeat.start(handle('task-1'));
        heartbeat.start(handle('task-2'));
        expect(heartbeat.activeCount).toBe(2);
        await sleep(75);

        heartbeat.stop('task-1');
        extendLease.mockClear();
        await sleep(75);

        // task-1 stops, task-2 continues
        expect(extendLease).not.toHaveBeenCalledWith(handle('task-1'), 30_000);
        expect(extendLease).toHaveBeenCalledWith(handle('task-2'), 30_000);
    });

    it('ignores a second start for the same task', () => {
        heartbeat.start(handle('task-1'));
        heartbeat.start(handle('task-1'));
        expect(heartbeat.activeCount).toBe(1);
    });

    it('stops extending once the lease is lost', async () => {
        extendLease.mockRejectedValue(new LeaseExpiredError('task-1', 'lease-task-1'));
        heartbeat.start(handle('task-1'));
        await sleep(80);

        expect(heartbeat.isRunning('task-1')).toBe(false);
        expect(extendLease).toHaveBeenCalledTimes(1);
    });

    it('keeps trying through transient store errors', async () => {
        extendLease.mockRejectedValue(new Error('connection reset'));
        heartbeat.start(handle('task-1'));
        await sleep(130);

        expect(heartbeat.isRunning('task-1')).toBe(true);
        expect(extendLease.mock.calls.length).toBeGreaterThanOrEqual(2);
    });

    it('stopAll stops everything', async () => {
        heartbeat.start(handle('t1'));
        heartbeat.start(handle('t2'));
        heartbeat.stopAll();

        extendLease.mockClear();
        await sleep(100);
        expect(extendLease).not.toHaveBeenCalled();
        expect(heartbeat.activeCount).toBe(0);
    });
});
