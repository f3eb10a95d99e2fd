import { scheduleNonOverlappingTask } from './scheduler';
import { logger } from '../../utils/logger';

async function flushMicrotasks(): Promise<void> {
    for (let index = 0; index < 5; index += 1) {
        await Promise.resolve();
    }
}

describe('scheduleNonOverlappingTask', () => {
    beforeEach(() => {
        jest.useFakeTimers();
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.runOnlyPendingTimers();
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('keeps the schedule alive after a run throws', async () => {
        let calls = 0;
        const scheduled = scheduleNonOverlappingTask('SyncThrow', 10, () => {
            calls += 1;
            if (calls === 1) {
                throw new Error('boom');
            }
            return Promise.resolve();
        });

        jest.advanceTimersByTime(10);
        await flushMicrotasks();
        expect(calls).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('[SyncThrow] run failed: Error: boom');

        jest.advanceTimersByTime(10);
        await flushMicrotasks();
        expect(calls).toBe(2);
        scheduled.stop();
    });

    it('skips ticks while a run is still in flight', async () => {
        let release: () => void = () => undefined;
        const task = jest.fn(() => new Promise<void>((resolve) => {
            release = resolve;
        }));
        const scheduled = scheduleNonOverlappingTask('Slow', 10, task);

        jest.advanceTimersByTime(10);
        await flushMicrotasks();
        expect(scheduled.isBusy()).toBe(true);

        jest.advanceTimersByTime(30);
        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(1);

        release();
        await flushMicrotasks();
        expect(scheduled.isBusy()).toBe(false);

        jest.advanceTimersByTime(10);
        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(2);
        release();
        scheduled.stop();
    });

    it('runs once up front when asked to', async () => {
        const task = jest.fn(async () => undefined);
        const scheduled = scheduleNonOverlappingTask('Eager', 1000, task, { runImmediately: true });

        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(1);
        scheduled.stop();
    });

    it('uses a safe default interval when input interval is invalid', async () => {
        const task = jest.fn(async () => undefined);
        const scheduled = scheduleNonOverlappingTask('BadInterval', Number.NaN, task);

        jest.advanceTimersByTime(999);
        await flushMicrotasks();
        expect(task).not.toHaveBeenCalled();

        jest.advanceTimersByTime(1);
        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith('[BadInterval] invalid interval "NaN", defaulting to 1000ms');
        scheduled.stop();
    });

    it('returns an idempotent stop that prevents future runs', async () => {
        const task = jest.fn(async () => undefined);
        const scheduled = scheduleNonOverlappingTask('StopTask', 10, task);

        jest.advanceTimersByTime(10);
        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(1);

        scheduled.stop();
        scheduled.stop();
        jest.advanceTimersByTime(100);
        await flushMicrotasks();
        expect(task).toHaveBeenCalledTimes(1);
    });
});
