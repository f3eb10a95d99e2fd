import { logger } from '../../utils/logger';

export type ScheduledTask = {
    stop: () => void;
    // True while a run is in flight.
    isBusy: () => boolean;
};

export type ScheduleOptions = {
    runImmediately?: boolean;
};

/**
 * Runs `task` every `intervalMs`, skipping a tick while the previous run is
 * still in flight. Errors are logged under `[taskName]` and never stop the schedule.
 */
export function scheduleNonOverlappingTask(
    taskName: string,
    intervalMs: number,
    task: () => Promise<void>,
    options: ScheduleOptions = {},
): ScheduledTask {
    const safeIntervalMs = Number.isFinite(intervalMs) && intervalMs > 0
        ? Math.floor(intervalMs)
        : 1000;
    if (safeIntervalMs !== intervalMs) {
        logger.warn(`[${taskName}] invalid interval "${intervalMs}", defaulting to ${safeIntervalMs}ms`);
    }

    let inFlight = false;
    let stopped = false;
    const tick = () => {
        if (inFlight || stopped) {
            return;
        }
        inFlight = true;
        void Promise.resolve()
            .then(() => task())
            .catch((error) => {
                logger.error(`[${taskName}] run failed: ${String(error)}`);
            })
            .finally(() => {
                inFlight = false;
            });
    };

    const intervalId = setInterval(tick, safeIntervalMs);
    if (options.runImmediately) {
        tick();
    }

    return {
        stop: () => {
            if (stopped) {
                return;
            }
            stopped = true;
            clearInterval(intervalId);
        },
        isBusy: () => inFlight,
    };
}
