import type { WorkerStatus } from '@stress-harness/shared';
import type { StartupRoutine } from '../../types/backend-types';
import { PERF_MONITOR_INTERVAL_MS } from '../../config/constants';
import { scheduleNonOverlappingTask, type ScheduledTask } from '../../modules/runtime/scheduler';
import type { WorkerPool } from '../WorkerPool';
import { logger } from '../../utils/logger';

export type PerformanceSnapshot = {
    totalWorkers: number;
    activeLoops: number;
    byStatus: Partial<Record<WorkerStatus, number>>;
    successfulOperations: number;
    failedOperations: number;
    totalVolumeProcessed: number;
    heapUsedMb: number;
};

export class PerformanceMonitor implements StartupRoutine {
    public readonly name = 'PerformanceMonitor';
    private scheduled: ScheduledTask | null = null;

    constructor(
        private readonly workers: Pick<WorkerPool, 'listAll' | 'getStatistics' | 'getActiveLoopCount'>,
        private readonly intervalMs: number = PERF_MONITOR_INTERVAL_MS,
    ) { }

    public async start(): Promise<void> {
        if (this.scheduled) {
            return;
        }
        this.scheduled = scheduleNonOverlappingTask('PerfMonitor', this.intervalMs, async () => {
            this.log(await this.collect());
        });
    }

    public async stop(): Promise<void> {
        this.scheduled?.stop();
        this.scheduled = null;
    }

    public async collect(): Promise<PerformanceSnapshot> {
        const configs = this.workers.listAll();
        const snapshot: PerformanceSnapshot = {
            totalWorkers: configs.length,
            activeLoops: this.workers.getActiveLoopCount(),
            byStatus: {},
            successfulOperations: 0,
            failedOperations: 0,
            totalVolumeProcessed: 0,
            heapUsedMb: Math.round(process.memoryUsage().heapUsed / (1024 * 1024)),
        };
        for (const config of configs) {
            snapshot.byStatus[config.status] = (snapshot.byStatus[config.status] ?? 0) + 1;
            const stats = await this.workers.getStatistics(config.id);
            if (stats) {
                snapshot.successfulOperations += stats.successfulOperations;
                snapshot.failedOperations += stats.failedOperations;
                snapshot.totalVolumeProcessed += stats.totalVolumeProcessed;
            }
        }
        return snapshot;
    }

    private log(snapshot: PerformanceSnapshot): void {
        const statuses = Object.entries(snapshot.byStatus)
            .map(([status, count]) => `${status}=${count}`)
            .join(' ');
        logger.info(
            `[PerfMonitor] workers=${snapshot.totalWorkers} loops=${snapshot.activeLoops} ${statuses || 'none'} `
            + `ok=${snapshot.successfulOperations} failed=${snapshot.failedOperations} `
            + `volume=${snapshot.totalVolumeProcessed} heap=${snapshot.heapUsedMb}MB`,
        );
    }
}
