import type { EngineHealthStatus } from '@stress-harness/shared';
import type { ChainClient, StartupRoutine, StateStore } from '../types/backend-types';
import { getComputeBudget, type ComputeBudgetContext } from '../modules/budget/computeBudget';
import { createErrorRecovery, type RecoveryTimings } from '../modules/errors/errorClassifier';
import type { SystemStateReader } from '../modules/runtime/systemState';
import { DrainHandler } from '../services/DrainHandler';
import { PoolRegistry } from '../services/PoolRegistry';
import { WorkerPool, type WorkerPoolConfig } from '../services/WorkerPool';
import { ContractVersionCheck } from '../services/startup/ContractVersionCheck';
import { OperationalWalletStartup } from '../services/startup/OperationalWalletStartup';
import { PerformanceMonitor } from '../services/startup/PerformanceMonitor';
import { PoolRegistryStartup } from '../services/startup/PoolRegistryStartup';
import { WorkerReconcile } from '../services/startup/WorkerReconcile';
import { logger } from '../utils/logger';

export type EngineHealth = {
    status: EngineHealthStatus;
    started: boolean;
    totalWorkers: number;
    runningWorkers: number;
    failedWorkers: number;
};

export interface StressTestEngineDeps {
    chain: ChainClient;
    store: StateStore;
    systemState: SystemStateReader;
    workerPoolConfig?: Partial<WorkerPoolConfig>;
    recoveryTimings?: Partial<RecoveryTimings>;
    // Replaces the default routine list; receives the engine's own collaborators.
    routines?: (engine: StressTestEngine) => StartupRoutine[];
    random?: () => number;
}

/**
 * One run of the harness: the worker pool, pool registry and drain handler,
 * plus the startup routines that must succeed before workers are accepted.
 */
export class StressTestEngine {
    public readonly workers: WorkerPool;
    public readonly poolRegistry: PoolRegistry;
    public readonly drainHandler: DrainHandler;
    public readonly operationalWallet: OperationalWalletStartup;
    private readonly routines: StartupRoutine[];
    private startedRoutines: StartupRoutine[] = [];
    private running = false;

    constructor(deps: StressTestEngineDeps) {
        this.workers = new WorkerPool({
            chain: deps.chain,
            store: deps.store,
            systemState: deps.systemState,
            config: deps.workerPoolConfig,
            recovery: createErrorRecovery({ chain: deps.chain, timings: deps.recoveryTimings }),
            random: deps.random,
        });
        this.poolRegistry = new PoolRegistry({ chain: deps.chain, store: deps.store });
        this.drainHandler = new DrainHandler({ chain: deps.chain, workers: this.workers });
        this.operationalWallet = new OperationalWalletStartup(deps.chain);
        this.routines = deps.routines
            ? deps.routines(this)
            : [
                new ContractVersionCheck(deps.chain),
                this.operationalWallet,
                new PoolRegistryStartup(this.poolRegistry),
                new WorkerReconcile(this.workers),
                new PerformanceMonitor(this.workers),
            ];
    }

    public get isRunning(): boolean {
        return this.running;
    }

    public routineNames(): string[] {
        return this.routines.map((routine) => routine.name);
    }

    /** Starts routines in order. A failure unwinds the routines already started and rethrows. */
    public async start(): Promise<void> {
        if (this.running) {
            return;
        }
        for (const routine of this.routines) {
            logger.info(`[Engine] starting ${routine.name}`);
            try {
                await routine.start();
            } catch (error) {
                logger.error(`[Engine] ${routine.name} failed: ${String(error)}`);
                await this.stopRoutines();
                throw error;
            }
            this.startedRoutines.push(routine);
        }
        this.running = true;
        logger.info(`[Engine] started (${this.routines.length} routines)`);
    }

    public async stop(): Promise<void> {
        const halted = await this.workers.close();
        if (halted > 0) {
            logger.info(`[Engine] stopped ${halted} worker(s)`);
        }
        await this.stopRoutines();
        this.running = false;
        logger.info('[Engine] stopped');
    }

    public async pause(): Promise<number> {
        return this.workers.pauseAll();
    }

    public async resume(): Promise<number> {
        return this.workers.resumePaused();
    }

    /** Consolidation without an explicit pool count is sized for every registered pool. */
    public getComputeBudget(operation: string, context: ComputeBudgetContext = {}): number {
        if (operation === 'process_consolidate_pool_fees' && context.poolCount === undefined) {
            return getComputeBudget(operation, { ...context, poolCount: this.poolRegistry.count() });
        }
        return getComputeBudget(operation, context);
    }

    public getHealth(): EngineHealth {
        const configs = this.workers.listAll();
        const failedWorkers = configs.filter((config) => config.status === 'failed' || config.status === 'error').length;
        const runningWorkers = configs.filter((config) => config.status === 'running').length;
        const degraded = !this.running || failedWorkers * 2 > configs.length;
        return {
            status: degraded ? 'Degraded' : 'Healthy',
            started: this.running,
            totalWorkers: configs.length,
            runningWorkers,
            failedWorkers,
        };
    }

    private async stopRoutines(): Promise<void> {
        const toStop = this.startedRoutines.slice().reverse();
        this.startedRoutines = [];
        for (const routine of toStop) {
            try {
                await routine.stop();
            } catch (error) {
                logger.error(`[Engine] ${routine.name} stop failed: ${String(error)}`);
            }
        }
    }
}
