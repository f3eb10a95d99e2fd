import type {
    DrainResult,
    HealthSnapshot,
    PoolRatioConfig,
    WorkerConfig,
    WorkerErrorRecord,
    WorkerStatistics,
} from '@stress-harness/shared';
import type { PoolRegistryEntry } from '../../types/backend-types';
import type { StressTestEngine } from '../../engines/StressTestEngine';
import { PoolNotFoundError } from '../../services/PoolRegistry';
import { InvalidWorkerRequestError, WorkerNotFoundError, WorkerStateError } from '../../services/WorkerPool';
import { getComputeBudget } from '../budget/computeBudget';
import { normalizePool, PoolRatioError } from '../pool/ratioNormalizer';
import type { SystemStateReader } from '../runtime/systemState';
import { logger } from '../../utils/logger';
import {
    validateComputeBudgetRequest,
    validateCreateWorkerRequest,
    validateNormalizePoolRequest,
    validateWorkerId,
    type ValidationResult,
} from './workerRequestContract';

// Wallet secrets never leave the core.
export type WorkerView = Omit<WorkerConfig, 'wallet'> & { walletAddress: string };

export type ControlPlaneEngine = Pick<StressTestEngine, 'workers' | 'poolRegistry' | 'drainHandler' | 'getComputeBudget'>;

export interface ControlPlaneDeps {
    getEngine: () => ControlPlaneEngine | null;
    getHealth: () => HealthSnapshot;
    systemState: SystemStateReader;
}

export function toWorkerView(config: WorkerConfig): WorkerView {
    const { wallet, ...rest } = config;
    return { ...rest, walletAddress: wallet.address };
}

function failure(status: number, message: string): { ok: false; status: number; message: string } {
    return { ok: false, status, message };
}

function statusForError(error: unknown): number {
    if (error instanceof WorkerNotFoundError || error instanceof PoolNotFoundError) {
        return 404;
    }
    if (error instanceof WorkerStateError) {
        return 409;
    }
    if (error instanceof InvalidWorkerRequestError || error instanceof PoolRatioError) {
        return 400;
    }
    return 500;
}

/**
 * Transport-agnostic operations over the running engine. Every result is a
 * ValidationResult so callers map `status` onto whatever protocol they serve.
 */
export function createControlPlane(deps: ControlPlaneDeps) {
    function engineFor(mutation: boolean): ValidationResult<ControlPlaneEngine> {
        if (mutation && !deps.systemState.isStarted()) {
            return failure(503, 'Stress test service is not started');
        }
        if (mutation && deps.systemState.isPaused()) {
            return failure(503, 'Stress test service is paused');
        }
        const engine = deps.getEngine();
        if (!engine) {
            return failure(503, 'Stress test engine is not running');
        }
        return { ok: true, value: engine };
    }

    async function run<T>(
        label: string,
        mutation: boolean,
        action: (engine: ControlPlaneEngine) => Promise<T>,
    ): Promise<ValidationResult<T>> {
        const engine = engineFor(mutation);
        if (!engine.ok) {
            return engine;
        }
        try {
            return { ok: true, value: await action(engine.value) };
        } catch (error) {
            const status = statusForError(error);
            if (status === 500) {
                logger.error(`[ControlPlane] ${label} failed: ${String(error)}`);
            }
            return failure(status, error instanceof Error ? error.message : String(error));
        }
    }

    async function withWorkerId<T>(
        label: string,
        rawId: unknown,
        mutation: boolean,
        action: (engine: ControlPlaneEngine, workerId: string) => Promise<T>,
    ): Promise<ValidationResult<T>> {
        const workerId = validateWorkerId(rawId);
        if (!workerId.ok) {
            return workerId;
        }
        return run(label, mutation, (engine) => action(engine, workerId.value));
    }

    function requireFound<T>(value: T | null, workerId: string): T {
        if (value === null) {
            throw new WorkerNotFoundError(workerId);
        }
        return value;
    }

    async function createWorker(payload: unknown): Promise<ValidationResult<WorkerView>> {
        const request = validateCreateWorkerRequest(payload);
        if (!request.ok) {
            return request;
        }
        return run('createWorker', true, async (engine) => {
            const workerId = await engine.workers.create(request.value);
            return toWorkerView(requireFound(await engine.workers.getConfig(workerId), workerId));
        });
    }

    async function startWorker(rawId: unknown): Promise<ValidationResult<WorkerView>> {
        return withWorkerId('startWorker', rawId, true, async (engine, workerId) => {
            await engine.workers.start(workerId);
            return toWorkerView(requireFound(await engine.workers.getConfig(workerId), workerId));
        });
    }

    async function stopWorker(rawId: unknown): Promise<ValidationResult<WorkerView>> {
        return withWorkerId('stopWorker', rawId, true, async (engine, workerId) => {
            await engine.workers.stop(workerId);
            return toWorkerView(requireFound(await engine.workers.getConfig(workerId), workerId));
        });
    }

    async function forceStopAllWorkers(): Promise<ValidationResult<{ stopped: number }>> {
        return run('forceStopAllWorkers', true, async (engine) => ({ stopped: await engine.workers.forceStopAll() }));
    }

    async function deleteWorker(rawId: unknown): Promise<ValidationResult<{ workerId: string; deleted: true }>> {
        return withWorkerId('deleteWorker', rawId, true, async (engine, workerId) => {
            await engine.workers.delete(workerId);
            return { workerId, deleted: true as const };
        });
    }

    async function listWorkers(): Promise<ValidationResult<WorkerView[]>> {
        return run('listWorkers', false, async (engine) => engine.workers.listAll().map(toWorkerView));
    }

    async function getWorkerConfig(rawId: unknown): Promise<ValidationResult<WorkerView>> {
        return withWorkerId('getWorkerConfig', rawId, false, async (engine, workerId) => (
            toWorkerView(requireFound(await engine.workers.getConfig(workerId), workerId))
        ));
    }

    async function getWorkerStatistics(rawId: unknown): Promise<ValidationResult<WorkerStatistics>> {
        return withWorkerId('getWorkerStatistics', rawId, false, async (engine, workerId) => (
            requireFound(await engine.workers.getStatistics(workerId), workerId)
        ));
    }

    async function getWorkerErrors(rawId: unknown): Promise<ValidationResult<WorkerErrorRecord[]>> {
        return withWorkerId('getWorkerErrors', rawId, false, (engine, workerId) => engine.workers.getErrors(workerId));
    }

    async function drain(rawId: unknown): Promise<ValidationResult<DrainResult>> {
        return withWorkerId('drain', rawId, true, (engine, workerId) => engine.drainHandler.drain(workerId));
    }

    function normalize(payload: unknown): ValidationResult<PoolRatioConfig> {
        const request = validateNormalizePoolRequest(payload);
        if (!request.ok) {
            return request;
        }
        const { mintA, mintB, ratioA, ratioB } = request.value;
        try {
            return { ok: true, value: normalizePool(mintA, mintB, ratioA, ratioB) };
        } catch (error) {
            return failure(statusForError(error), error instanceof Error ? error.message : String(error));
        }
    }

    async function registerPool(rawPoolId: unknown): Promise<ValidationResult<PoolRegistryEntry>> {
        if (typeof rawPoolId !== 'string' || rawPoolId.trim().length === 0) {
            return failure(400, 'Invalid pool id');
        }
        return run('registerPool', true, (engine) => engine.poolRegistry.register(rawPoolId.trim()));
    }

    async function listPools(): Promise<ValidationResult<PoolRegistryEntry[]>> {
        return run('listPools', false, async (engine) => engine.poolRegistry.list());
    }

    function computeBudget(payload: unknown): ValidationResult<{ operation: string; computeUnits: number }> {
        const request = validateComputeBudgetRequest(payload);
        if (!request.ok) {
            return request;
        }
        const { operation, context } = request.value;
        const engine = deps.getEngine();
        const computeUnits = engine
            ? engine.getComputeBudget(operation, context)
            : getComputeBudget(operation, context);
        return { ok: true, value: { operation, computeUnits } };
    }

    return {
        createWorker,
        startWorker,
        stopWorker,
        forceStopAllWorkers,
        deleteWorker,
        listWorkers,
        getWorkerConfig,
        getWorkerStatistics,
        getWorkerErrors,
        drain,
        normalizePool: normalize,
        registerPool,
        listPools,
        getComputeBudget: computeBudget,
        getHealth: () => deps.getHealth(),
    };
}

export type ControlPlane = ReturnType<typeof createControlPlane>;
