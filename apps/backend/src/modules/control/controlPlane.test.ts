import { createControlPlane, type ControlPlane } from './controlPlane';
import { LifecycleController } from '../../engines/LifecycleController';
import { StressTestEngine } from '../../engines/StressTestEngine';
import type { PoolState } from '../../types/backend-types';
import type { SimulatedChainClient } from '../../services/SimulatedChainClient';
import { SystemState } from '../runtime/systemState';
import {
    FAST_POOL_CONFIG,
    FAST_RECOVERY_TIMINGS,
    MINT_A,
    MINT_B,
    createSeededChain,
    createTestStore,
} from '../../testing/harness';
import { logger } from '../../utils/logger';

describe('controlPlane', () => {
    let chain: SimulatedChainClient;
    let pool: PoolState;
    let systemState: SystemState;
    let lifecycle: LifecycleController;
    let controlPlane: ControlPlane;

    beforeEach(() => {
        jest.spyOn(logger, 'info').mockImplementation(() => logger);
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
        jest.spyOn(logger, 'debug').mockImplementation(() => logger);
        ({ chain, pool } = createSeededChain());
        const store = createTestStore();
        systemState = new SystemState();
        lifecycle = new LifecycleController({
            systemState,
            createEngine: () => new StressTestEngine({
                chain,
                store,
                systemState,
                workerPoolConfig: FAST_POOL_CONFIG,
                recoveryTimings: FAST_RECOVERY_TIMINGS,
                routines: () => [],
                random: () => 0,
            }),
        });
        controlPlane = createControlPlane({
            getEngine: () => lifecycle.getEngine(),
            getHealth: () => lifecycle.getHealth(),
            systemState,
        });
    });

    afterEach(async () => {
        await lifecycle.stop();
        jest.restoreAllMocks();
    });

    function depositRequest(initialAmount = 1_000): Record<string, unknown> {
        return { kind: 'deposit', poolId: pool.poolId, tokenSide: 'A', initialAmount, autoRefill: false };
    }

    async function createWorkerId(): Promise<string> {
        const created = await controlPlane.createWorker(depositRequest());
        if (!created.ok) {
            throw new Error(created.message);
        }
        return created.value.id;
    }

    it('refuses mutations and engine reads before the service starts', async () => {
        await expect(controlPlane.createWorker(depositRequest())).resolves.toEqual({
            ok: false,
            status: 503,
            message: 'Stress test service is not started',
        });
        await expect(controlPlane.listWorkers()).resolves.toEqual({
            ok: false,
            status: 503,
            message: 'Stress test engine is not running',
        });
        expect(controlPlane.getHealth()).toMatchObject({ state: 'Stopped', isHealthy: true });
    });

    it('answers compute budgets without a running engine', () => {
        expect(controlPlane.getComputeBudget({ operation: 'process_swap_execute' })).toEqual({
            ok: true,
            value: { operation: 'process_swap_execute', computeUnits: 250_000 },
        });
    });

    it('answers a prototype-named operation with the default budget', () => {
        expect(controlPlane.getComputeBudget({ operation: 'toString' })).toEqual({
            ok: true,
            value: { operation: 'toString', computeUnits: 150_000 },
        });
    });

    it('creates workers without exposing their wallet secret', async () => {
        await lifecycle.start();

        const created = await controlPlane.createWorker(depositRequest());

        expect(created).toMatchObject({ ok: true, value: { kind: 'deposit', status: 'created', initialAmount: 1_000 } });
        if (!created.ok) {
            return;
        }
        expect(created.value).not.toHaveProperty('wallet');
        expect(created.value.walletAddress).toEqual(expect.any(String));
        const listed = await controlPlane.listWorkers();
        expect(listed).toMatchObject({ ok: true, value: [{ id: created.value.id }] });
        await expect(controlPlane.getWorkerStatistics(created.value.id)).resolves.toMatchObject({
            ok: true,
            value: { workerId: created.value.id, successfulOperations: 0 },
        });
    });

    it('maps request and domain errors onto statuses', async () => {
        await lifecycle.start();
        const workerId = await createWorkerId();

        await expect(controlPlane.createWorker({ kind: 'swap', poolId: pool.poolId })).resolves.toMatchObject({
            ok: false,
            status: 400,
        });
        await expect(controlPlane.createWorker({ kind: 'deposit', poolId: 'no-such-pool' })).resolves.toEqual({
            ok: false,
            status: 400,
            message: 'Pool no-such-pool does not exist',
        });
        await expect(controlPlane.startWorker('deposit_missing')).resolves.toEqual({
            ok: false,
            status: 404,
            message: 'Worker deposit_missing not found',
        });

        await expect(controlPlane.startWorker(workerId)).resolves.toMatchObject({ ok: true, value: { status: 'running' } });
        await expect(controlPlane.startWorker(workerId)).resolves.toEqual({
            ok: false,
            status: 409,
            message: `Worker ${workerId} is already running`,
        });
        await expect(controlPlane.stopWorker(workerId)).resolves.toMatchObject({ ok: true, value: { status: 'stopped' } });
    });

    it('keeps reads available but rejects mutations while paused', async () => {
        await lifecycle.start();
        const workerId = await createWorkerId();
        await lifecycle.pause();

        await expect(controlPlane.createWorker(depositRequest())).resolves.toEqual({
            ok: false,
            status: 503,
            message: 'Stress test service is paused',
        });
        await expect(controlPlane.getWorkerConfig(workerId)).resolves.toMatchObject({ ok: true, value: { id: workerId } });
        await expect(controlPlane.getWorkerErrors(workerId)).resolves.toEqual({ ok: true, value: [] });
    });

    it('deletes workers and reports them missing afterwards', async () => {
        await lifecycle.start();
        const workerId = await createWorkerId();

        await expect(controlPlane.deleteWorker(workerId)).resolves.toEqual({ ok: true, value: { workerId, deleted: true } });
        await expect(controlPlane.getWorkerConfig(workerId)).resolves.toMatchObject({ ok: false, status: 404 });
    });

    it('drains a worker that was never funded', async () => {
        await lifecycle.start();
        const workerId = await createWorkerId();

        await expect(controlPlane.drain(workerId)).resolves.toMatchObject({
            ok: true,
            value: { workerId, status: 'nothing_to_drain', tokensBurned: 0 },
        });
    });

    it('force-stops every running worker', async () => {
        await lifecycle.start();
        const first = await createWorkerId();
        const second = await createWorkerId();
        await controlPlane.startWorker(first);
        await controlPlane.startWorker(second);

        await expect(controlPlane.forceStopAllWorkers()).resolves.toEqual({ ok: true, value: { stopped: 2 } });
        await expect(controlPlane.getWorkerConfig(first)).resolves.toMatchObject({ ok: true, value: { status: 'stopped' } });
    });

    it('registers pools and sizes consolidation across them', async () => {
        await lifecycle.start();

        await expect(controlPlane.registerPool(pool.poolId)).resolves.toMatchObject({ ok: true, value: { poolId: pool.poolId } });
        await expect(controlPlane.registerPool('no-such-pool')).resolves.toMatchObject({ ok: false, status: 404 });
        await expect(controlPlane.registerPool('  ')).resolves.toEqual({ ok: false, status: 400, message: 'Invalid pool id' });
        await expect(controlPlane.listPools()).resolves.toMatchObject({ ok: true, value: [{ poolId: pool.poolId }] });
        expect(controlPlane.getComputeBudget({ operation: 'process_consolidate_pool_fees' })).toEqual({
            ok: true,
            value: { operation: 'process_consolidate_pool_fees', computeUnits: 9_000 },
        });
    });

    it('normalizes pools into canonical token order', () => {
        expect(controlPlane.normalizePool({ mintA: MINT_B, mintB: MINT_A, ratioA: 2, ratioB: 1 })).toMatchObject({
            ok: true,
            value: { tokenA: MINT_A, tokenB: MINT_B, ratioANumerator: 1, ratioBDenominator: 2, wasSwapped: true },
        });
        expect(controlPlane.normalizePool({ mintA: MINT_A, mintB: MINT_A, ratioA: 1, ratioB: 1 })).toEqual({
            ok: false,
            status: 400,
            message: 'a pool needs two distinct tokens',
        });
    });

    it('logs unexpected failures and reports them as 500', async () => {
        await lifecycle.start();
        const workerId = await createWorkerId();
        const engine = lifecycle.getEngine();
        if (!engine) {
            throw new Error('engine not running');
        }
        jest.spyOn(engine.workers, 'getErrors').mockRejectedValue(new Error('redis down'));

        await expect(controlPlane.getWorkerErrors(workerId)).resolves.toEqual({
            ok: false,
            status: 500,
            message: 'redis down',
        });
        expect(logger.error).toHaveBeenCalledWith('[ControlPlane] getWorkerErrors failed: Error: redis down');
    });
});
