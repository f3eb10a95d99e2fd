import type { WorkerConfig } from '@stress-harness/shared';
import {
    InvalidWorkerRequestError,
    WorkerNotFoundError,
    WorkerPool,
    WorkerStateError,
    type CreateWorkerRequest,
} from './WorkerPool';
import type { RedisStateStore } from './RedisStateStore';
import type { SimulatedChainClient } from './SimulatedChainClient';
import type { PoolState } from '../types/backend-types';
import { createErrorRecovery } from '../modules/errors/errorClassifier';
import { formatContractErrorLog } from '../modules/errors/contractErrors';
import { SystemState } from '../modules/runtime/systemState';
import {
    FAST_POOL_CONFIG,
    FAST_RECOVERY_TIMINGS,
    MINT_A,
    createSeededChain,
    createTestStore,
    waitFor,
} from '../testing/harness';
import { logger } from '../utils/logger';

describe('WorkerPool', () => {
    let chain: SimulatedChainClient;
    let pool: PoolState;
    let store: RedisStateStore;
    let systemState: SystemState;
    let workers: WorkerPool;

    function depositRequest(overrides: Partial<CreateWorkerRequest> = {}): CreateWorkerRequest {
        return {
            kind: 'deposit',
            poolId: pool.poolId,
            tokenSide: 'A',
            initialAmount: 1_000_000,
            autoRefill: true,
            shareOutput: false,
            ...overrides,
        };
    }

    async function successes(workerId: string): Promise<number> {
        const stats = await workers.getStatistics(workerId);
        return stats?.successfulOperations ?? 0;
    }

    beforeEach(() => {
        jest.spyOn(logger, 'info').mockImplementation(() => logger);
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
        jest.spyOn(logger, 'debug').mockImplementation(() => logger);
        ({ chain, pool } = createSeededChain());
        store = createTestStore();
        systemState = new SystemState();
        systemState.set(true, false);
        workers = new WorkerPool({
            chain,
            store,
            systemState,
            recovery: createErrorRecovery({ chain, timings: FAST_RECOVERY_TIMINGS }),
            config: FAST_POOL_CONFIG,
            random: () => 0,
        });
    });

    afterEach(async () => {
        await workers.forceStopAll();
        jest.restoreAllMocks();
    });

    it('creates a worker with zeroed statistics and a fresh wallet', async () => {
        const id = await workers.create(depositRequest());

        expect(id).toMatch(/^deposit_[0-9a-f]{32}$/);
        const stored = await store.loadWorkerConfig(id);
        expect(stored).toMatchObject({ id, kind: 'deposit', status: 'created', poolId: pool.poolId });
        expect(stored?.wallet.secret).toMatch(/^[0-9a-f]{64}$/);
        await expect(store.loadWorkerStatistics(id)).resolves.toEqual({
            workerId: id,
            successfulOperations: 0,
            failedOperations: 0,
            totalVolumeProcessed: 0,
            totalFeesPaid: 0,
            lastOperationAt: null,
            lastError: null,
        });
    });

    it('rejects unknown pools and swap workers without a direction', async () => {
        await expect(workers.create(depositRequest({ poolId: 'missing' }))).rejects.toBeInstanceOf(InvalidWorkerRequestError);
        await expect(workers.create(depositRequest({ kind: 'swap' }))).rejects.toThrow('swap workers require a swapDirection');
        expect(workers.listAll()).toEqual([]);
    });

    it('runs deposits end to end and keeps balances consistent', async () => {
        const id = await workers.create(depositRequest());
        await workers.start(id);
        await waitFor(async () => (await successes(id)) >= 3);
        await workers.stop(id);

        const config = await workers.getConfig(id);
        const stats = await workers.getStatistics(id);
        if (!config || !stats) {
            throw new Error('worker missing after stop');
        }
        expect(config.status).toBe('stopped');
        expect(workers.getActiveLoopCount()).toBe(0);
        expect(stats.failedOperations).toBe(0);
        // random() = 0 sizes every deposit at one base unit.
        expect(stats.totalVolumeProcessed).toBe(stats.successfulOperations);
        expect(stats.totalFeesPaid).toBe(stats.successfulOperations * chain.networkFee);

        const address = config.wallet.address;
        await expect(chain.getTokenBalance(address, MINT_A)).resolves.toBe(1_000_000 - stats.totalVolumeProcessed);
        await expect(chain.getTokenBalance(address, pool.lpMintA)).resolves.toBe(stats.totalVolumeProcessed);
        await expect(chain.getNativeBalance(address)).resolves.toBe(1_000_000_000 - stats.totalFeesPaid);
        expect(chain.getPoolReserves(pool.poolId).reserveA).toBe(stats.totalVolumeProcessed);
    });

    it('rejects starting a worker that is already running', async () => {
        const id = await workers.create(depositRequest());
        await workers.start(id);

        await expect(workers.start(id)).rejects.toBeInstanceOf(WorkerStateError);
        expect(workers.getActiveLoopCount()).toBe(1);
    });

    it('lets only one of two concurrent starts run a loop', async () => {
        const id = await workers.create(depositRequest());

        const results = await Promise.allSettled([workers.start(id), workers.start(id)]);

        expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
        const second = results[1];
        if (second.status === 'rejected') {
            expect(second.reason).toBeInstanceOf(WorkerStateError);
            expect(second.reason).toHaveProperty('message', `Worker ${id} is already starting`);
        }
        expect(workers.getActiveLoopCount()).toBe(1);

        await workers.forceStopAll();
        const settled = await successes(id);
        await new Promise((resolve) => setTimeout(resolve, 50));

        await expect(successes(id)).resolves.toBe(settled);
        expect(workers.getActiveLoopCount()).toBe(0);
        await expect(workers.getConfig(id)).resolves.toMatchObject({ status: 'stopped' });
    });

    it('cancels a start that is still funding when every worker is force-stopped', async () => {
        ({ chain, pool } = createSeededChain({ latencyMs: 20 }));
        workers = new WorkerPool({
            chain,
            store,
            systemState,
            recovery: createErrorRecovery({ chain, timings: FAST_RECOVERY_TIMINGS }),
            config: FAST_POOL_CONFIG,
            random: () => 0,
        });
        const id = await workers.create(depositRequest());

        const starting = workers.start(id);
        await new Promise((resolve) => setTimeout(resolve, 5));
        await workers.forceStopAll();

        await expect(starting).rejects.toThrow(`Start of ${id} was cancelled by a stop`);
        await expect(store.loadWorkerConfig(id)).resolves.toMatchObject({ status: 'stopped' });
        expect(workers.getActiveLoopCount()).toBe(0);
        await new Promise((resolve) => setTimeout(resolve, 50));
        await expect(successes(id)).resolves.toBe(0);
    });

    it('cancels an in-flight start when that worker is stopped', async () => {
        ({ chain, pool } = createSeededChain({ latencyMs: 20 }));
        workers = new WorkerPool({
            chain,
            store,
            systemState,
            recovery: createErrorRecovery({ chain, timings: FAST_RECOVERY_TIMINGS }),
            config: FAST_POOL_CONFIG,
            random: () => 0,
        });
        const id = await workers.create(depositRequest());

        const starting = workers.start(id);
        await new Promise((resolve) => setTimeout(resolve, 5));
        await workers.stop(id);

        await expect(starting).rejects.toThrow(`Start of ${id} was cancelled by a stop`);
        await expect(workers.getConfig(id)).resolves.toMatchObject({ status: 'stopped' });
        expect(workers.getActiveLoopCount()).toBe(0);
    });

    it('refuses to start workers once closed', async () => {
        const id = await workers.create(depositRequest());

        await workers.close();

        await expect(workers.start(id)).rejects.toThrow(`Worker pool is closed; ${id} cannot start`);
        expect(workers.getActiveLoopCount()).toBe(0);
    });

    it('treats a second stop as a no-op', async () => {
        const id = await workers.create(depositRequest());
        await workers.start(id);

        await workers.stop(id);
        await workers.stop(id);

        await expect(workers.getConfig(id)).resolves.toMatchObject({ status: 'stopped' });
        expect(workers.getActiveLoopCount()).toBe(0);
    });

    it('marks the worker failed when start preparation fails', async () => {
        const id = await workers.create(depositRequest());
        chain.removePool(pool.poolId);

        await expect(workers.start(id)).rejects.toThrow(`Pool ${pool.poolId} no longer exists`);
        await expect(store.loadWorkerConfig(id)).resolves.toMatchObject({ status: 'failed' });
        expect(workers.getActiveLoopCount()).toBe(0);
    });

    it('records a failed attempt and retries once the pool pause clears', async () => {
        const id = await workers.create(depositRequest());
        chain.injectFailure('deposit', 1005);
        await workers.start(id);
        await waitFor(async () => (await successes(id)) >= 1);
        await workers.stop(id);

        const stats = await workers.getStatistics(id);
        expect(stats?.failedOperations).toBe(1);
        expect(stats?.lastError).toBe(formatContractErrorLog(1005));
        const errors = await workers.getErrors(id);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toMatchObject({
            operation: 'process_liquidity_deposit',
            code: 1005,
            message: formatContractErrorLog(1005),
        });
    });

    it('sends a failed balance read through recovery and keeps operating', async () => {
        const recovery = createErrorRecovery({ chain, timings: FAST_RECOVERY_TIMINGS });
        const handle = jest.spyOn(recovery, 'handle');
        workers = new WorkerPool({
            chain,
            store,
            systemState,
            recovery,
            config: FAST_POOL_CONFIG,
            random: () => 0,
        });
        const id = await workers.create(depositRequest());
        const readBalance = chain.getTokenBalance.bind(chain);
        let reads = 0;
        // The first read funds the wallet during start; the second sizes the first operation.
        jest.spyOn(chain, 'getTokenBalance').mockImplementation(async (address, mint) => {
            reads += 1;
            if (reads === 2) {
                throw new Error(formatContractErrorLog(1004));
            }
            return readBalance(address, mint);
        });

        await workers.start(id);
        await waitFor(async () => (await successes(id)) >= 1);
        await workers.stop(id);

        expect(handle).toHaveBeenCalledWith(
            expect.any(Error),
            expect.objectContaining({ workerId: id }),
            expect.any(AbortSignal),
        );
        const errors = await workers.getErrors(id);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toMatchObject({ operation: 'prepare', code: 1004 });
        await expect(workers.getStatistics(id)).resolves.toMatchObject({ failedOperations: 1 });
    });

    it('performs no operations while the system is paused', async () => {
        systemState.set(true, true);
        const id = await workers.create(depositRequest());
        await workers.start(id);
        await new Promise((resolve) => setTimeout(resolve, 40));

        await expect(successes(id)).resolves.toBe(0);
        expect(workers.getActiveLoopCount()).toBe(1);
    });

    it('lets a withdrawal worker without LP tokens idle without failures', async () => {
        const id = await workers.create(depositRequest({ kind: 'withdrawal' }));
        await workers.start(id);
        await new Promise((resolve) => setTimeout(resolve, 30));
        await workers.stop(id);

        await expect(workers.getStatistics(id)).resolves.toMatchObject({
            successfulOperations: 0,
            failedOperations: 0,
        });
    });

    it('shares deposit LP output with a running withdrawal worker', async () => {
        const withdrawalId = await workers.create(depositRequest({ kind: 'withdrawal' }));
        const depositId = await workers.create(depositRequest({ shareOutput: true }));
        await workers.start(withdrawalId);
        await workers.start(depositId);

        await waitFor(async () => (await successes(withdrawalId)) >= 1);
        await workers.forceStopAll();

        const withdrawal = await workers.getConfig(withdrawalId);
        const deposit = await workers.getConfig(depositId);
        if (!withdrawal || !deposit) {
            throw new Error('workers missing');
        }
        await expect(chain.getTokenBalance(deposit.wallet.address, pool.lpMintA)).resolves.toBe(0);
        const withdrawn = await chain.getTokenBalance(withdrawal.wallet.address, MINT_A);
        await expect(workers.getStatistics(withdrawalId)).resolves.toMatchObject({ totalVolumeProcessed: withdrawn });
    });

    it('pauses every running loop and resumes them', async () => {
        const first = await workers.create(depositRequest());
        const second = await workers.create(depositRequest({ tokenSide: 'B' }));
        await workers.start(first);
        await workers.start(second);

        await expect(workers.pauseAll()).resolves.toBe(2);
        expect(workers.getActiveLoopCount()).toBe(0);
        expect(workers.listAll().map((config) => config.status)).toEqual(['paused', 'paused']);

        await expect(workers.resumePaused()).resolves.toBe(2);
        expect(workers.getActiveLoopCount()).toBe(2);

        await expect(workers.forceStopAll()).resolves.toBe(2);
        expect(workers.listAll().map((config) => config.status)).toEqual(['stopped', 'stopped']);
    });

    it('moves paused workers to stopped on force stop', async () => {
        const id = await workers.create(depositRequest());
        await workers.start(id);
        await workers.pause(id);

        await expect(workers.forceStopAll()).resolves.toBe(0);
        await expect(workers.getConfig(id)).resolves.toMatchObject({ status: 'stopped' });
    });

    it('stops a pool\'s liquidity workers and optionally its swaps', async () => {
        const depositId = await workers.create(depositRequest());
        const swapId = await workers.create(depositRequest({ kind: 'swap', swapDirection: 'b_to_a' }));
        await workers.start(depositId);
        await workers.start(swapId);

        await expect(workers.stopAllForPool(pool.poolId, false)).resolves.toBe(1);
        expect(workers.isActive(depositId)).toBe(false);
        expect(workers.isActive(swapId)).toBe(true);

        await expect(workers.stopAllForPool(pool.poolId, true)).resolves.toBe(1);
        expect(workers.getActiveLoopCount()).toBe(0);
    });

    it('deletes a running worker and all of its records', async () => {
        const id = await workers.create(depositRequest());
        await workers.start(id);

        await workers.delete(id);

        expect(workers.getActiveLoopCount()).toBe(0);
        await expect(workers.getConfig(id)).resolves.toBeNull();
        await expect(workers.getStatistics(id)).resolves.toBeNull();
        await expect(workers.getErrors(id)).rejects.toBeInstanceOf(WorkerNotFoundError);
    });

    it('marks workers a previous process left running as stopped', async () => {
        const leftover: WorkerConfig = {
            id: 'swap_0001',
            kind: 'swap',
            poolId: pool.poolId,
            tokenSide: 'A',
            swapDirection: 'a_to_b',
            wallet: { address: 'addr-1', secret: 'test-secret' },
            initialAmount: 0,
            autoRefill: false,
            shareOutput: false,
            status: 'running',
            createdAt: 1,
            lastOperationAt: null,
        };
        await store.saveWorkerConfig(leftover);
        await store.saveWorkerConfig({ ...leftover, id: 'swap_0002', status: 'created', createdAt: 2 });

        await expect(workers.reconcile()).resolves.toBe(1);

        await expect(store.loadWorkerConfig('swap_0001')).resolves.toMatchObject({ status: 'stopped' });
        expect(workers.listAll().map((config) => [config.id, config.status])).toEqual([
            ['swap_0001', 'stopped'],
            ['swap_0002', 'created'],
        ]);
    });
});
