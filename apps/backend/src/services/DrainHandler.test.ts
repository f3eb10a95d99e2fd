import type { WorkerConfig } from '@stress-harness/shared';
import { DrainHandler, type DrainChain, type DrainWorkers } from './DrainHandler';
import type { SimulatedChainClient } from './SimulatedChainClient';
import { WorkerNotFoundError, WorkerPool } from './WorkerPool';
import type { OperationReceipt, PoolState } from '../types/backend-types';
import { BURN_ADDRESS } from '../config/constants';
import { createErrorRecovery } from '../modules/errors/errorClassifier';
import { formatContractErrorLog } from '../modules/errors/contractErrors';
import { SystemState } from '../modules/runtime/systemState';
import {
    FAST_POOL_CONFIG,
    FAST_RECOVERY_TIMINGS,
    MINT_A,
    MINT_B,
    createSeededChain,
    createTestStore,
} from '../testing/harness';
import { logger } from '../utils/logger';

describe('DrainHandler with the simulated chain', () => {
    let chain: SimulatedChainClient;
    let pool: PoolState;
    let workers: WorkerPool;
    let drainHandler: DrainHandler;

    async function createDepositWorker(): Promise<WorkerConfig> {
        const id = await workers.create({
            kind: 'deposit',
            poolId: pool.poolId,
            tokenSide: 'A',
            initialAmount: 1_000_000,
            autoRefill: false,
            shareOutput: false,
        });
        const config = await workers.getConfig(id);
        if (!config) {
            throw new Error('worker missing');
        }
        return config;
    }

    beforeEach(() => {
        jest.spyOn(logger, 'info').mockImplementation(() => logger);
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
        jest.spyOn(logger, 'debug').mockImplementation(() => logger);
        ({ chain, pool } = createSeededChain());
        const systemState = new SystemState();
        systemState.set(true, false);
        workers = new WorkerPool({
            chain,
            store: createTestStore(),
            systemState,
            recovery: createErrorRecovery({ chain, timings: FAST_RECOVERY_TIMINGS }),
            config: FAST_POOL_CONFIG,
            random: () => 0,
        });
        drainHandler = new DrainHandler({ chain, workers, now: () => 42 });
    });

    afterEach(async () => {
        await workers.forceStopAll();
        jest.restoreAllMocks();
    });

    it('returns nothing_to_drain for an empty wallet without burning', async () => {
        const config = await createDepositWorker();
        const burnTokens = jest.spyOn(chain, 'burnTokens');
        const deposit = jest.spyOn(chain, 'deposit');

        const result = await drainHandler.drain(config.id);

        expect(result).toEqual({
            workerId: config.id,
            kind: 'deposit',
            status: 'nothing_to_drain',
            tokensBurned: 0,
            operationAttempted: false,
            operationSucceeded: false,
            outputBurned: 0,
            networkFeePaid: 0,
            nativeSwept: 0,
            completedAt: 42,
        });
        expect(burnTokens).not.toHaveBeenCalled();
        expect(deposit).not.toHaveBeenCalled();
    });

    it('keeps the burn reported when the terminal operation fails', async () => {
        const config = await createDepositWorker();
        await chain.mintTokens(config.wallet.address, MINT_A, 5_000);
        await chain.requestNativeFunding(config.wallet.address, 1_000_000);

        const result = await drainHandler.drain(config.id);

        // Burn fee, then the deposit fee is taken before its debit fails.
        expect(result).toMatchObject({
            status: 'operation_failed',
            tokensBurned: 5_000,
            operationAttempted: true,
            operationSucceeded: false,
            operationError: formatContractErrorLog(1015),
            nativeSwept: 980_000,
        });
        await expect(chain.getTokenBalance(BURN_ADDRESS, MINT_A)).resolves.toBe(5_000);
        await expect(chain.getTokenBalance(config.wallet.address, MINT_A)).resolves.toBe(0);
        const operational = await chain.getOrCreateOperationalWallet();
        await expect(chain.getNativeBalance(operational.address)).resolves.toBe(980_000);
        await expect(chain.getNativeBalance(config.wallet.address)).resolves.toBe(5_000);
    });

    it('reports a failed burn and attempts nothing else', async () => {
        const config = await createDepositWorker();
        await chain.mintTokens(config.wallet.address, MINT_A, 5_000);
        await chain.requestNativeFunding(config.wallet.address, 1_000_000);
        chain.injectFailure('burn', 'burn rejected');
        const deposit = jest.spyOn(chain, 'deposit');

        const result = await drainHandler.drain(config.id);

        expect(result).toMatchObject({
            status: 'burn_failed',
            tokensBurned: 0,
            burnError: 'burn rejected',
            operationAttempted: false,
            nativeSwept: 0,
        });
        expect(deposit).not.toHaveBeenCalled();
        await expect(chain.getTokenBalance(config.wallet.address, MINT_A)).resolves.toBe(5_000);
    });

    it('stops a running worker before draining it', async () => {
        const config = await createDepositWorker();
        await workers.start(config.id);

        const result = await drainHandler.drain(config.id);

        expect(workers.isActive(config.id)).toBe(false);
        await expect(workers.getConfig(config.id)).resolves.toMatchObject({ status: 'stopped' });
        expect(result.tokensBurned).toBeGreaterThan(0);
        expect(result.status).toBe('operation_failed');
        await expect(chain.getTokenBalance(config.wallet.address, MINT_A)).resolves.toBe(0);
    });

    it('rejects unknown workers', async () => {
        await expect(drainHandler.drain('deposit_missing')).rejects.toBeInstanceOf(WorkerNotFoundError);
    });
});

describe('DrainHandler terminal operation', () => {
    const pool: PoolState = {
        poolId: 'pool-1',
        tokenAMint: MINT_A,
        tokenBMint: MINT_B,
        tokenADecimals: 9,
        tokenBDecimals: 9,
        ratioANumerator: 1_000_000_000,
        ratioBDenominator: 2_000_000_000,
        lpMintA: 'lp-a',
        lpMintB: 'lp-b',
    };
    const swapWorker: WorkerConfig = {
        id: 'swap_0001',
        kind: 'swap',
        poolId: 'pool-1',
        tokenSide: 'A',
        swapDirection: 'a_to_b',
        wallet: { address: 'worker-wallet', secret: 'test-secret' },
        initialAmount: 0,
        autoRefill: false,
        shareOutput: false,
        status: 'stopped',
        createdAt: 1,
        lastOperationAt: null,
    };

    function createChain(nativeBalance: number) {
        return {
            getPool: jest.fn<Promise<PoolState | null>, [string]>(async () => pool),
            getTokenBalance: jest.fn<Promise<number>, [string, string]>(async () => 1_000),
            burnTokens: jest.fn<Promise<string>, Parameters<DrainChain['burnTokens']>>(async () => 'sig-burn'),
            deposit: jest.fn<Promise<OperationReceipt>, Parameters<DrainChain['deposit']>>(),
            withdraw: jest.fn<Promise<OperationReceipt>, Parameters<DrainChain['withdraw']>>(),
            swap: jest.fn<Promise<OperationReceipt>, Parameters<DrainChain['swap']>>(async () => ({
                signature: 'sig-swap',
                inputAmount: 1_000,
                outputAmount: 2_000,
                networkFee: 5_000,
            })),
            getNativeBalance: jest.fn<Promise<number>, [string]>(async () => nativeBalance),
            transferNative: jest.fn<Promise<string>, Parameters<DrainChain['transferNative']>>(async () => 'sig-sweep'),
            getOrCreateOperationalWallet: jest.fn(async () => ({ address: 'ops-wallet', secret: 'test-secret' })),
        } satisfies DrainChain;
    }

    function createWorkers(): DrainWorkers {
        return {
            getConfig: async () => swapWorker,
            isActive: () => false,
            stop: async () => undefined,
        };
    }

    beforeEach(() => {
        jest.spyOn(logger, 'info').mockImplementation(() => logger);
        jest.spyOn(logger, 'error').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('swaps the burned amount with a 90% output floor and burns the proceeds', async () => {
        const chain = createChain(8_000);
        const handler = new DrainHandler({ chain, workers: createWorkers(), now: () => 7 });

        const result = await handler.drain('swap_0001');

        expect(chain.swap).toHaveBeenCalledWith(expect.objectContaining({
            direction: 'a_to_b',
            amount: 1_000,
            minimumOutput: 1_800,
            computeUnits: 250_000,
        }));
        expect(chain.burnTokens.mock.calls.map((call) => [call[1], call[2]])).toEqual([
            [MINT_A, 1_000],
            [MINT_B, 2_000],
        ]);
        expect(result).toMatchObject({
            status: 'completed',
            tokensBurned: 1_000,
            outputBurned: 2_000,
            operationSucceeded: true,
            signature: 'sig-swap',
            networkFeePaid: 5_000,
            nativeSwept: 0,
            completedAt: 7,
        });
        expect(chain.transferNative).not.toHaveBeenCalled();
    });

    it('records a sweep failure without changing the status', async () => {
        const chain = createChain(50_000);
        chain.transferNative.mockRejectedValue(new Error('blockhash expired'));
        const handler = new DrainHandler({ chain, workers: createWorkers() });

        const result = await handler.drain('swap_0001');

        expect(chain.transferNative).toHaveBeenCalledWith(swapWorker.wallet, 'ops-wallet', 40_000);
        expect(result).toMatchObject({ status: 'completed', nativeSwept: 0, sweepError: 'blockhash expired' });
    });
});
