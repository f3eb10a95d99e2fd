import type { DrainResult, WorkerConfig } from '@stress-harness/shared';
import type { ChainClient, OperationReceipt, PoolState } from '../types/backend-types';
import { DRAIN_FEE_RESERVE, DRAIN_SWAP_MIN_OUTPUT_FRACTION } from '../config/constants';
import { getComputeBudget } from '../modules/budget/computeBudget';
import { expectedSwapOutput, poolRatioFromState } from '../modules/pool/ratioNormalizer';
import { resolveWorkerMints } from '../modules/workers/workerOperations';
import { WorkerNotFoundError, type WorkerPool } from './WorkerPool';
import { errorMessage, logger } from '../utils/logger';

export type DrainChain = Pick<
    ChainClient,
    | 'getPool'
    | 'getTokenBalance'
    | 'burnTokens'
    | 'deposit'
    | 'withdraw'
    | 'swap'
    | 'getNativeBalance'
    | 'transferNative'
    | 'getOrCreateOperationalWallet'
>;

export type DrainWorkers = Pick<WorkerPool, 'getConfig' | 'isActive' | 'stop'>;

export interface DrainHandlerDeps {
    chain: DrainChain;
    workers: DrainWorkers;
    feeReserve?: number;
    swapMinOutputFraction?: number;
    now?: () => number;
}

/**
 * Decommissions a worker's holdings. The holding balance is burned before
 * anything else runs; the terminal operation afterwards only exercises the
 * contract path and its failure never undoes the burn.
 */
export class DrainHandler {
    private readonly feeReserve: number;
    private readonly swapMinOutputFraction: number;
    private readonly now: () => number;

    constructor(private readonly deps: DrainHandlerDeps) {
        this.feeReserve = deps.feeReserve ?? DRAIN_FEE_RESERVE;
        this.swapMinOutputFraction = deps.swapMinOutputFraction ?? DRAIN_SWAP_MIN_OUTPUT_FRACTION;
        this.now = deps.now ?? Date.now;
    }

    public async drain(workerId: string): Promise<DrainResult> {
        const config = await this.deps.workers.getConfig(workerId);
        if (!config) {
            throw new WorkerNotFoundError(workerId);
        }
        if (this.deps.workers.isActive(workerId)) {
            logger.info(`[Drain] stopping ${workerId} before draining`);
            await this.deps.workers.stop(workerId);
        }

        const pool = await this.deps.chain.getPool(config.poolId);
        if (!pool) {
            throw new Error(`Pool ${config.poolId} for worker ${workerId} no longer exists`);
        }
        const mints = resolveWorkerMints(config, pool);
        const balance = await this.deps.chain.getTokenBalance(config.wallet.address, mints.holdingMint);

        const result: DrainResult = {
            workerId,
            kind: config.kind,
            status: 'nothing_to_drain',
            tokensBurned: 0,
            operationAttempted: false,
            operationSucceeded: false,
            outputBurned: 0,
            networkFeePaid: 0,
            nativeSwept: 0,
            completedAt: 0,
        };
        if (balance <= 0) {
            logger.info(`[Drain] ${workerId} holds nothing to drain`);
            result.completedAt = this.now();
            return result;
        }

        try {
            await this.deps.chain.burnTokens(config.wallet, mints.holdingMint, balance);
            result.tokensBurned = balance;
            logger.info(`[Drain] ${workerId} burned ${balance} of ${mints.holdingMint}`);
        } catch (error) {
            logger.error(`[Drain] ${workerId} burn failed: ${String(error)}`);
            result.status = 'burn_failed';
            result.burnError = errorMessage(error);
            result.completedAt = this.now();
            return result;
        }

        result.operationAttempted = true;
        try {
            const receipt = await this.runTerminalOperation(config, pool, mints.holdingMint, balance);
            result.operationSucceeded = true;
            result.signature = receipt.signature;
            result.networkFeePaid = receipt.networkFee;
            result.status = 'completed';
            await this.burnOutput(config, mints.outputMint, receipt, result);
        } catch (error) {
            logger.warn(`[Drain] ${workerId} terminal ${config.kind} failed after burn: ${String(error)}`);
            result.status = 'operation_failed';
            result.operationError = errorMessage(error);
        }

        await this.sweepNative(config, result);
        result.completedAt = this.now();
        logger.info(`[Drain] ${workerId} finished: ${result.status} (burned ${result.tokensBurned + result.outputBurned})`);
        return result;
    }

    private runTerminalOperation(
        config: WorkerConfig,
        pool: PoolState,
        holdingMint: string,
        amount: number,
    ): Promise<OperationReceipt> {
        if (config.kind === 'deposit') {
            return this.deps.chain.deposit({
                wallet: config.wallet,
                poolId: pool.poolId,
                mint: holdingMint,
                amount,
                computeUnits: getComputeBudget('process_liquidity_deposit'),
            });
        }
        if (config.kind === 'withdrawal') {
            return this.deps.chain.withdraw({
                wallet: config.wallet,
                poolId: pool.poolId,
                mint: config.tokenSide === 'A' ? pool.tokenAMint : pool.tokenBMint,
                amount,
                computeUnits: getComputeBudget('process_liquidity_withdraw'),
            });
        }
        const direction = config.swapDirection ?? 'a_to_b';
        const expected = expectedSwapOutput(poolRatioFromState(pool), direction, amount);
        return this.deps.chain.swap({
            wallet: config.wallet,
            poolId: pool.poolId,
            direction,
            amount,
            minimumOutput: Math.floor(expected * this.swapMinOutputFraction),
            computeUnits: getComputeBudget('process_swap_execute'),
        });
    }

    private async burnOutput(
        config: WorkerConfig,
        outputMint: string,
        receipt: OperationReceipt,
        result: DrainResult,
    ): Promise<void> {
        if (receipt.outputAmount <= 0) {
            return;
        }
        try {
            await this.deps.chain.burnTokens(config.wallet, outputMint, receipt.outputAmount);
            result.outputBurned = receipt.outputAmount;
        } catch (error) {
            logger.error(`[Drain] ${config.id} output burn failed: ${String(error)}`);
            result.burnError = errorMessage(error);
        }
    }

    private async sweepNative(config: WorkerConfig, result: DrainResult): Promise<void> {
        try {
            const native = await this.deps.chain.getNativeBalance(config.wallet.address);
            const sweepable = native - this.feeReserve;
            if (sweepable <= 0) {
                return;
            }
            const operational = await this.deps.chain.getOrCreateOperationalWallet();
            await this.deps.chain.transferNative(config.wallet, operational.address, sweepable);
            result.nativeSwept = sweepable;
        } catch (error) {
            logger.error(`[Drain] ${config.id} native sweep failed: ${String(error)}`);
            result.sweepError = errorMessage(error);
        }
    }
}
