import type { WorkerConfig } from '@stress-harness/shared';
import type { ChainClient, OperationReceipt, PoolState } from '../../types/backend-types';
import { getComputeBudget, type WorkerOperationName } from '../budget/computeBudget';
import { expectedSwapOutput, poolRatioFromState } from '../pool/ratioNormalizer';
import type { WorkerContext } from './workerContext';
import { logger } from '../../utils/logger';

export type OperationSizing = {
    depositMaxFraction: number;
    withdrawalMaxFraction: number;
    swapMaxFraction: number;
    autoRefillThreshold: number;
};

export type PreparedOperation = {
    name: WorkerOperationName;
    amount: number;
    execute: (context: WorkerContext) => Promise<OperationReceipt>;
    // Hands the operation's output to a peer worker when output sharing is on.
    shareOutput: (receipt: OperationReceipt) => Promise<void>;
};

export type WorkerMints = {
    // Token the worker spends and refills; null for withdrawal workers.
    spendMint: string | null;
    // Token the worker accumulates and the drain burns.
    holdingMint: string;
    // Token the operation produces.
    outputMint: string;
};

interface WorkerOperationsDeps {
    chain: ChainClient;
    sizing: OperationSizing;
    random: () => number;
    findPeer: (config: WorkerConfig) => WorkerConfig | null;
}

function sideMint(pool: PoolState, side: WorkerConfig['tokenSide']): string {
    return side === 'A' ? pool.tokenAMint : pool.tokenBMint;
}

function sideLpMint(pool: PoolState, side: WorkerConfig['tokenSide']): string {
    return side === 'A' ? pool.lpMintA : pool.lpMintB;
}

export function resolveWorkerMints(config: WorkerConfig, pool: PoolState): WorkerMints {
    if (config.kind === 'deposit') {
        return {
            spendMint: sideMint(pool, config.tokenSide),
            holdingMint: sideMint(pool, config.tokenSide),
            outputMint: sideLpMint(pool, config.tokenSide),
        };
    }
    if (config.kind === 'withdrawal') {
        return {
            spendMint: null,
            holdingMint: sideLpMint(pool, config.tokenSide),
            outputMint: sideMint(pool, config.tokenSide),
        };
    }
    const aToB = config.swapDirection !== 'b_to_a';
    return {
        spendMint: aToB ? pool.tokenAMint : pool.tokenBMint,
        holdingMint: aToB ? pool.tokenAMint : pool.tokenBMint,
        outputMint: aToB ? pool.tokenBMint : pool.tokenAMint,
    };
}

export function createWorkerOperations(deps: WorkerOperationsDeps) {
    function pickAmount(balance: number, fraction: number): number {
        const cap = Math.max(1, Math.floor(balance * fraction));
        return Math.min(cap, 1 + Math.floor(deps.random() * cap));
    }

    async function refillIfLow(config: WorkerConfig, mint: string, balance: number): Promise<number> {
        if (!config.autoRefill || config.initialAmount <= 0) {
            return balance;
        }
        if (balance >= config.initialAmount * deps.sizing.autoRefillThreshold) {
            return balance;
        }
        await deps.chain.mintTokens(config.wallet.address, mint, config.initialAmount);
        logger.info(`[WorkerOps] ${config.id} auto-refilled ${config.initialAmount} (balance was ${balance})`);
        return balance + config.initialAmount;
    }

    async function shareWithPeer(config: WorkerConfig, mint: string, amount: number): Promise<void> {
        if (!config.shareOutput || amount <= 0) {
            return;
        }
        const peer = deps.findPeer(config);
        if (!peer) {
            logger.debug(`[WorkerOps] ${config.id} has no running peer to share ${amount} with`);
            return;
        }
        await deps.chain.transferTokens(config.wallet, peer.wallet.address, mint, amount);
        logger.debug(`[WorkerOps] ${config.id} shared ${amount} with ${peer.id}`);
    }

    /**
     * Sizes the next operation from the wallet's current balance. Returns null
     * when there is nothing to operate on this iteration.
     */
    async function prepare(config: WorkerConfig, pool: PoolState): Promise<PreparedOperation | null> {
        const mints = resolveWorkerMints(config, pool);
        let balance = await deps.chain.getTokenBalance(config.wallet.address, mints.holdingMint);
        if (mints.spendMint !== null) {
            balance = await refillIfLow(config, mints.spendMint, balance);
        }
        if (balance <= 0) {
            logger.debug(`[WorkerOps] ${config.id} has no balance to operate with, waiting`);
            return null;
        }

        if (config.kind === 'deposit') {
            const amount = pickAmount(balance, deps.sizing.depositMaxFraction);
            const computeUnits = getComputeBudget('process_liquidity_deposit');
            return {
                name: 'process_liquidity_deposit',
                amount,
                execute: () => deps.chain.deposit({
                    wallet: config.wallet,
                    poolId: pool.poolId,
                    mint: mints.holdingMint,
                    amount,
                    computeUnits,
                }),
                shareOutput: (receipt) => shareWithPeer(config, mints.outputMint, receipt.outputAmount),
            };
        }

        if (config.kind === 'withdrawal') {
            const amount = pickAmount(balance, deps.sizing.withdrawalMaxFraction);
            const computeUnits = getComputeBudget('process_liquidity_withdraw');
            return {
                name: 'process_liquidity_withdraw',
                amount,
                execute: () => deps.chain.withdraw({
                    wallet: config.wallet,
                    poolId: pool.poolId,
                    mint: mints.outputMint,
                    amount,
                    computeUnits,
                }),
                shareOutput: (receipt) => shareWithPeer(config, mints.outputMint, receipt.outputAmount),
            };
        }

        const direction = config.swapDirection ?? 'a_to_b';
        const amount = pickAmount(balance, deps.sizing.swapMaxFraction);
        const expected = expectedSwapOutput(poolRatioFromState(pool), direction, amount);
        const computeUnits = getComputeBudget('process_swap_execute');
        return {
            name: 'process_swap_execute',
            amount,
            // Slippage tolerance is read per attempt so a widened tolerance applies to the retry.
            execute: (attemptContext) => deps.chain.swap({
                wallet: config.wallet,
                poolId: pool.poolId,
                direction,
                amount,
                minimumOutput: Math.floor(expected * (1 - attemptContext.slippageTolerance)),
                computeUnits,
            }),
            shareOutput: (receipt) => shareWithPeer(config, mints.outputMint, receipt.outputAmount),
        };
    }

    return {
        prepare,
    };
}

export type WorkerOperations = ReturnType<typeof createWorkerOperations>;
