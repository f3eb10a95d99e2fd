import type { WorkerConfig, WorkerKind } from '@stress-harness/shared';
import { INITIAL_SLIPPAGE_TOLERANCE } from '../../config/constants';
import type { WorkerOperationName } from '../budget/computeBudget';

/**
 * Per-iteration runtime state. Built fresh from the persisted config at the top
 * of every loop iteration and shared by all retries of that iteration's operation.
 */
export type WorkerContext = {
    workerId: string;
    kind: WorkerKind;
    poolId: string;
    walletAddress: string;
    // Token the worker spends; null for withdrawal workers, which only hold LP tokens.
    refillMint: string | null;
    initialAmount: number;
    autoRefill: boolean;
    slippageTolerance: number;
    retryCount: number;
    unknownRetries: number;
    lastOperation: WorkerOperationName | null;
};

export function createWorkerContext(config: WorkerConfig, refillMint: string | null): WorkerContext {
    return {
        workerId: config.id,
        kind: config.kind,
        poolId: config.poolId,
        walletAddress: config.wallet.address,
        refillMint,
        initialAmount: config.initialAmount,
        autoRefill: config.autoRefill,
        slippageTolerance: INITIAL_SLIPPAGE_TOLERANCE,
        retryCount: 0,
        unknownRetries: 0,
        lastOperation: null,
    };
}
