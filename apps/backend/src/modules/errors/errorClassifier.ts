import type { ChainClient } from '../../types/backend-types';
import {
    AUTO_REFILL_THRESHOLD,
    RECOVERY_LIQUIDITY_WAIT_MS,
    RECOVERY_POLL_INTERVAL_MS,
    RECOVERY_POOL_PAUSE_MAX_POLLS,
    RECOVERY_REFILL_WAIT_MS,
    RECOVERY_SLIPPAGE_CAP,
    RECOVERY_SLIPPAGE_MULTIPLIER,
    RECOVERY_SLIPPAGE_WAIT_MS,
    RECOVERY_SWAPS_PAUSE_MAX_POLLS,
    RECOVERY_SYSTEM_PAUSE_MAX_POLLS,
    RECOVERY_UNKNOWN_MAX_RETRIES,
    RECOVERY_UNKNOWN_RETRY_DELAY_MS,
} from '../../config/constants';
import { errorMessage, logger } from '../../utils/logger';
import { cancellableDelay } from '../runtime/cancellation';
import type { WorkerContext } from '../workers/workerContext';
import { ContractErrorCode, describeContractError } from './contractErrors';

export type ContractErrorKind =
    | 'InsufficientFunds'
    | 'PoolPaused'
    | 'SystemPaused'
    | 'InsufficientLiquidity'
    | 'SlippageExceeded'
    | 'InvalidTokenAccount'
    | 'InvalidLpTokenType'
    | 'PoolSwapsPaused'
    | 'Unknown';

export type ErrorClassification = {
    kind: ContractErrorKind;
    code?: number;
    message: string;
};

export type RecoveryAction = 'retry' | 'continue' | 'cancelled';

export type RecoveryOutcome = ErrorClassification & {
    recovered: boolean;
    action: RecoveryAction;
    reason: string;
};

export type RecoveryTimings = {
    refillWaitMs: number;
    pollIntervalMs: number;
    poolPauseMaxPolls: number;
    systemPauseMaxPolls: number;
    swapsPauseMaxPolls: number;
    liquidityWaitMs: number;
    slippageWaitMs: number;
    slippageMultiplier: number;
    slippageCap: number;
    unknownRetryDelayMs: number;
    unknownMaxRetries: number;
};

export const DEFAULT_RECOVERY_TIMINGS: RecoveryTimings = {
    refillWaitMs: RECOVERY_REFILL_WAIT_MS,
    pollIntervalMs: RECOVERY_POLL_INTERVAL_MS,
    poolPauseMaxPolls: RECOVERY_POOL_PAUSE_MAX_POLLS,
    systemPauseMaxPolls: RECOVERY_SYSTEM_PAUSE_MAX_POLLS,
    swapsPauseMaxPolls: RECOVERY_SWAPS_PAUSE_MAX_POLLS,
    liquidityWaitMs: RECOVERY_LIQUIDITY_WAIT_MS,
    slippageWaitMs: RECOVERY_SLIPPAGE_WAIT_MS,
    slippageMultiplier: RECOVERY_SLIPPAGE_MULTIPLIER,
    slippageCap: RECOVERY_SLIPPAGE_CAP,
    unknownRetryDelayMs: RECOVERY_UNKNOWN_RETRY_DELAY_MS,
    unknownMaxRetries: RECOVERY_UNKNOWN_MAX_RETRIES,
};

const KIND_BY_CODE: ReadonlyMap<number, ContractErrorKind> = new Map<number, ContractErrorKind>([
    [ContractErrorCode.InsufficientFunds, 'InsufficientFunds'],
    [ContractErrorCode.PoolPaused, 'PoolPaused'],
    [ContractErrorCode.SystemPaused, 'SystemPaused'],
    [ContractErrorCode.InsufficientLiquidity, 'InsufficientLiquidity'],
    [ContractErrorCode.SlippageExceeded, 'SlippageExceeded'],
    [ContractErrorCode.InvalidTokenAccount, 'InvalidTokenAccount'],
    [ContractErrorCode.InvalidLpTokenType, 'InvalidLpTokenType'],
    [ContractErrorCode.PoolSwapsPaused, 'PoolSwapsPaused'],
]);

const CUSTOM_CODE_PATTERN = /Custom\((\d+)\)/;
const HEX_CODE_PATTERN = /0x[0-9a-fA-F]+\s*\((\d+)\)/;

export function extractContractErrorCode(text: string): number | null {
    const match = CUSTOM_CODE_PATTERN.exec(text) ?? HEX_CODE_PATTERN.exec(text);
    if (!match) {
        return null;
    }
    const code = Number(match[1]);
    return Number.isSafeInteger(code) ? code : null;
}

export function classifyContractError(raw: unknown): ErrorClassification {
    const message = errorMessage(raw);
    const code = extractContractErrorCode(message);
    if (code === null) {
        return { kind: 'Unknown', message };
    }
    return {
        kind: KIND_BY_CODE.get(code) ?? 'Unknown',
        code,
        message,
    };
}

export type RecoveryChain = Pick<
    ChainClient,
    'getTokenBalance' | 'mintTokens' | 'isPoolPaused' | 'isSystemPaused' | 'arePoolSwapsPaused'
>;

export interface ErrorRecoveryDeps {
    chain: RecoveryChain;
    timings?: Partial<RecoveryTimings>;
    autoRefillThreshold?: number;
}

type PollResult = 'clear' | 'timeout' | 'cancelled';

export function createErrorRecovery(deps: ErrorRecoveryDeps) {
    const timings: RecoveryTimings = { ...DEFAULT_RECOVERY_TIMINGS, ...deps.timings };
    const refillThreshold = deps.autoRefillThreshold ?? AUTO_REFILL_THRESHOLD;

    async function pollUntilClear(
        label: string,
        context: WorkerContext,
        isStillPaused: () => Promise<boolean>,
        maxPolls: number,
        signal: AbortSignal,
    ): Promise<PollResult> {
        for (let poll = 1; poll <= maxPolls; poll += 1) {
            const waited = await cancellableDelay(timings.pollIntervalMs, signal);
            if (!waited) {
                return 'cancelled';
            }
            try {
                if (!(await isStillPaused())) {
                    logger.info(`[ErrorRecovery] ${context.workerId} ${label} cleared after ${poll} poll(s)`);
                    return 'clear';
                }
            } catch (error) {
                logger.warn(`[ErrorRecovery] ${context.workerId} ${label} check failed: ${String(error)}`);
            }
        }
        return 'timeout';
    }

    function fromPoll(classification: ErrorClassification, result: PollResult, label: string): RecoveryOutcome {
        if (result === 'clear') {
            return { ...classification, recovered: true, action: 'retry', reason: `${label} cleared` };
        }
        if (result === 'cancelled') {
            return { ...classification, recovered: false, action: 'cancelled', reason: 'cancelled while waiting' };
        }
        return { ...classification, recovered: false, action: 'continue', reason: `${label} poll limit reached` };
    }

    async function waitThenRetry(
        classification: ErrorClassification,
        ms: number,
        reason: string,
        signal: AbortSignal,
    ): Promise<RecoveryOutcome> {
        if (!(await cancellableDelay(ms, signal))) {
            return { ...classification, recovered: false, action: 'cancelled', reason: 'cancelled while waiting' };
        }
        return { ...classification, recovered: true, action: 'retry', reason };
    }

    async function refillIfBelowThreshold(context: WorkerContext): Promise<boolean> {
        if (!context.autoRefill || context.refillMint === null || context.initialAmount <= 0) {
            return false;
        }
        const balance = await deps.chain.getTokenBalance(context.walletAddress, context.refillMint);
        if (balance >= context.initialAmount * refillThreshold) {
            return false;
        }
        await deps.chain.mintTokens(context.walletAddress, context.refillMint, context.initialAmount);
        logger.info(`[ErrorRecovery] ${context.workerId} refilled ${context.initialAmount} (balance was ${balance})`);
        return true;
    }

    async function applyPolicy(
        classification: ErrorClassification,
        context: WorkerContext,
        signal: AbortSignal,
    ): Promise<RecoveryOutcome> {
        switch (classification.kind) {
            case 'InsufficientFunds': {
                try {
                    await refillIfBelowThreshold(context);
                } catch (error) {
                    logger.error(`[ErrorRecovery] ${context.workerId} refill failed: ${String(error)}`);
                    return { ...classification, recovered: false, action: 'continue', reason: 'refill failed' };
                }
                return waitThenRetry(classification, timings.refillWaitMs, 'funds refilled or awaited', signal);
            }
            case 'PoolPaused': {
                const result = await pollUntilClear(
                    'pool pause',
                    context,
                    () => deps.chain.isPoolPaused(context.poolId),
                    timings.poolPauseMaxPolls,
                    signal,
                );
                return fromPoll(classification, result, 'pool pause');
            }
            case 'SystemPaused': {
                const result = await pollUntilClear(
                    'system pause',
                    context,
                    () => deps.chain.isSystemPaused(),
                    timings.systemPauseMaxPolls,
                    signal,
                );
                return fromPoll(classification, result, 'system pause');
            }
            case 'InsufficientLiquidity': {
                if (context.kind === 'deposit') {
                    return { ...classification, recovered: false, action: 'continue', reason: 'unexpected for deposits' };
                }
                return waitThenRetry(classification, timings.liquidityWaitMs, 'liquidity wait elapsed', signal);
            }
            case 'SlippageExceeded': {
                const previous = context.slippageTolerance;
                context.slippageTolerance = Math.min(previous * timings.slippageMultiplier, timings.slippageCap);
                logger.info(
                    `[ErrorRecovery] ${context.workerId} slippage tolerance ${previous.toFixed(4)} -> ${context.slippageTolerance.toFixed(4)}`,
                );
                return waitThenRetry(classification, timings.slippageWaitMs, 'slippage tolerance raised', signal);
            }
            case 'InvalidTokenAccount':
            case 'InvalidLpTokenType':
                return { ...classification, recovered: false, action: 'continue', reason: 'configuration defect' };
            case 'PoolSwapsPaused': {
                if (context.kind !== 'swap') {
                    return { ...classification, recovered: false, action: 'continue', reason: 'swap pause ignored' };
                }
                const result = await pollUntilClear(
                    'swap pause',
                    context,
                    () => deps.chain.arePoolSwapsPaused(context.poolId),
                    timings.swapsPauseMaxPolls,
                    signal,
                );
                return fromPoll(classification, result, 'swap pause');
            }
            case 'Unknown': {
                if (context.unknownRetries >= timings.unknownMaxRetries) {
                    return { ...classification, recovered: false, action: 'continue', reason: 'retries exhausted' };
                }
                context.unknownRetries += 1;
                return waitThenRetry(
                    classification,
                    timings.unknownRetryDelayMs,
                    `unknown error retry ${context.unknownRetries}/${timings.unknownMaxRetries}`,
                    signal,
                );
            }
        }
    }

    /**
     * Runs the recovery policy for one failed operation. Always resolves; the
     * caller retries the same operation only when `action` is `retry`.
     */
    async function handle(raw: unknown, context: WorkerContext, signal: AbortSignal): Promise<RecoveryOutcome> {
        const classification = classifyContractError(raw);
        const label = classification.code === undefined
            ? classification.kind
            : `${classification.kind} (${classification.code}: ${describeContractError(classification.code)})`;
        logger.warn(`[ErrorRecovery] ${context.workerId} ${context.lastOperation ?? 'operation'} failed: ${label}`);

        try {
            const outcome = await applyPolicy(classification, context, signal);
            if (outcome.action === 'continue') {
                logger.warn(`[ErrorRecovery] ${context.workerId} giving up on operation: ${outcome.reason}`);
            }
            return outcome;
        } catch (error) {
            logger.error(`[ErrorRecovery] ${context.workerId} policy for ${classification.kind} threw: ${String(error)}`);
            return { ...classification, recovered: false, action: 'continue', reason: 'recovery policy failed' };
        }
    }

    return {
        handle,
        timings,
    };
}

export type ErrorRecovery = ReturnType<typeof createErrorRecovery>;
