import { createHash } from 'crypto';
import type { PoolRatioConfig, SwapDirection } from '@stress-harness/shared';
import type { PoolState } from '../../types/backend-types';
import { logger } from '../../utils/logger';

export const EXTREME_RATE_HIGH = 1_000_000;
export const EXTREME_RATE_LOW = 0.000001;

export class PoolRatioError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PoolRatioError';
    }
}

export type PoolRatioValidation = {
    anchoredSide: 'A' | 'B';
    exchangeRate: number;
    extremeRate: boolean;
};

function assertPositiveAmount(value: number, label: string): void {
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new PoolRatioError(`${label} must be a positive safe integer (got ${value})`);
    }
}

export function compareTokenIdentities(left: string, right: string): number {
    return Buffer.compare(Buffer.from(left, 'utf8'), Buffer.from(right, 'utf8'));
}

export function derivePoolId(tokenA: string, tokenB: string): string {
    return createHash('sha256').update(`${tokenA}|${tokenB}`).digest('hex');
}

/**
 * Orders the pair so the byte-wise smaller identity is token A. The ratio sides
 * move with their tokens, so `ratioB / ratioA` stays the same after a swap.
 */
export function normalizePool(
    mintA: string,
    mintB: string,
    ratioA: number,
    ratioB: number,
): PoolRatioConfig {
    if (mintA.length === 0 || mintB.length === 0) {
        throw new PoolRatioError('token identities must be non-empty');
    }
    const order = compareTokenIdentities(mintA, mintB);
    if (order === 0) {
        throw new PoolRatioError('a pool needs two distinct tokens');
    }
    assertPositiveAmount(ratioA, 'ratioA');
    assertPositiveAmount(ratioB, 'ratioB');

    const wasSwapped = order > 0;
    const tokenA = wasSwapped ? mintB : mintA;
    const tokenB = wasSwapped ? mintA : mintB;
    return {
        tokenA,
        tokenB,
        ratioANumerator: wasSwapped ? ratioB : ratioA,
        ratioBDenominator: wasSwapped ? ratioA : ratioB,
        poolId: derivePoolId(tokenA, tokenB),
        wasSwapped,
    };
}

export function poolRatioFromState(pool: PoolState): PoolRatioConfig {
    return {
        tokenA: pool.tokenAMint,
        tokenB: pool.tokenBMint,
        ratioANumerator: pool.ratioANumerator,
        ratioBDenominator: pool.ratioBDenominator,
        poolId: pool.poolId,
        wasSwapped: false,
    };
}

export function exchangeRate(config: PoolRatioConfig): number {
    return config.ratioBDenominator / config.ratioANumerator;
}

export function formatExchangeRate(config: PoolRatioConfig, decimalsA: number, decimalsB: number): string {
    const wholeRate = (config.ratioBDenominator / 10 ** decimalsB) / (config.ratioANumerator / 10 ** decimalsA);
    return `1 A = ${wholeRate.toFixed(6)} B`;
}

export function validatePoolRatio(
    config: PoolRatioConfig,
    decimalsA: number,
    decimalsB: number,
): PoolRatioValidation {
    for (const [label, decimals] of [['decimalsA', decimalsA], ['decimalsB', decimalsB]] as const) {
        if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
            throw new PoolRatioError(`${label} must be an integer in [0, 18] (got ${decimals})`);
        }
    }
    assertPositiveAmount(config.ratioANumerator, 'ratioANumerator');
    assertPositiveAmount(config.ratioBDenominator, 'ratioBDenominator');

    const anchorA = config.ratioANumerator === 10 ** decimalsA;
    const anchorB = config.ratioBDenominator === 10 ** decimalsB;
    if (!anchorA && !anchorB) {
        throw new PoolRatioError(
            `neither side is anchored to one whole token `
            + `(A ${config.ratioANumerator} vs ${10 ** decimalsA}, B ${config.ratioBDenominator} vs ${10 ** decimalsB})`,
        );
    }

    const rate = exchangeRate(config);
    const extremeRate = rate > EXTREME_RATE_HIGH || rate < EXTREME_RATE_LOW;
    if (extremeRate) {
        logger.warn(`[RatioNormalizer] pool ${config.poolId} has an extreme exchange rate ${rate}`);
    }
    return {
        anchoredSide: anchorA ? 'A' : 'B',
        exchangeRate: rate,
        extremeRate,
    };
}

function scaleFloor(amount: number, numerator: number, denominator: number): number {
    // Products of two base-unit amounts routinely pass 2^53.
    return Number((BigInt(amount) * BigInt(numerator)) / BigInt(denominator));
}

export function expectedSwapOutput(config: PoolRatioConfig, direction: SwapDirection, amount: number): number {
    if (direction === 'a_to_b') {
        return scaleFloor(amount, config.ratioBDenominator, config.ratioANumerator);
    }
    return scaleFloor(amount, config.ratioANumerator, config.ratioBDenominator);
}
