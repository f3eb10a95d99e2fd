import { BASE_UNITS_PER_NATIVE } from '../../config/constants';
import { logger } from '../../utils/logger';

export const DEFAULT_COMPUTE_UNITS = 150_000;
export const CONSOLIDATION_BASE_UNITS = 4_000;
export const CONSOLIDATION_UNITS_PER_POOL = 5_000;
export const SMALL_DONATION_UNITS = 25_000;
export const LARGE_DONATION_UNITS = 120_000;
export const SMALL_DONATION_THRESHOLD = 1_000 * BASE_UNITS_PER_NATIVE;

const STATIC_BUDGETS: ReadonlyMap<string, number> = new Map([
    ['process_liquidity_deposit', 310_000],
    ['process_liquidity_withdraw', 290_000],
    ['process_swap_execute', 250_000],
    ['process_pool_initialize', 150_000],
    ['process_consolidate_pool_fees', 150_000],
    ['process_treasury_donate_sol', 150_000],
    ['process_system_pause', 150_000],
    ['process_system_unpause', 150_000],
    ['process_treasury_withdraw_fees', 150_000],
    ['process_treasury_get_info', 150_000],
    ['process_pool_pause', 150_000],
    ['process_pool_unpause', 150_000],
    ['process_pool_update_fees', 150_000],
    ['process_swap_set_owner_only', 150_000],
]);

export type ComputeBudgetContext = {
    poolCount?: number;
    donationAmount?: number;
};

export type WorkerOperationName =
    | 'process_liquidity_deposit'
    | 'process_liquidity_withdraw'
    | 'process_swap_execute';

export function getComputeBudget(operation: string, context: ComputeBudgetContext = {}): number {
    if (operation === 'process_consolidate_pool_fees' && context.poolCount !== undefined) {
        const poolCount = Math.max(0, Math.floor(context.poolCount));
        return Math.min(CONSOLIDATION_BASE_UNITS + CONSOLIDATION_UNITS_PER_POOL * poolCount, DEFAULT_COMPUTE_UNITS);
    }
    if (operation === 'process_treasury_donate_sol' && context.donationAmount !== undefined) {
        return context.donationAmount <= SMALL_DONATION_THRESHOLD ? SMALL_DONATION_UNITS : LARGE_DONATION_UNITS;
    }

    const units = STATIC_BUDGETS.get(operation);
    if (units === undefined) {
        logger.warn(`[ComputeBudget] unknown operation "${operation}", using ${DEFAULT_COMPUTE_UNITS} units`);
        return DEFAULT_COMPUTE_UNITS;
    }
    return units;
}
