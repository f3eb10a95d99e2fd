import {
    DEFAULT_COMPUTE_UNITS,
    SMALL_DONATION_THRESHOLD,
    getComputeBudget,
} from './computeBudget';
import { logger } from '../../utils/logger';

describe('getComputeBudget', () => {
    beforeEach(() => {
        jest.spyOn(logger, 'warn').mockImplementation(() => logger);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('returns fixed budgets for worker operations', () => {
        expect(getComputeBudget('process_liquidity_deposit')).toBe(310_000);
        expect(getComputeBudget('process_liquidity_withdraw')).toBe(290_000);
        expect(getComputeBudget('process_swap_execute')).toBe(250_000);
        expect(getComputeBudget('process_pool_update_fees')).toBe(150_000);
    });

    it('scales consolidation with pool count and clamps it', () => {
        expect(getComputeBudget('process_consolidate_pool_fees', { poolCount: 5 })).toBe(29_000);
        expect(getComputeBudget('process_consolidate_pool_fees', { poolCount: 30 })).toBe(150_000);
        expect(getComputeBudget('process_consolidate_pool_fees', { poolCount: 0 })).toBe(4_000);
    });

    it('falls back to the static consolidation budget without a pool count', () => {
        expect(getComputeBudget('process_consolidate_pool_fees')).toBe(150_000);
    });

    it('picks the donation budget by amount', () => {
        expect(getComputeBudget('process_treasury_donate_sol', { donationAmount: SMALL_DONATION_THRESHOLD })).toBe(25_000);
        expect(getComputeBudget('process_treasury_donate_sol', { donationAmount: SMALL_DONATION_THRESHOLD + 1 })).toBe(120_000);
    });

    it('never fails closed on an unknown operation', () => {
        expect(getComputeBudget('process_mystery')).toBe(DEFAULT_COMPUTE_UNITS);
        expect(logger.warn).toHaveBeenCalledWith(
            '[ComputeBudget] unknown operation "process_mystery", using 150000 units',
        );
    });

    it('treats names inherited from Object.prototype as unknown operations', () => {
        expect(getComputeBudget('constructor')).toBe(DEFAULT_COMPUTE_UNITS);
        expect(getComputeBudget('toString')).toBe(DEFAULT_COMPUTE_UNITS);
        expect(getComputeBudget('__proto__')).toBe(DEFAULT_COMPUTE_UNITS);
        expect(logger.warn).toHaveBeenCalledTimes(3);
    });
});
