/**
 * Shared configuration constants for the stress harness backend.
 * All values are initialized from process.env at module load time.
 */

// ── Persistence ─────────────────────────────────────────────────────
export const REDIS_KEY_PREFIX = (process.env.REDIS_KEY_PREFIX || 'stress:').trim();
export const WORKER_RECENT_ERRORS_LIMIT = Math.max(1, Number(process.env.WORKER_RECENT_ERRORS_LIMIT || '10'));

// ── Contract ────────────────────────────────────────────────────────
export const EXPECTED_CONTRACT_VERSION = (process.env.EXPECTED_CONTRACT_VERSION || '0.15.1054').trim();
export const MAX_SUPPORTED_CONTRACT_VERSION = (process.env.MAX_SUPPORTED_CONTRACT_VERSION || '0.19.9999').trim();
export const ALLOW_AIRDROP = process.env.ALLOW_AIRDROP !== 'false';

// 1 native coin = 10^9 base units.
export const NATIVE_DECIMALS = 9;
export const BASE_UNITS_PER_NATIVE = 10 ** NATIVE_DECIMALS;
export const BURN_ADDRESS = '11111111111111111111111111111111';

export const OPERATIONAL_WALLET_FUNDING_AMOUNT = 2 * BASE_UNITS_PER_NATIVE;

// ── Worker loop ─────────────────────────────────────────────────────
export const WORKER_MIN_DELAY_MS = Math.max(0, Number(process.env.WORKER_MIN_DELAY_MS || '750'));
export const WORKER_MAX_DELAY_MS = Math.max(
    WORKER_MIN_DELAY_MS,
    Number(process.env.WORKER_MAX_DELAY_MS || '2000'),
);
export const WORKER_ERROR_BACKOFF_MS = Math.max(100, Number(process.env.WORKER_ERROR_BACKOFF_MS || '5000'));
export const WORKER_PAUSED_POLL_MS = Math.max(50, Number(process.env.WORKER_PAUSED_POLL_MS || '1000'));
export const WORKER_STOP_TIMEOUT_MS = Math.max(100, Number(process.env.WORKER_STOP_TIMEOUT_MS || '10000'));
export const WORKER_MAX_ATTEMPTS_PER_OPERATION = Math.max(
    1,
    Number(process.env.WORKER_MAX_ATTEMPTS_PER_OPERATION || '10'),
);
export const WORKER_MIN_NATIVE_BALANCE = Math.floor(0.1 * BASE_UNITS_PER_NATIVE);
export const WORKER_NATIVE_FUNDING_AMOUNT = BASE_UNITS_PER_NATIVE;
export const AUTO_REFILL_THRESHOLD = Math.min(
    1,
    Math.max(0.01, Number(process.env.AUTO_REFILL_THRESHOLD || '0.1')),
);
export const DEPOSIT_MAX_BALANCE_FRACTION = 0.05;
export const WITHDRAWAL_MAX_BALANCE_FRACTION = 0.05;
export const SWAP_MAX_BALANCE_FRACTION = 0.02;
export const INITIAL_SLIPPAGE_TOLERANCE = 0.01;

// ── Recovery policies ───────────────────────────────────────────────
export const RECOVERY_REFILL_WAIT_MS = Math.max(0, Number(process.env.RECOVERY_REFILL_WAIT_MS || '5000'));
export const RECOVERY_POLL_INTERVAL_MS = Math.max(100, Number(process.env.RECOVERY_POLL_INTERVAL_MS || '30000'));
export const RECOVERY_POOL_PAUSE_MAX_POLLS = Math.max(1, Number(process.env.RECOVERY_POOL_PAUSE_MAX_POLLS || '120'));
export const RECOVERY_SYSTEM_PAUSE_MAX_POLLS = Math.max(1, Number(process.env.RECOVERY_SYSTEM_PAUSE_MAX_POLLS || '240'));
export const RECOVERY_SWAPS_PAUSE_MAX_POLLS = Math.max(1, Number(process.env.RECOVERY_SWAPS_PAUSE_MAX_POLLS || '60'));
export const RECOVERY_LIQUIDITY_WAIT_MS = Math.max(0, Number(process.env.RECOVERY_LIQUIDITY_WAIT_MS || '10000'));
export const RECOVERY_SLIPPAGE_WAIT_MS = Math.max(0, Number(process.env.RECOVERY_SLIPPAGE_WAIT_MS || '2000'));
export const RECOVERY_SLIPPAGE_MULTIPLIER = 1.5;
export const RECOVERY_SLIPPAGE_CAP = 0.1;
export const RECOVERY_UNKNOWN_RETRY_DELAY_MS = Math.max(0, Number(process.env.RECOVERY_UNKNOWN_RETRY_DELAY_MS || '5000'));
export const RECOVERY_UNKNOWN_MAX_RETRIES = Math.max(0, Number(process.env.RECOVERY_UNKNOWN_MAX_RETRIES || '3'));

// ── Drain ───────────────────────────────────────────────────────────
export const DRAIN_FEE_RESERVE = Math.max(5_000, Number(process.env.DRAIN_FEE_RESERVE || '10000'));
export const DRAIN_SWAP_MIN_OUTPUT_FRACTION = 0.9;

// ── Monitoring ──────────────────────────────────────────────────────
export const PERF_MONITOR_INTERVAL_MS = Math.max(1_000, Number(process.env.PERF_MONITOR_INTERVAL_MS || '30000'));

// ── Simulated chain bootstrap ───────────────────────────────────────
export const SIM_SEED_POOL = process.env.SIM_SEED_POOL !== 'false';
export const SIM_WORKERS_PER_KIND = Math.max(0, Number(process.env.SIM_WORKERS_PER_KIND || '1'));
export const SIM_WORKER_INITIAL_AMOUNT = Math.max(1, Number(process.env.SIM_WORKER_INITIAL_AMOUNT || '1000000000'));
