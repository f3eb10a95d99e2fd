import { logger } from '../utils/logger';

type ValidationIssue = {
    key: string;
    message: string;
};

const VERSION_PATTERN = /^v?\d+\.\d+\.\d+$/;

function validateNumberEnv(
    issues: ValidationIssue[],
    name: string,
    bounds: { min: number; max: number },
    options: { required?: boolean; integer?: boolean } = {},
): void {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw.trim().length === 0) {
        if (options.required) {
            issues.push({
                key: name,
                message: `${name} is required`,
            });
        }
        return;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
        issues.push({
            key: name,
            message: `${name} must be a finite number`,
        });
        return;
    }
    if (options.integer && !Number.isInteger(parsed)) {
        issues.push({
            key: name,
            message: `${name} must be an integer (got ${parsed})`,
        });
        return;
    }
    if (parsed < bounds.min || parsed > bounds.max) {
        issues.push({
            key: name,
            message: `${name} out of range [${bounds.min}, ${bounds.max}] (got ${parsed})`,
        });
    }
}

function validateVersionEnv(issues: ValidationIssue[], name: string): void {
    const raw = process.env[name];
    if (raw === undefined || raw.trim().length === 0) {
        return;
    }
    if (!VERSION_PATTERN.test(raw.trim())) {
        issues.push({
            key: name,
            message: `${name} must look like 0.15.1054 (got "${raw}")`,
        });
    }
}

export function validateStartupConfigOrThrow(): void {
    const issues: ValidationIssue[] = [];

    validateNumberEnv(issues, 'WORKER_MIN_DELAY_MS', { min: 0, max: 60_000 });
    validateNumberEnv(issues, 'WORKER_MAX_DELAY_MS', { min: 0, max: 300_000 });
    validateNumberEnv(issues, 'WORKER_ERROR_BACKOFF_MS', { min: 100, max: 300_000 });
    validateNumberEnv(issues, 'WORKER_PAUSED_POLL_MS', { min: 50, max: 60_000 });
    validateNumberEnv(issues, 'WORKER_STOP_TIMEOUT_MS', { min: 100, max: 300_000 });
    validateNumberEnv(issues, 'WORKER_MAX_ATTEMPTS_PER_OPERATION', { min: 1, max: 100 }, { integer: true });
    validateNumberEnv(issues, 'WORKER_RECENT_ERRORS_LIMIT', { min: 1, max: 1_000 }, { integer: true });
    validateNumberEnv(issues, 'AUTO_REFILL_THRESHOLD', { min: 0.01, max: 1 });
    validateNumberEnv(issues, 'RECOVERY_REFILL_WAIT_MS', { min: 0, max: 300_000 });
    validateNumberEnv(issues, 'RECOVERY_POLL_INTERVAL_MS', { min: 100, max: 600_000 });
    validateNumberEnv(issues, 'RECOVERY_POOL_PAUSE_MAX_POLLS', { min: 1, max: 10_000 }, { integer: true });
    validateNumberEnv(issues, 'RECOVERY_SYSTEM_PAUSE_MAX_POLLS', { min: 1, max: 10_000 }, { integer: true });
    validateNumberEnv(issues, 'RECOVERY_SWAPS_PAUSE_MAX_POLLS', { min: 1, max: 10_000 }, { integer: true });
    validateNumberEnv(issues, 'RECOVERY_LIQUIDITY_WAIT_MS', { min: 0, max: 300_000 });
    validateNumberEnv(issues, 'RECOVERY_SLIPPAGE_WAIT_MS', { min: 0, max: 300_000 });
    validateNumberEnv(issues, 'RECOVERY_UNKNOWN_RETRY_DELAY_MS', { min: 0, max: 300_000 });
    validateNumberEnv(issues, 'RECOVERY_UNKNOWN_MAX_RETRIES', { min: 0, max: 20 }, { integer: true });
    validateNumberEnv(issues, 'DRAIN_FEE_RESERVE', { min: 5_000, max: 1_000_000_000 }, { integer: true });
    validateNumberEnv(issues, 'PERF_MONITOR_INTERVAL_MS', { min: 1_000, max: 3_600_000 });
    validateNumberEnv(issues, 'SIM_WORKERS_PER_KIND', { min: 0, max: 500 }, { integer: true });
    validateNumberEnv(issues, 'SIM_WORKER_INITIAL_AMOUNT', { min: 1, max: Number.MAX_SAFE_INTEGER }, { integer: true });
    validateVersionEnv(issues, 'EXPECTED_CONTRACT_VERSION');
    validateVersionEnv(issues, 'MAX_SUPPORTED_CONTRACT_VERSION');

    const minDelayRaw = process.env.WORKER_MIN_DELAY_MS;
    const maxDelayRaw = process.env.WORKER_MAX_DELAY_MS;
    if (minDelayRaw && maxDelayRaw) {
        const minDelay = Number(minDelayRaw);
        const maxDelay = Number(maxDelayRaw);
        if (Number.isFinite(minDelay) && Number.isFinite(maxDelay) && maxDelay < minDelay) {
            issues.push({
                key: 'WORKER_MAX_DELAY_MS',
                message: 'must be >= WORKER_MIN_DELAY_MS',
            });
        }
    }

    const redisUrl = process.env.REDIS_URL;
    if (redisUrl !== undefined && redisUrl.trim().length > 0 && !/^rediss?:\/\//.test(redisUrl.trim())) {
        issues.push({
            key: 'REDIS_URL',
            message: 'must start with redis:// or rediss://',
        });
    }

    if (issues.length > 0) {
        const details = issues.map((issue) => `- ${issue.key}: ${issue.message}`).join('\n');
        throw new Error(`Startup config validation failed:\n${details}`);
    }

    logger.info(`[Config] startup validation passed (airdrop=${process.env.ALLOW_AIRDROP === 'false' ? 'false' : 'true'})`);
}
