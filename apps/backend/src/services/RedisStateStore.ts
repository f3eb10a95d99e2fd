import { z } from 'zod';
import {
    WORKER_KINDS,
    WORKER_STATUSES,
    type WorkerConfig,
    type WorkerErrorRecord,
    type WorkerStatistics,
} from '@stress-harness/shared';
import type { PoolRegistryEntry, StateStore } from '../types/backend-types';
import { logger } from '../utils/logger';

export interface StateStoreRedisLike {
    readonly isOpen: boolean;
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<void>;
    del(keys: string[]): Promise<void>;
    sAdd(key: string, member: string): Promise<void>;
    sRem(key: string, member: string): Promise<void>;
    sMembers(key: string): Promise<string[]>;
    rPush(key: string, value: string): Promise<void>;
    lTrim(key: string, start: number, stop: number): Promise<void>;
    lRange(key: string, start: number, stop: number): Promise<string[]>;
}

export interface RedisStateStoreConfig {
    redisPrefix: string;
    recentErrorsLimit: number;
}

const amount = z.number().int().nonnegative().refine(Number.isSafeInteger, 'amount exceeds safe integer range');
const timestamp = z.number().int().nonnegative();

const walletSchema = z.object({
    address: z.string().min(1),
    secret: z.string().min(1),
});

const workerConfigSchema = z.object({
    id: z.string().min(1),
    kind: z.enum(WORKER_KINDS),
    poolId: z.string().min(1),
    tokenSide: z.enum(['A', 'B']),
    swapDirection: z.enum(['a_to_b', 'b_to_a']).optional(),
    wallet: walletSchema,
    initialAmount: amount,
    autoRefill: z.boolean(),
    shareOutput: z.boolean(),
    status: z.enum(WORKER_STATUSES),
    createdAt: timestamp,
    lastOperationAt: timestamp.nullable(),
});

const workerStatisticsSchema = z.object({
    workerId: z.string().min(1),
    successfulOperations: z.number().int().nonnegative(),
    failedOperations: z.number().int().nonnegative(),
    totalVolumeProcessed: amount,
    totalFeesPaid: amount,
    lastOperationAt: timestamp.nullable(),
    lastError: z.string().nullable(),
});

const workerErrorSchema = z.object({
    timestamp,
    operation: z.string(),
    message: z.string(),
    code: z.number().int().optional(),
});

const poolRegistrySchema = z.array(z.object({
    poolId: z.string().min(1),
    ratio: z.object({
        tokenA: z.string().min(1),
        tokenB: z.string().min(1),
        ratioANumerator: amount,
        ratioBDenominator: amount,
        poolId: z.string().min(1),
        wasSwapped: z.boolean(),
    }),
    tokenADecimals: z.number().int().min(0).max(18),
    tokenBDecimals: z.number().int().min(0).max(18),
    registeredAt: timestamp,
}));

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, label: string): T | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        logger.warn(`[StateStore] discarding unparseable ${label}: ${String(error)}`);
        return null;
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
        logger.warn(`[StateStore] discarding invalid ${label}: ${issues.join('; ')}`);
        return null;
    }
    return result.data;
}

export class RedisStateStore implements StateStore {
    constructor(
        private readonly redis: StateStoreRedisLike,
        private readonly config: RedisStateStoreConfig,
    ) { }

    private configKey(workerId: string): string {
        return `${this.config.redisPrefix}worker:config:${workerId}`;
    }

    private statsKey(workerId: string): string {
        return `${this.config.redisPrefix}worker:stats:${workerId}`;
    }

    private errorsKey(workerId: string): string {
        return `${this.config.redisPrefix}worker:errors:${workerId}`;
    }

    private get workerIndexKey(): string {
        return `${this.config.redisPrefix}workers`;
    }

    private get poolRegistryKey(): string {
        return `${this.config.redisPrefix}pools:registry`;
    }

    public async saveWorkerConfig(config: WorkerConfig): Promise<void> {
        await this.redis.set(this.configKey(config.id), JSON.stringify(config));
        await this.redis.sAdd(this.workerIndexKey, config.id);
    }

    public async loadWorkerConfig(workerId: string): Promise<WorkerConfig | null> {
        const raw = await this.redis.get(this.configKey(workerId));
        return raw === null ? null : parseJson(workerConfigSchema, raw, `worker config ${workerId}`);
    }

    public async loadAllWorkerConfigs(): Promise<WorkerConfig[]> {
        const ids = await this.redis.sMembers(this.workerIndexKey);
        const configs: WorkerConfig[] = [];
        for (const workerId of ids.sort()) {
            const config = await this.loadWorkerConfig(workerId);
            if (config) {
                configs.push(config);
            } else {
                logger.warn(`[StateStore] worker ${workerId} is indexed but has no readable config`);
            }
        }
        return configs;
    }

    public async deleteWorker(workerId: string): Promise<void> {
        await this.redis.del([
            this.configKey(workerId),
            this.statsKey(workerId),
            this.errorsKey(workerId),
        ]);
        await this.redis.sRem(this.workerIndexKey, workerId);
    }

    public async saveWorkerStatistics(statistics: WorkerStatistics): Promise<void> {
        await this.redis.set(this.statsKey(statistics.workerId), JSON.stringify(statistics));
    }

    public async loadWorkerStatistics(workerId: string): Promise<WorkerStatistics | null> {
        const raw = await this.redis.get(this.statsKey(workerId));
        return raw === null ? null : parseJson(workerStatisticsSchema, raw, `worker statistics ${workerId}`);
    }

    public async appendWorkerError(workerId: string, record: WorkerErrorRecord): Promise<void> {
        const key = this.errorsKey(workerId);
        await this.redis.rPush(key, JSON.stringify(record));
        await this.redis.lTrim(key, -this.config.recentErrorsLimit, -1);
    }

    public async loadWorkerErrors(workerId: string): Promise<WorkerErrorRecord[]> {
        const rows = await this.redis.lRange(this.errorsKey(workerId), -this.config.recentErrorsLimit, -1);
        const records: WorkerErrorRecord[] = [];
        for (const row of rows) {
            const record = parseJson(workerErrorSchema, row, `error record for ${workerId}`);
            if (record) {
                records.push(record);
            }
        }
        return records;
    }

    public async loadPoolRegistry(): Promise<PoolRegistryEntry[]> {
        const raw = await this.redis.get(this.poolRegistryKey);
        if (raw === null) {
            return [];
        }
        return parseJson(poolRegistrySchema, raw, 'pool registry') ?? [];
    }

    public async savePoolRegistry(entries: PoolRegistryEntry[]): Promise<void> {
        await this.redis.set(this.poolRegistryKey, JSON.stringify(entries));
    }
}
