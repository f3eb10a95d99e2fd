import type { ChainClient, PoolRegistryEntry, PoolState, StateStore } from '../types/backend-types';
import { PoolRatioError, poolRatioFromState, validatePoolRatio } from '../modules/pool/ratioNormalizer';
import { logger } from '../utils/logger';

export class PoolNotFoundError extends Error {
    constructor(poolId: string) {
        super(`Pool ${poolId} does not exist on chain`);
        this.name = 'PoolNotFoundError';
    }
}

function toEntry(pool: PoolState, registeredAt: number): PoolRegistryEntry {
    const ratio = poolRatioFromState(pool);
    validatePoolRatio(ratio, pool.tokenADecimals, pool.tokenBDecimals);
    return {
        poolId: pool.poolId,
        ratio,
        tokenADecimals: pool.tokenADecimals,
        tokenBDecimals: pool.tokenBDecimals,
        registeredAt,
    };
}

function sameEntry(left: PoolRegistryEntry, right: PoolRegistryEntry): boolean {
    return left.tokenADecimals === right.tokenADecimals
        && left.tokenBDecimals === right.tokenBDecimals
        && left.ratio.tokenA === right.ratio.tokenA
        && left.ratio.tokenB === right.ratio.tokenB
        && left.ratio.ratioANumerator === right.ratio.ratioANumerator
        && left.ratio.ratioBDenominator === right.ratio.ratioBDenominator;
}

export interface PoolRegistryDeps {
    chain: Pick<ChainClient, 'getPool'>;
    store: StateStore;
    now?: () => number;
}

/** Pools the harness has registered for testing, persisted across restarts. */
export class PoolRegistry {
    private readonly entries = new Map<string, PoolRegistryEntry>();
    private readonly now: () => number;

    constructor(private readonly deps: PoolRegistryDeps) {
        this.now = deps.now ?? Date.now;
    }

    /**
     * Loads the persisted registry and revalidates every entry against the
     * pool's current on-chain state. Pools that are gone or whose ratio no
     * longer passes the anchor check are dropped. Returns the number kept.
     */
    public async load(): Promise<number> {
        const stored = await this.deps.store.loadPoolRegistry();
        this.entries.clear();
        let dropped = 0;
        let refreshed = 0;
        for (const entry of stored) {
            const pool = await this.deps.chain.getPool(entry.poolId);
            if (!pool) {
                logger.warn(`[PoolRegistry] dropping ${entry.poolId}: pool no longer exists`);
                dropped += 1;
                continue;
            }
            let current: PoolRegistryEntry;
            try {
                current = toEntry(pool, entry.registeredAt);
            } catch (error) {
                if (!(error instanceof PoolRatioError)) {
                    throw error;
                }
                logger.warn(`[PoolRegistry] dropping ${entry.poolId}: ${error.message}`);
                dropped += 1;
                continue;
            }
            if (!sameEntry(entry, current)) {
                refreshed += 1;
            }
            this.entries.set(current.poolId, current);
        }
        if (dropped > 0 || refreshed > 0) {
            await this.persist();
        }
        logger.info(`[PoolRegistry] loaded ${this.entries.size} pool(s), dropped ${dropped}, refreshed ${refreshed}`);
        return this.entries.size;
    }

    public async register(poolId: string): Promise<PoolRegistryEntry> {
        const existing = this.entries.get(poolId);
        if (existing) {
            return { ...existing };
        }
        const pool = await this.deps.chain.getPool(poolId);
        if (!pool) {
            throw new PoolNotFoundError(poolId);
        }
        const entry = toEntry(pool, this.now());
        this.entries.set(entry.poolId, entry);
        await this.persist();
        logger.info(`[PoolRegistry] registered ${entry.poolId}`);
        return { ...entry };
    }

    public async unregister(poolId: string): Promise<boolean> {
        if (!this.entries.delete(poolId)) {
            return false;
        }
        await this.persist();
        return true;
    }

    public get(poolId: string): PoolRegistryEntry | null {
        const entry = this.entries.get(poolId);
        return entry ? { ...entry } : null;
    }

    public list(): PoolRegistryEntry[] {
        return Array.from(this.entries.values())
            .map((entry) => ({ ...entry }))
            .sort((left, right) => left.registeredAt - right.registeredAt);
    }

    public count(): number {
        return this.entries.size;
    }

    private async persist(): Promise<void> {
        await this.deps.store.savePoolRegistry(Array.from(this.entries.values()));
    }
}
