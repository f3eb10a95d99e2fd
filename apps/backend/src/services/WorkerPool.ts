import { randomBytes } from 'crypto';
import type {
    SwapDirection,
    TokenSide,
    WorkerConfig,
    WorkerErrorRecord,
    WorkerKind,
    WorkerStatistics,
    WorkerStatus,
} from '@stress-harness/shared';
import type { ChainClient, OperationReceipt, PoolState, StateStore } from '../types/backend-types';
import {
    ALLOW_AIRDROP,
    AUTO_REFILL_THRESHOLD,
    DEPOSIT_MAX_BALANCE_FRACTION,
    SWAP_MAX_BALANCE_FRACTION,
    WITHDRAWAL_MAX_BALANCE_FRACTION,
    WORKER_ERROR_BACKOFF_MS,
    WORKER_MAX_ATTEMPTS_PER_OPERATION,
    WORKER_MAX_DELAY_MS,
    WORKER_MIN_DELAY_MS,
    WORKER_MIN_NATIVE_BALANCE,
    WORKER_NATIVE_FUNDING_AMOUNT,
    WORKER_PAUSED_POLL_MS,
    WORKER_STOP_TIMEOUT_MS,
} from '../config/constants';
import { classifyContractError, createErrorRecovery, type ErrorRecovery } from '../modules/errors/errorClassifier';
import { cancellableDelay, withTimeout } from '../modules/runtime/cancellation';
import type { SystemStateReader } from '../modules/runtime/systemState';
import { createWorkerContext, type WorkerContext } from '../modules/workers/workerContext';
import {
    createWorkerOperations,
    resolveWorkerMints,
    type OperationSizing,
    type PreparedOperation,
    type WorkerOperations,
} from '../modules/workers/workerOperations';
import { errorMessage, logger } from '../utils/logger';

export class WorkerNotFoundError extends Error {
    constructor(workerId: string) {
        super(`Worker ${workerId} not found`);
        this.name = 'WorkerNotFoundError';
    }
}

export class WorkerStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkerStateError';
    }
}

export class InvalidWorkerRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidWorkerRequestError';
    }
}

export type CreateWorkerRequest = {
    kind: WorkerKind;
    poolId: string;
    tokenSide: TokenSide;
    swapDirection?: SwapDirection;
    initialAmount: number;
    autoRefill: boolean;
    shareOutput: boolean;
};

export type WorkerPoolConfig = {
    minDelayMs: number;
    maxDelayMs: number;
    errorBackoffMs: number;
    pausedPollMs: number;
    stopTimeoutMs: number;
    maxAttemptsPerOperation: number;
    minNativeBalance: number;
    nativeFundingAmount: number;
    allowAirdrop: boolean;
    sizing: OperationSizing;
};

export const DEFAULT_WORKER_POOL_CONFIG: WorkerPoolConfig = {
    minDelayMs: WORKER_MIN_DELAY_MS,
    maxDelayMs: WORKER_MAX_DELAY_MS,
    errorBackoffMs: WORKER_ERROR_BACKOFF_MS,
    pausedPollMs: WORKER_PAUSED_POLL_MS,
    stopTimeoutMs: WORKER_STOP_TIMEOUT_MS,
    maxAttemptsPerOperation: WORKER_MAX_ATTEMPTS_PER_OPERATION,
    minNativeBalance: WORKER_MIN_NATIVE_BALANCE,
    nativeFundingAmount: WORKER_NATIVE_FUNDING_AMOUNT,
    allowAirdrop: ALLOW_AIRDROP,
    sizing: {
        depositMaxFraction: DEPOSIT_MAX_BALANCE_FRACTION,
        withdrawalMaxFraction: WITHDRAWAL_MAX_BALANCE_FRACTION,
        swapMaxFraction: SWAP_MAX_BALANCE_FRACTION,
        autoRefillThreshold: AUTO_REFILL_THRESHOLD,
    },
};

export interface WorkerPoolDeps {
    chain: ChainClient;
    store: StateStore;
    systemState: SystemStateReader;
    recovery?: ErrorRecovery;
    config?: Partial<WorkerPoolConfig>;
    random?: () => number;
    now?: () => number;
}

type WorkerHandle = {
    controller: AbortController;
    done: Promise<void>;
};

// A start still funding its wallet; a halt in the meantime cancels it.
type StartClaim = {
    haltedAs: 'paused' | 'stopped' | null;
};

const PEER_KIND: Record<WorkerKind, WorkerKind> = {
    deposit: 'withdrawal',
    withdrawal: 'deposit',
    swap: 'swap',
};

function zeroStatistics(workerId: string): WorkerStatistics {
    return {
        workerId,
        successfulOperations: 0,
        failedOperations: 0,
        totalVolumeProcessed: 0,
        totalFeesPaid: 0,
        lastOperationAt: null,
        lastError: null,
    };
}

/**
 * Owns every worker's configuration, statistics and loop. Each running worker
 * is an independent async task cancelled through its own AbortController.
 */
export class WorkerPool {
    private readonly configs = new Map<string, WorkerConfig>();
    private readonly statistics = new Map<string, WorkerStatistics>();
    private readonly handles = new Map<string, WorkerHandle>();
    private readonly starting = new Map<string, StartClaim>();
    private closed = false;
    private readonly settings: WorkerPoolConfig;
    private readonly recovery: ErrorRecovery;
    private readonly operations: WorkerOperations;
    private readonly random: () => number;
    private readonly now: () => number;

    constructor(private readonly deps: WorkerPoolDeps) {
        this.settings = { ...DEFAULT_WORKER_POOL_CONFIG, ...deps.config };
        this.random = deps.random ?? Math.random;
        this.now = deps.now ?? Date.now;
        this.recovery = deps.recovery ?? createErrorRecovery({
            chain: deps.chain,
            autoRefillThreshold: this.settings.sizing.autoRefillThreshold,
        });
        this.operations = createWorkerOperations({
            chain: deps.chain,
            sizing: this.settings.sizing,
            random: this.random,
            findPeer: (config) => this.findPeer(config),
        });
    }

    public async create(request: CreateWorkerRequest): Promise<string> {
        if (!Number.isSafeInteger(request.initialAmount) || request.initialAmount < 0) {
            throw new InvalidWorkerRequestError('initialAmount must be a non-negative safe integer');
        }
        if (request.kind === 'swap' && !request.swapDirection) {
            throw new InvalidWorkerRequestError('swap workers require a swapDirection');
        }
        const pool = await this.deps.chain.getPool(request.poolId);
        if (!pool) {
            throw new InvalidWorkerRequestError(`Pool ${request.poolId} does not exist`);
        }

        const wallet = await this.deps.chain.generateWallet();
        const id = `${request.kind}_${randomBytes(16).toString('hex')}`;
        const config: WorkerConfig = {
            id,
            kind: request.kind,
            poolId: pool.poolId,
            tokenSide: request.tokenSide,
            swapDirection: request.kind === 'swap' ? request.swapDirection : undefined,
            wallet,
            initialAmount: request.initialAmount,
            autoRefill: request.autoRefill,
            shareOutput: request.shareOutput,
            status: 'created',
            createdAt: this.now(),
            lastOperationAt: null,
        };
        const statistics = zeroStatistics(id);

        await this.deps.store.saveWorkerConfig(config);
        await this.deps.store.saveWorkerStatistics(statistics);
        this.configs.set(id, config);
        this.statistics.set(id, statistics);
        logger.info(`[WorkerPool] created ${id} on pool ${pool.poolId.slice(0, 12)} (wallet ${wallet.address})`);
        return id;
    }

    public async start(workerId: string): Promise<void> {
        const config = await this.requireConfig(workerId);
        // Checked and claimed without an await in between.
        if (this.closed) {
            throw new WorkerStateError(`Worker pool is closed; ${workerId} cannot start`);
        }
        if (this.handles.has(workerId) || config.status === 'running') {
            throw new WorkerStateError(`Worker ${workerId} is already running`);
        }
        if (this.starting.has(workerId)) {
            throw new WorkerStateError(`Worker ${workerId} is already starting`);
        }
        if (config.status === 'stopping') {
            throw new WorkerStateError(`Worker ${workerId} is still stopping`);
        }
        const claim: StartClaim = { haltedAs: null };
        this.starting.set(workerId, claim);

        let pool: PoolState;
        try {
            const found = await this.deps.chain.getPool(config.poolId);
            if (!found) {
                throw new Error(`Pool ${config.poolId} no longer exists`);
            }
            pool = found;
            const restored = await this.deps.chain.restoreWallet(config.wallet.secret);
            if (restored.address !== config.wallet.address) {
                throw new Error(`Restored wallet ${restored.address} does not match ${config.wallet.address}`);
            }
            await this.ensureFunding(config, pool);
        } catch (error) {
            this.starting.delete(workerId);
            logger.error(`[WorkerPool] failed to start ${workerId}: ${String(error)}`);
            await this.setStatus(config, 'failed');
            throw error;
        }

        this.starting.delete(workerId);
        if (claim.haltedAs !== null) {
            if (this.configs.has(workerId)) {
                await this.setStatus(config, claim.haltedAs);
            }
            throw new WorkerStateError(`Start of ${workerId} was cancelled by a ${claim.haltedAs === 'paused' ? 'pause' : 'stop'}`);
        }

        const controller = new AbortController();
        this.handles.set(workerId, {
            controller,
            done: this.runLoop(workerId, pool, controller.signal),
        });
        await this.setStatus(config, 'running');
        logger.info(`[WorkerPool] started ${workerId}`);
    }

    public async stop(workerId: string): Promise<void> {
        const config = await this.requireConfig(workerId);
        const handle = this.handles.get(workerId);
        if (!handle) {
            const claim = this.starting.get(workerId);
            if (claim) {
                claim.haltedAs = 'stopped';
                logger.info(`[WorkerPool] ${workerId} will stop once its start settles`);
            } else if (config.status === 'running' || config.status === 'paused') {
                await this.setStatus(config, 'stopped');
            } else {
                logger.info(`[WorkerPool] ${workerId} is not running (${config.status})`);
            }
            return;
        }

        handle.controller.abort();
        this.handles.delete(workerId);
        await this.setStatus(config, 'stopping');
        await this.awaitExit(workerId, handle);
        await this.setStatus(config, 'stopped');
        logger.info(`[WorkerPool] stopped ${workerId}`);
    }

    public async pause(workerId: string): Promise<void> {
        const config = await this.requireConfig(workerId);
        const handle = this.handles.get(workerId);
        if (!handle) {
            throw new WorkerStateError(`Worker ${workerId} is not running`);
        }
        handle.controller.abort();
        this.handles.delete(workerId);
        await this.awaitExit(workerId, handle);
        await this.setStatus(config, 'paused');
    }

    /** Cancels every running loop and keeps the workers for a later resume. */
    public async pauseAll(): Promise<number> {
        return this.haltAll('paused');
    }

    public async resumePaused(): Promise<number> {
        const paused = Array.from(this.configs.values()).filter((config) => config.status === 'paused');
        let resumed = 0;
        for (const config of paused) {
            try {
                await this.start(config.id);
                resumed += 1;
            } catch (error) {
                logger.error(`[WorkerPool] resume of ${config.id} failed: ${String(error)}`);
            }
        }
        return resumed;
    }

    /**
     * Aborts every loop in one synchronous pass before awaiting any of them,
     * so no worker starts another operation while the others shut down.
     */
    public async forceStopAll(): Promise<number> {
        const halted = await this.haltAll('stopped');
        for (const config of this.configs.values()) {
            if (config.status === 'paused') {
                await this.setStatus(config, 'stopped');
            }
        }
        return halted;
    }

    /** Force-stops everything and refuses further starts. Used when the engine shuts down. */
    public async close(): Promise<number> {
        this.closed = true;
        return this.forceStopAll();
    }

    public async stopAllForPool(poolId: string, includeSwaps: boolean): Promise<number> {
        const targets = Array.from(this.configs.values()).filter((config) => (
            config.poolId === poolId
            && this.handles.has(config.id)
            && (includeSwaps || config.kind !== 'swap')
        ));
        await Promise.all(targets.map((config) => this.stop(config.id)));
        if (targets.length > 0) {
            logger.info(`[WorkerPool] stopped ${targets.length} worker(s) on pool ${poolId.slice(0, 12)}`);
        }
        return targets.length;
    }

    public async delete(workerId: string): Promise<void> {
        const config = await this.requireConfig(workerId);
        if (this.handles.has(workerId) || this.starting.has(workerId) || config.status === 'paused') {
            await this.stop(workerId);
        }
        await this.deps.store.deleteWorker(workerId);
        this.configs.delete(workerId);
        this.statistics.delete(workerId);
        logger.info(`[WorkerPool] deleted ${workerId}`);
    }

    public async getConfig(workerId: string): Promise<WorkerConfig | null> {
        const cached = this.configs.get(workerId);
        if (cached) {
            return { ...cached };
        }
        const stored = await this.deps.store.loadWorkerConfig(workerId);
        if (stored) {
            this.configs.set(workerId, stored);
            return { ...stored };
        }
        return null;
    }

    public listAll(): WorkerConfig[] {
        return Array.from(this.configs.values())
            .map((config) => ({ ...config }))
            .sort((left, right) => left.createdAt - right.createdAt);
    }

    public async getStatistics(workerId: string): Promise<WorkerStatistics | null> {
        const cached = this.statistics.get(workerId);
        if (cached) {
            return { ...cached };
        }
        const stored = await this.deps.store.loadWorkerStatistics(workerId);
        if (stored) {
            this.statistics.set(workerId, stored);
            return { ...stored };
        }
        return null;
    }

    public async getErrors(workerId: string): Promise<WorkerErrorRecord[]> {
        await this.requireConfig(workerId);
        return this.deps.store.loadWorkerErrors(workerId);
    }

    public getActiveLoopCount(): number {
        return this.handles.size;
    }

    public isActive(workerId: string): boolean {
        return this.handles.has(workerId);
    }

    /**
     * Loads every persisted worker. Records a previous process left mid-run
     * are marked stopped since their loops died with that process.
     */
    public async reconcile(): Promise<number> {
        const stored = await this.deps.store.loadAllWorkerConfigs();
        let reconciled = 0;
        for (const config of stored) {
            if (this.handles.has(config.id)) {
                continue;
            }
            this.configs.set(config.id, config);
            if (config.status === 'running' || config.status === 'stopping' || config.status === 'paused') {
                await this.setStatus(config, 'stopped');
                reconciled += 1;
            }
            const statistics = await this.deps.store.loadWorkerStatistics(config.id);
            this.statistics.set(config.id, statistics ?? zeroStatistics(config.id));
        }
        logger.info(`[WorkerPool] loaded ${stored.length} worker(s), reconciled ${reconciled}`);
        return reconciled;
    }

    // ── Internals ───────────────────────────────────────────────────

    private async requireConfig(workerId: string): Promise<WorkerConfig> {
        const cached = this.configs.get(workerId);
        if (cached) {
            return cached;
        }
        const stored = await this.deps.store.loadWorkerConfig(workerId);
        if (!stored) {
            throw new WorkerNotFoundError(workerId);
        }
        this.configs.set(workerId, stored);
        return stored;
    }

    private async setStatus(config: WorkerConfig, status: WorkerStatus): Promise<void> {
        config.status = status;
        try {
            await this.deps.store.saveWorkerConfig(config);
        } catch (error) {
            logger.error(`[WorkerPool] failed to persist ${config.id} status ${status}: ${String(error)}`);
        }
    }

    private async haltAll(status: 'paused' | 'stopped'): Promise<number> {
        const entries = Array.from(this.handles.entries());
        this.handles.clear();
        for (const claim of this.starting.values()) {
            claim.haltedAs = status;
        }
        for (const [, handle] of entries) {
            handle.controller.abort();
        }
        await Promise.all(entries.map(async ([workerId, handle]) => {
            const config = this.configs.get(workerId);
            if (config && status === 'stopped') {
                await this.setStatus(config, 'stopping');
            }
            await this.awaitExit(workerId, handle);
            if (config) {
                await this.setStatus(config, status);
            }
        }));
        if (entries.length > 0) {
            logger.info(`[WorkerPool] ${status} ${entries.length} worker loop(s)`);
        }
        return entries.length;
    }

    private async awaitExit(workerId: string, handle: WorkerHandle): Promise<void> {
        const result = await withTimeout(handle.done, this.settings.stopTimeoutMs);
        if (result === 'timeout') {
            logger.warn(`[WorkerPool] ${workerId} loop did not exit within ${this.settings.stopTimeoutMs}ms`);
        }
    }

    private async ensureFunding(config: WorkerConfig, pool: PoolState): Promise<void> {
        const address = config.wallet.address;
        const native = await this.deps.chain.getNativeBalance(address);
        if (native < this.settings.minNativeBalance) {
            const amount = this.settings.nativeFundingAmount;
            if (this.settings.allowAirdrop) {
                await this.deps.chain.requestNativeFunding(address, amount);
            } else {
                const operational = await this.deps.chain.getOrCreateOperationalWallet();
                await this.deps.chain.transferNative(operational, address, amount);
            }
            logger.info(`[WorkerPool] funded ${config.id} with ${amount} native units`);
        }

        const { spendMint } = resolveWorkerMints(config, pool);
        if (spendMint === null || config.initialAmount <= 0) {
            return;
        }
        const balance = await this.deps.chain.getTokenBalance(address, spendMint);
        if (balance === 0) {
            await this.deps.chain.mintTokens(address, spendMint, config.initialAmount);
            logger.info(`[WorkerPool] minted initial ${config.initialAmount} for ${config.id}`);
        }
    }

    private findPeer(config: WorkerConfig): WorkerConfig | null {
        const peerKind = PEER_KIND[config.kind];
        for (const candidate of this.configs.values()) {
            if (
                candidate.id === config.id
                || candidate.kind !== peerKind
                || candidate.poolId !== config.poolId
                || candidate.status !== 'running'
                || !this.handles.has(candidate.id)
            ) {
                continue;
            }
            const matches = config.kind === 'swap'
                ? candidate.swapDirection !== undefined && candidate.swapDirection !== config.swapDirection
                : candidate.tokenSide === config.tokenSide;
            if (matches) {
                return candidate;
            }
        }
        return null;
    }

    private nextDelayMs(): number {
        const span = Math.max(0, this.settings.maxDelayMs - this.settings.minDelayMs);
        return this.settings.minDelayMs + Math.floor(this.random() * (span + 1));
    }

    private async runLoop(workerId: string, pool: PoolState, signal: AbortSignal): Promise<void> {
        logger.info(`[WorkerPool] ${workerId} loop started`);
        while (!signal.aborted) {
            if (this.deps.systemState.isPaused()) {
                await cancellableDelay(this.settings.pausedPollMs, signal);
                continue;
            }
            try {
                await this.runIteration(workerId, pool, signal);
                await cancellableDelay(this.nextDelayMs(), signal);
            } catch (error) {
                logger.error(`[WorkerPool] ${workerId} unexpected error: ${String(error)}`);
                await this.recordFailure(workerId, 'iteration', error);
                await cancellableDelay(this.settings.errorBackoffMs, signal);
            }
        }
        logger.info(`[WorkerPool] ${workerId} loop exited`);
    }

    private async runIteration(workerId: string, pool: PoolState, signal: AbortSignal): Promise<void> {
        const config = this.configs.get(workerId);
        if (!config) {
            return;
        }
        const context = createWorkerContext(config, resolveWorkerMints(config, pool).spendMint);
        const operation = await this.prepareWithRecovery(config, pool, context, signal);
        if (!operation) {
            return;
        }
        context.lastOperation = operation.name;
        context.retryCount = 0;

        for (let attempt = 1; attempt <= this.settings.maxAttemptsPerOperation; attempt += 1) {
            if (signal.aborted) {
                return;
            }
            try {
                const receipt = await operation.execute(context);
                await this.recordSuccess(config, operation.amount, receipt);
                try {
                    await operation.shareOutput(receipt);
                } catch (error) {
                    logger.warn(`[WorkerPool] ${workerId} output sharing failed: ${String(error)}`);
                }
                return;
            } catch (error) {
                await this.recordFailure(workerId, operation.name, error);
                context.retryCount = attempt;
                const outcome = await this.recovery.handle(error, context, signal);
                if (outcome.action !== 'retry') {
                    return;
                }
            }
        }
        logger.warn(
            `[WorkerPool] ${workerId} ${operation.name} abandoned after ${this.settings.maxAttemptsPerOperation} attempts`,
        );
    }

    // Balance reads and refills fail like any other chain call and get the same recovery policy.
    private async prepareWithRecovery(
        config: WorkerConfig,
        pool: PoolState,
        context: WorkerContext,
        signal: AbortSignal,
    ): Promise<PreparedOperation | null> {
        for (let attempt = 1; attempt <= this.settings.maxAttemptsPerOperation; attempt += 1) {
            if (signal.aborted) {
                return null;
            }
            try {
                return await this.operations.prepare(config, pool);
            } catch (error) {
                await this.recordFailure(config.id, 'prepare', error);
                context.retryCount = attempt;
                const outcome = await this.recovery.handle(error, context, signal);
                if (outcome.action !== 'retry') {
                    return null;
                }
            }
        }
        return null;
    }

    private async recordSuccess(config: WorkerConfig, amount: number, receipt: OperationReceipt): Promise<void> {
        const timestamp = this.now();
        const current = this.statistics.get(config.id) ?? zeroStatistics(config.id);
        const next: WorkerStatistics = {
            ...current,
            successfulOperations: current.successfulOperations + 1,
            totalVolumeProcessed: current.totalVolumeProcessed + amount,
            totalFeesPaid: current.totalFeesPaid + receipt.networkFee,
            lastOperationAt: timestamp,
        };
        this.statistics.set(config.id, next);
        config.lastOperationAt = timestamp;
        try {
            await this.deps.store.saveWorkerStatistics(next);
            await this.deps.store.saveWorkerConfig(config);
        } catch (error) {
            logger.error(`[WorkerPool] failed to persist statistics for ${config.id}: ${String(error)}`);
        }
    }

    private async recordFailure(workerId: string, operation: string, error: unknown): Promise<void> {
        const classification = classifyContractError(error);
        const message = errorMessage(error);
        const current = this.statistics.get(workerId) ?? zeroStatistics(workerId);
        const next: WorkerStatistics = {
            ...current,
            failedOperations: current.failedOperations + 1,
            lastError: message,
        };
        this.statistics.set(workerId, next);
        const record: WorkerErrorRecord = {
            timestamp: this.now(),
            operation,
            message,
            ...(classification.code === undefined ? {} : { code: classification.code }),
        };
        try {
            await this.deps.store.saveWorkerStatistics(next);
            await this.deps.store.appendWorkerError(workerId, record);
        } catch (persistError) {
            logger.error(`[WorkerPool] failed to persist error for ${workerId}: ${String(persistError)}`);
        }
    }
}
