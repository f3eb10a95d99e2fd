/**
 * Collaborator contracts consumed by the harness core.
 * The chain client and the state store are injected everywhere they are used
 * so the engine can run against a live cluster or an in-process double.
 */
import type {
    PoolRatioConfig,
    SwapDirection,
    WalletCredential,
    WorkerConfig,
    WorkerErrorRecord,
    WorkerStatistics,
} from '@stress-harness/shared';

// ── Chain client ────────────────────────────────────────────────────
export type OperationReceipt = {
    signature: string;
    inputAmount: number;
    outputAmount: number;
    networkFee: number;
};

export type PoolState = {
    poolId: string;
    tokenAMint: string;
    tokenBMint: string;
    tokenADecimals: number;
    tokenBDecimals: number;
    ratioANumerator: number;
    ratioBDenominator: number;
    lpMintA: string;
    lpMintB: string;
};

export type LiquidityRequest = {
    wallet: WalletCredential;
    poolId: string;
    mint: string;
    amount: number;
    computeUnits: number;
};

export type SwapRequest = {
    wallet: WalletCredential;
    poolId: string;
    direction: SwapDirection;
    amount: number;
    minimumOutput: number;
    computeUnits: number;
};

export interface ChainClient {
    generateWallet(): Promise<WalletCredential>;
    restoreWallet(secret: string): Promise<WalletCredential>;
    getNativeBalance(address: string): Promise<number>;
    getTokenBalance(address: string, mint: string): Promise<number>;
    getPool(poolId: string): Promise<PoolState | null>;
    deposit(request: LiquidityRequest): Promise<OperationReceipt>;
    withdraw(request: LiquidityRequest): Promise<OperationReceipt>;
    swap(request: SwapRequest): Promise<OperationReceipt>;
    mintTokens(address: string, mint: string, amount: number): Promise<string>;
    transferTokens(from: WalletCredential, toAddress: string, mint: string, amount: number): Promise<string>;
    burnTokens(wallet: WalletCredential, mint: string, amount: number): Promise<string>;
    transferNative(from: WalletCredential, toAddress: string, amount: number): Promise<string>;
    requestNativeFunding(address: string, amount: number): Promise<string>;
    isPoolPaused(poolId: string): Promise<boolean>;
    isSystemPaused(): Promise<boolean>;
    arePoolSwapsPaused(poolId: string): Promise<boolean>;
    getContractVersion(): Promise<string | null>;
    getOrCreateOperationalWallet(): Promise<WalletCredential>;
}

// ── State store ─────────────────────────────────────────────────────
export type PoolRegistryEntry = {
    poolId: string;
    ratio: PoolRatioConfig;
    tokenADecimals: number;
    tokenBDecimals: number;
    registeredAt: number;
};

export interface StateStore {
    saveWorkerConfig(config: WorkerConfig): Promise<void>;
    loadWorkerConfig(workerId: string): Promise<WorkerConfig | null>;
    loadAllWorkerConfigs(): Promise<WorkerConfig[]>;
    deleteWorker(workerId: string): Promise<void>;
    saveWorkerStatistics(statistics: WorkerStatistics): Promise<void>;
    loadWorkerStatistics(workerId: string): Promise<WorkerStatistics | null>;
    appendWorkerError(workerId: string, record: WorkerErrorRecord): Promise<void>;
    loadWorkerErrors(workerId: string): Promise<WorkerErrorRecord[]>;
    loadPoolRegistry(): Promise<PoolRegistryEntry[]>;
    savePoolRegistry(entries: PoolRegistryEntry[]): Promise<void>;
}

// ── Startup routines ────────────────────────────────────────────────
export interface StartupRoutine {
    readonly name: string;
    start(): Promise<void>;
    stop(): Promise<void>;
}
