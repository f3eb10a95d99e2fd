export const SERVICE_STATES = [
    'Stopped',
    'Starting',
    'Started',
    'Pausing',
    'Paused',
    'Resuming',
    'Stopping',
    'Error',
] as const;

export type ServiceState = typeof SERVICE_STATES[number];

export const WORKER_KINDS = ['deposit', 'withdrawal', 'swap'] as const;

export type WorkerKind = typeof WORKER_KINDS[number];

export const WORKER_STATUSES = [
    'created',
    'running',
    'stopped',
    'paused',
    'stopping',
    'failed',
    'error',
] as const;

export type WorkerStatus = typeof WORKER_STATUSES[number];

export type TokenSide = 'A' | 'B';

export type SwapDirection = 'a_to_b' | 'b_to_a';

export interface WalletCredential {
    address: string;
    secret: string;
}

export interface WorkerConfig {
    id: string;
    kind: WorkerKind;
    poolId: string;
    tokenSide: TokenSide;
    swapDirection?: SwapDirection;
    wallet: WalletCredential;
    initialAmount: number;
    autoRefill: boolean;
    shareOutput: boolean;
    status: WorkerStatus;
    createdAt: number;
    lastOperationAt: number | null;
}

export interface WorkerStatistics {
    workerId: string;
    successfulOperations: number;
    failedOperations: number;
    totalVolumeProcessed: number;
    totalFeesPaid: number;
    lastOperationAt: number | null;
    lastError: string | null;
}

export interface WorkerErrorRecord {
    timestamp: number;
    operation: string;
    message: string;
    code?: number;
}

export interface PoolRatioConfig {
    tokenA: string;
    tokenB: string;
    ratioANumerator: number;
    ratioBDenominator: number;
    poolId: string;
    wasSwapped: boolean;
}

export type DrainStatus = 'nothing_to_drain' | 'completed' | 'operation_failed' | 'burn_failed';

export interface DrainResult {
    workerId: string;
    kind: WorkerKind;
    status: DrainStatus;
    tokensBurned: number;
    burnError?: string;
    operationAttempted: boolean;
    operationSucceeded: boolean;
    operationError?: string;
    outputBurned: number;
    signature?: string;
    networkFeePaid: number;
    nativeSwept: number;
    sweepError?: string;
    completedAt: number;
}

export type EngineHealthStatus = 'Healthy' | 'Degraded';

export interface HealthSnapshot {
    state: ServiceState;
    isHealthy: boolean;
    isPaused: boolean;
    engineStatus: EngineHealthStatus | null;
    totalWorkers: number;
    runningWorkers: number;
    failedWorkers: number;
    timestamp: number;
}
