import { createHash, randomBytes } from 'crypto';
import type { SwapDirection, WalletCredential } from '@stress-harness/shared';
import type {
    ChainClient,
    LiquidityRequest,
    OperationReceipt,
    PoolState,
    SwapRequest,
} from '../types/backend-types';
import { BURN_ADDRESS } from '../config/constants';
import { ContractErrorCode, formatContractErrorLog, formatSimulationFailure } from '../modules/errors/contractErrors';
import {
    expectedSwapOutput,
    normalizePool,
    poolRatioFromState,
    validatePoolRatio,
} from '../modules/pool/ratioNormalizer';
import { logger } from '../utils/logger';

export type SimulatedOperation = 'deposit' | 'withdraw' | 'swap' | 'mint' | 'transfer' | 'burn' | 'transferNative' | 'funding';

export interface SimulatedChainOptions {
    contractVersion?: string | null;
    networkFee?: number;
    latencyMs?: number;
    airdropEnabled?: boolean;
}

type SimulatedPool = {
    state: PoolState;
    reserveA: number;
    reserveB: number;
    paused: boolean;
    swapsPaused: boolean;
};

type InjectedFailure = {
    operation: SimulatedOperation;
    error: string;
    remaining: number;
};

function deriveAddress(secret: string): string {
    return createHash('sha256').update(`wallet:${secret}`).digest('hex').slice(0, 44);
}

/**
 * In-memory stand-in for the on-chain program. Balances, LP issuance and
 * fixed-ratio swaps follow the contract's rules, and failures surface with the
 * same log text the program emits so the recovery path sees realistic errors.
 */
export class SimulatedChainClient implements ChainClient {
    public readonly networkFee: number;
    private readonly nativeBalances = new Map<string, number>();
    private readonly tokenBalances = new Map<string, number>();
    private readonly pools = new Map<string, SimulatedPool>();
    private readonly failures: InjectedFailure[] = [];
    private operationalWallet: WalletCredential | null = null;
    private systemPaused = false;
    private signatureCounter = 0;

    constructor(private readonly options: SimulatedChainOptions = {}) {
        this.networkFee = options.networkFee ?? 5_000;
    }

    // ── Test and bootstrap controls ─────────────────────────────────

    public createPool(
        mintA: string,
        mintB: string,
        ratioA: number,
        ratioB: number,
        decimals: { [mint: string]: number },
    ): PoolState {
        const ratio = normalizePool(mintA, mintB, ratioA, ratioB);
        const tokenADecimals = decimals[ratio.tokenA] ?? 9;
        const tokenBDecimals = decimals[ratio.tokenB] ?? 9;
        validatePoolRatio(ratio, tokenADecimals, tokenBDecimals);
        if (this.pools.has(ratio.poolId)) {
            throw new Error(formatContractErrorLog(1011));
        }
        const state: PoolState = {
            poolId: ratio.poolId,
            tokenAMint: ratio.tokenA,
            tokenBMint: ratio.tokenB,
            tokenADecimals,
            tokenBDecimals,
            ratioANumerator: ratio.ratioANumerator,
            ratioBDenominator: ratio.ratioBDenominator,
            lpMintA: `lpA_${ratio.poolId.slice(0, 24)}`,
            lpMintB: `lpB_${ratio.poolId.slice(0, 24)}`,
        };
        this.pools.set(state.poolId, { state, reserveA: 0, reserveB: 0, paused: false, swapsPaused: false });
        logger.info(`[SimChain] pool ${state.poolId.slice(0, 12)} created (${state.tokenAMint}/${state.tokenBMint})`);
        return { ...state };
    }

    public removePool(poolId: string): void {
        this.pools.delete(poolId);
    }

    public setPoolPaused(poolId: string, paused: boolean): void {
        this.requirePool(poolId).paused = paused;
    }

    public setPoolSwapsPaused(poolId: string, paused: boolean): void {
        this.requirePool(poolId).swapsPaused = paused;
    }

    public setSystemPaused(paused: boolean): void {
        this.systemPaused = paused;
    }

    public injectFailure(operation: SimulatedOperation, error: number | string, times = 1): void {
        this.failures.push({
            operation,
            error: typeof error === 'number' ? formatContractErrorLog(error) : error,
            remaining: times,
        });
    }

    public getPoolReserves(poolId: string): { reserveA: number; reserveB: number } {
        const pool = this.requirePool(poolId);
        return { reserveA: pool.reserveA, reserveB: pool.reserveB };
    }

    // ── ChainClient ─────────────────────────────────────────────────

    public async generateWallet(): Promise<WalletCredential> {
        await this.tick();
        const secret = randomBytes(32).toString('hex');
        return { address: deriveAddress(secret), secret };
    }

    public async restoreWallet(secret: string): Promise<WalletCredential> {
        await this.tick();
        if (!/^[0-9a-f]{64}$/.test(secret)) {
            throw new Error('Invalid wallet secret: expected 32 bytes of hex');
        }
        return { address: deriveAddress(secret), secret };
    }

    public async getNativeBalance(address: string): Promise<number> {
        await this.tick();
        return this.nativeBalances.get(address) ?? 0;
    }

    public async getTokenBalance(address: string, mint: string): Promise<number> {
        await this.tick();
        return this.tokenBalance(address, mint);
    }

    public async getPool(poolId: string): Promise<PoolState | null> {
        await this.tick();
        const pool = this.pools.get(poolId);
        return pool ? { ...pool.state } : null;
    }

    public async deposit(request: LiquidityRequest): Promise<OperationReceipt> {
        await this.tick();
        this.consumeFailure('deposit');
        const pool = this.requireOperablePool(request.poolId);
        const side = this.sideOf(pool, request.mint);
        this.assertPositive(request.amount);
        this.chargeFee(request.wallet.address);
        this.debitToken(request.wallet.address, request.mint, request.amount);

        this.creditToken(request.wallet.address, side === 'A' ? pool.state.lpMintA : pool.state.lpMintB, request.amount);
        if (side === 'A') {
            pool.reserveA += request.amount;
        } else {
            pool.reserveB += request.amount;
        }
        return this.receipt(request.amount, request.amount);
    }

    public async withdraw(request: LiquidityRequest): Promise<OperationReceipt> {
        await this.tick();
        this.consumeFailure('withdraw');
        const pool = this.requireOperablePool(request.poolId);
        const side = this.sideOf(pool, request.mint);
        this.assertPositive(request.amount);
        const lpMint = side === 'A' ? pool.state.lpMintA : pool.state.lpMintB;
        if (this.tokenBalance(request.wallet.address, lpMint) < request.amount) {
            throw new Error(formatContractErrorLog(ContractErrorCode.InsufficientLpTokens));
        }
        const reserve = side === 'A' ? pool.reserveA : pool.reserveB;
        if (reserve < request.amount) {
            throw new Error(formatSimulationFailure(ContractErrorCode.InsufficientLiquidity));
        }
        this.chargeFee(request.wallet.address);
        this.debitToken(request.wallet.address, lpMint, request.amount);
        this.creditToken(request.wallet.address, request.mint, request.amount);
        if (side === 'A') {
            pool.reserveA -= request.amount;
        } else {
            pool.reserveB -= request.amount;
        }
        return this.receipt(request.amount, request.amount);
    }

    public async swap(request: SwapRequest): Promise<OperationReceipt> {
        await this.tick();
        this.consumeFailure('swap');
        const pool = this.requireOperablePool(request.poolId);
        if (pool.swapsPaused) {
            throw new Error(formatContractErrorLog(ContractErrorCode.PoolSwapsPaused));
        }
        this.assertPositive(request.amount);
        const { inputMint, outputMint } = this.swapMints(pool.state, request.direction);
        const output = expectedSwapOutput(poolRatioFromState(pool.state), request.direction, request.amount);
        if (output === 0) {
            throw new Error(formatContractErrorLog(1025));
        }
        if (output < request.minimumOutput) {
            throw new Error(formatContractErrorLog(ContractErrorCode.SlippageExceeded));
        }
        const outputReserve = request.direction === 'a_to_b' ? pool.reserveB : pool.reserveA;
        if (outputReserve < output) {
            throw new Error(formatSimulationFailure(ContractErrorCode.InsufficientLiquidity));
        }
        this.chargeFee(request.wallet.address);
        this.debitToken(request.wallet.address, inputMint, request.amount);
        this.creditToken(request.wallet.address, outputMint, output);
        if (request.direction === 'a_to_b') {
            pool.reserveA += request.amount;
            pool.reserveB -= output;
        } else {
            pool.reserveB += request.amount;
            pool.reserveA -= output;
        }
        return this.receipt(request.amount, output);
    }

    public async mintTokens(address: string, mint: string, amount: number): Promise<string> {
        await this.tick();
        this.consumeFailure('mint');
        this.assertPositive(amount);
        this.creditToken(address, mint, amount);
        return this.nextSignature();
    }

    public async transferTokens(from: WalletCredential, toAddress: string, mint: string, amount: number): Promise<string> {
        await this.tick();
        this.consumeFailure('transfer');
        this.assertPositive(amount);
        this.chargeFee(from.address);
        this.debitToken(from.address, mint, amount);
        this.creditToken(toAddress, mint, amount);
        return this.nextSignature();
    }

    public async burnTokens(wallet: WalletCredential, mint: string, amount: number): Promise<string> {
        await this.tick();
        this.consumeFailure('burn');
        this.assertPositive(amount);
        this.chargeFee(wallet.address);
        this.debitToken(wallet.address, mint, amount);
        this.creditToken(BURN_ADDRESS, mint, amount);
        return this.nextSignature();
    }

    public async transferNative(from: WalletCredential, toAddress: string, amount: number): Promise<string> {
        await this.tick();
        this.consumeFailure('transferNative');
        this.assertPositive(amount);
        const balance = this.nativeBalances.get(from.address) ?? 0;
        if (balance < amount + this.networkFee) {
            throw new Error(`Transfer: insufficient lamports ${balance}, need ${amount + this.networkFee}`);
        }
        this.nativeBalances.set(from.address, balance - amount - this.networkFee);
        this.nativeBalances.set(toAddress, (this.nativeBalances.get(toAddress) ?? 0) + amount);
        return this.nextSignature();
    }

    public async requestNativeFunding(address: string, amount: number): Promise<string> {
        await this.tick();
        this.consumeFailure('funding');
        if (this.options.airdropEnabled === false) {
            throw new Error('airdrop is not available on this cluster');
        }
        this.nativeBalances.set(address, (this.nativeBalances.get(address) ?? 0) + amount);
        return this.nextSignature();
    }

    public async isPoolPaused(poolId: string): Promise<boolean> {
        await this.tick();
        return this.requirePool(poolId).paused;
    }

    public async isSystemPaused(): Promise<boolean> {
        await this.tick();
        return this.systemPaused;
    }

    public async arePoolSwapsPaused(poolId: string): Promise<boolean> {
        await this.tick();
        return this.requirePool(poolId).swapsPaused;
    }

    public async getContractVersion(): Promise<string | null> {
        await this.tick();
        return this.options.contractVersion === undefined ? '0.15.1054' : this.options.contractVersion;
    }

    public async getOrCreateOperationalWallet(): Promise<WalletCredential> {
        if (!this.operationalWallet) {
            this.operationalWallet = await this.generateWallet();
            logger.info(`[SimChain] operational wallet ${this.operationalWallet.address} created`);
        }
        return { ...this.operationalWallet };
    }

    // ── Internals ───────────────────────────────────────────────────

    private async tick(): Promise<void> {
        const latencyMs = this.options.latencyMs ?? 0;
        if (latencyMs > 0) {
            await new Promise((resolve) => setTimeout(resolve, latencyMs));
            return;
        }
        await Promise.resolve();
    }

    private consumeFailure(operation: SimulatedOperation): void {
        const index = this.failures.findIndex((failure) => failure.operation === operation);
        if (index < 0) {
            return;
        }
        const failure = this.failures[index];
        failure.remaining -= 1;
        if (failure.remaining <= 0) {
            this.failures.splice(index, 1);
        }
        throw new Error(failure.error);
    }

    private requirePool(poolId: string): SimulatedPool {
        const pool = this.pools.get(poolId);
        if (!pool) {
            throw new Error(formatContractErrorLog(1012));
        }
        return pool;
    }

    private requireOperablePool(poolId: string): SimulatedPool {
        if (this.systemPaused) {
            throw new Error(formatContractErrorLog(ContractErrorCode.SystemPaused));
        }
        const pool = this.requirePool(poolId);
        if (pool.paused) {
            throw new Error(formatContractErrorLog(ContractErrorCode.PoolPaused));
        }
        return pool;
    }

    private sideOf(pool: SimulatedPool, mint: string): 'A' | 'B' {
        if (mint === pool.state.tokenAMint) {
            return 'A';
        }
        if (mint === pool.state.tokenBMint) {
            return 'B';
        }
        throw new Error(formatContractErrorLog(ContractErrorCode.InvalidTokenAccount));
    }

    private swapMints(state: PoolState, direction: SwapDirection): { inputMint: string; outputMint: string } {
        return direction === 'a_to_b'
            ? { inputMint: state.tokenAMint, outputMint: state.tokenBMint }
            : { inputMint: state.tokenBMint, outputMint: state.tokenAMint };
    }

    private assertPositive(amount: number): void {
        if (!Number.isSafeInteger(amount) || amount <= 0) {
            throw new Error(formatContractErrorLog(1019));
        }
    }

    private tokenBalance(address: string, mint: string): number {
        return this.tokenBalances.get(`${address}:${mint}`) ?? 0;
    }

    private creditToken(address: string, mint: string, amount: number): void {
        this.tokenBalances.set(`${address}:${mint}`, this.tokenBalance(address, mint) + amount);
    }

    private debitToken(address: string, mint: string, amount: number): void {
        const balance = this.tokenBalance(address, mint);
        if (balance < amount) {
            throw new Error(formatContractErrorLog(ContractErrorCode.InsufficientFunds));
        }
        this.tokenBalances.set(`${address}:${mint}`, balance - amount);
    }

    private chargeFee(address: string): void {
        const balance = this.nativeBalances.get(address) ?? 0;
        if (balance < this.networkFee) {
            throw new Error('Attempt to debit an account but found no record of a prior credit.');
        }
        this.nativeBalances.set(address, balance - this.networkFee);
    }

    private receipt(inputAmount: number, outputAmount: number): OperationReceipt {
        return {
            signature: this.nextSignature(),
            inputAmount,
            outputAmount,
            networkFee: this.networkFee,
        };
    }

    private nextSignature(): string {
        this.signatureCounter += 1;
        return `simsig_${this.signatureCounter.toString().padStart(8, '0')}`;
    }
}
