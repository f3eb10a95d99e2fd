import type { WalletCredential } from '@stress-harness/shared';
import type { ChainClient, StartupRoutine } from '../../types/backend-types';
import { ALLOW_AIRDROP, OPERATIONAL_WALLET_FUNDING_AMOUNT } from '../../config/constants';
import { logger } from '../../utils/logger';

export interface OperationalWalletOptions {
    allowAirdrop?: boolean;
    fundingAmount?: number;
}

/** Loads the shared wallet that funds workers and receives drain sweeps. */
export class OperationalWalletStartup implements StartupRoutine {
    public readonly name = 'OperationalWalletStartup';
    private readonly allowAirdrop: boolean;
    private readonly fundingAmount: number;
    private loaded: WalletCredential | null = null;

    constructor(
        private readonly chain: Pick<ChainClient, 'getOrCreateOperationalWallet' | 'getNativeBalance' | 'requestNativeFunding'>,
        options: OperationalWalletOptions = {},
    ) {
        this.allowAirdrop = options.allowAirdrop ?? ALLOW_AIRDROP;
        this.fundingAmount = options.fundingAmount ?? OPERATIONAL_WALLET_FUNDING_AMOUNT;
    }

    public get wallet(): WalletCredential | null {
        return this.loaded;
    }

    public async start(): Promise<void> {
        const wallet = await this.chain.getOrCreateOperationalWallet();
        const balance = await this.chain.getNativeBalance(wallet.address);
        if (balance === 0) {
            if (this.allowAirdrop) {
                await this.chain.requestNativeFunding(wallet.address, this.fundingAmount);
                logger.info(`[OperationalWallet] funded ${wallet.address} with ${this.fundingAmount}`);
            } else {
                logger.warn(`[OperationalWallet] ${wallet.address} is empty and airdrop is disabled`);
            }
        }
        this.loaded = wallet;
        logger.info(`[OperationalWallet] using ${wallet.address}`);
    }

    public async stop(): Promise<void> {
        this.loaded = null;
    }
}
