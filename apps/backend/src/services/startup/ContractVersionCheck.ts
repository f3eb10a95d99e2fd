import type { ChainClient, StartupRoutine } from '../../types/backend-types';
import { EXPECTED_CONTRACT_VERSION, MAX_SUPPORTED_CONTRACT_VERSION } from '../../config/constants';
import { logger } from '../../utils/logger';

export class ContractVersionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractVersionError';
    }
}

type VersionTriple = [number, number, number];

const VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)$/;

export function parseContractVersion(raw: string): VersionTriple | null {
    const match = VERSION_PATTERN.exec(raw.trim());
    if (!match) {
        return null;
    }
    return [Number(match[1]), Number(match[2]), Number(match[3])];
}

export function compareVersions(left: VersionTriple, right: VersionTriple): number {
    for (let index = 0; index < 3; index += 1) {
        if (left[index] !== right[index]) {
            return left[index] < right[index] ? -1 : 1;
        }
    }
    return 0;
}

export interface ContractVersionCheckOptions {
    expectedVersion?: string;
    maxSupportedVersion?: string;
}

export class ContractVersionCheck implements StartupRoutine {
    public readonly name = 'ContractVersionCheck';
    private readonly expectedVersion: string;
    private readonly maxSupportedVersion: string;

    constructor(
        private readonly chain: Pick<ChainClient, 'getContractVersion'>,
        options: ContractVersionCheckOptions = {},
    ) {
        this.expectedVersion = options.expectedVersion ?? EXPECTED_CONTRACT_VERSION;
        this.maxSupportedVersion = options.maxSupportedVersion ?? MAX_SUPPORTED_CONTRACT_VERSION;
    }

    public async start(): Promise<void> {
        const raw = await this.chain.getContractVersion();
        if (raw === null) {
            throw new ContractVersionError('Deployed contract version is unavailable');
        }
        const deployed = parseContractVersion(raw);
        const expected = parseContractVersion(this.expectedVersion);
        const maxSupported = parseContractVersion(this.maxSupportedVersion);
        if (!deployed || !expected || !maxSupported) {
            throw new ContractVersionError(
                `Unparseable contract version (deployed=${raw}, expected=${this.expectedVersion}, max=${this.maxSupportedVersion})`,
            );
        }
        if (compareVersions(deployed, maxSupported) > 0) {
            throw new ContractVersionError(
                `Contract version ${raw} is above the maximum supported ${this.maxSupportedVersion}`,
            );
        }
        if (compareVersions(deployed, expected) !== 0) {
            throw new ContractVersionError(`Contract version ${raw} does not match expected ${this.expectedVersion}`);
        }
        logger.info(`[ContractVersion] deployed contract ${raw} matches`);
    }

    public async stop(): Promise<void> {
        // Nothing held between start and stop.
    }
}
