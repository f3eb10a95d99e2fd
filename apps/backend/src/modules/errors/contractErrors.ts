import contractErrorTable from './contractErrorCodes.json';

export type ContractErrorDefinition = {
    code: number;
    name: string;
    message: string;
};

export const ContractErrorCode = {
    InvalidTokenMints: 1002,
    InvalidRatio: 1003,
    SystemPaused: 1004,
    PoolPaused: 1005,
    InvalidTokenAccount: 1014,
    InsufficientFunds: 1015,
    InsufficientLiquidity: 1020,
    InvalidLpTokenType: 1021,
    InsufficientLpTokens: 1022,
    SlippageExceeded: 1026,
    PoolSwapsPaused: 1030,
} as const;

const definitions: ReadonlyMap<number, ContractErrorDefinition> = new Map(
    contractErrorTable.map((entry) => [entry.code, entry]),
);

export function lookupContractError(code: number): ContractErrorDefinition | null {
    return definitions.get(code) ?? null;
}

export function describeContractError(code: number): string {
    return definitions.get(code)?.message ?? `Unknown error code: ${code}`;
}

export function formatContractErrorLog(code: number): string {
    return `Program log: Error: Custom(${code}) ${describeContractError(code)}`;
}

export function formatSimulationFailure(code: number): string {
    return `Transaction simulation failed: custom program error: 0x${code.toString(16)} (${code})`;
}
