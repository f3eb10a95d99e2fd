import { z } from 'zod';
import { WORKER_KINDS } from '@stress-harness/shared';
import type { ComputeBudgetContext } from '../budget/computeBudget';
import type { CreateWorkerRequest } from '../../services/WorkerPool';

type ValidationError = {
    ok: false;
    status: number;
    message: string;
    issues?: string[];
};

type ValidationSuccess<T> = {
    ok: true;
    value: T;
};

export type ValidationResult<T> = ValidationSuccess<T> | ValidationError;

export type NormalizePoolValue = {
    mintA: string;
    mintB: string;
    ratioA: number;
    ratioB: number;
};

export type ComputeBudgetValue = {
    operation: string;
    context: ComputeBudgetContext;
};

const baseUnitAmount = z.union([
    z.number(),
    z.string(),
]).transform((input, ctx) => {
    const parsed = typeof input === 'number'
        ? input
        : input.trim().length > 0 ? Number(input.trim()) : Number.NaN;
    if (!Number.isSafeInteger(parsed) || parsed < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected non-negative integer amount, received "${String(input)}"` });
        return z.NEVER;
    }
    return parsed;
});

const positiveAmount = baseUnitAmount.refine((value) => value > 0, { message: 'must be greater than zero' });

const tokenIdentity = z.string().trim().min(1);

const WORKER_ID_PATTERN = new RegExp(`^(${WORKER_KINDS.join('|')})_[0-9A-Za-z]+$`);

const workerIdSchema = z.string().trim().regex(WORKER_ID_PATTERN, 'expected <kind>_<id>');

const createWorkerSchema = z.object({
    kind: z.enum(WORKER_KINDS),
    poolId: tokenIdentity,
    tokenSide: z.enum(['A', 'B']).default('A'),
    swapDirection: z.enum(['a_to_b', 'b_to_a']).optional(),
    initialAmount: baseUnitAmount.optional(),
    autoRefill: z.boolean().default(true),
    shareOutput: z.boolean().default(false),
}).superRefine((value, ctx) => {
    if (value.kind === 'swap' && !value.swapDirection) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['swapDirection'],
            message: 'required for swap workers',
        });
    }
});

const normalizePoolSchema = z.object({
    mintA: tokenIdentity,
    mintB: tokenIdentity,
    ratioA: positiveAmount,
    ratioB: positiveAmount,
});

const computeBudgetSchema = z.object({
    operation: z.string().trim().min(1),
    poolCount: z.number().int().nonnegative().optional(),
    donationAmount: baseUnitAmount.optional(),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return `${path}${issue.message}`;
    });
}

function invalid(label: string, error: z.ZodError): ValidationError {
    const issues = formatIssues(error);
    return {
        ok: false,
        status: 400,
        message: `Invalid ${label}: ${issues[0] || 'malformed payload'}`,
        issues,
    };
}

export function validateWorkerId(input: unknown): ValidationResult<string> {
    const parsed = workerIdSchema.safeParse(input);
    if (!parsed.success) {
        return invalid('worker id', parsed.error);
    }
    return { ok: true, value: parsed.data };
}

export function validateCreateWorkerRequest(payload: unknown): ValidationResult<CreateWorkerRequest> {
    const parsed = createWorkerSchema.safeParse(payload);
    if (!parsed.success) {
        return invalid('worker request', parsed.error);
    }
    const value = parsed.data;
    return {
        ok: true,
        value: {
            kind: value.kind,
            poolId: value.poolId,
            tokenSide: value.tokenSide,
            swapDirection: value.kind === 'swap' ? value.swapDirection : undefined,
            initialAmount: value.initialAmount ?? 0,
            autoRefill: value.autoRefill,
            shareOutput: value.shareOutput,
        },
    };
}

export function validateNormalizePoolRequest(payload: unknown): ValidationResult<NormalizePoolValue> {
    const parsed = normalizePoolSchema.safeParse(payload);
    if (!parsed.success) {
        return invalid('pool request', parsed.error);
    }
    return { ok: true, value: parsed.data };
}

export function validateComputeBudgetRequest(payload: unknown): ValidationResult<ComputeBudgetValue> {
    const parsed = computeBudgetSchema.safeParse(payload);
    if (!parsed.success) {
        return invalid('compute budget request', parsed.error);
    }
    const { operation, poolCount, donationAmount } = parsed.data;
    const context: ComputeBudgetContext = {};
    if (poolCount !== undefined) {
        context.poolCount = poolCount;
    }
    if (donationAmount !== undefined) {
        context.donationAmount = donationAmount;
    }
    return { ok: true, value: { operation, context } };
}
