import { z } from 'zod';
import { DEFAULTS, createConfigurationError } from '../types/index.js';

const count = (label: string) =>
    z.number({ invalid_type_error: `${label} must be a number` })
        .int(`${label} must be an integer`)
        .positive(`${label} must be greater than 0`);

const bound = (label: string) =>
    z.number({ invalid_type_error: `${label} must be a number` })
        .int(`${label} must be an integer`)
        .min(Number.MIN_SAFE_INTEGER, `${label} must be a safe integer`)
        .max(Number.MAX_SAFE_INTEGER, `${label} must be a safe integer`);

const depth = (label: string) =>
    z.number({ invalid_type_error: `${label} must be a number` })
        .int(`${label} must be an integer`)
        .nonnegative(`${label} must not be negative`);

export const campaignConfigSchema = z.object({
    numTests: count('numTests').default(DEFAULTS.numTests),
    constraintsPerTest: count('constraintsPerTest').default(DEFAULTS.constraintsPerTest),
    maxDepth: depth('maxDepth').default(DEFAULTS.maxDepth),
    booleanMaxDepth: depth('booleanMaxDepth').default(DEFAULTS.booleanMaxDepth),
    seed: z.number({ invalid_type_error: 'seed must be a number' })
        .int('seed must be an integer')
        .min(0, 'seed must be an unsigned 32-bit integer')
        .max(0xffffffff, 'seed must be an unsigned 32-bit integer')
        .optional(),
    intRange: z.object({
        min: bound('intRange.min'),
        max: bound('intRange.max'),
    })
        .refine(range => range.min <= range.max, 'intRange.min must not exceed intRange.max')
        .default({ ...DEFAULTS.intRange }),
    variables: z.array(
        z.string().regex(/^[a-zA-Z][a-zA-Z0-9_]*$/, 'variable names must be SMT-LIB simple symbols')
    ).default([]),
    timeoutMs: count('timeoutMs').optional(),
}).strict();

export type CampaignConfigInput = z.input<typeof campaignConfigSchema>;
export type CampaignConfig = z.output<typeof campaignConfigSchema>;

/**
 * Validate campaign parameters and fill in defaults.
 * Throws a CONFIGURATION_ERROR naming every rejected field.
 */
export function parseCampaignConfig(input: unknown): CampaignConfig {
    const parsed = campaignConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw createConfigurationError('Invalid campaign configuration', issues);
    }
    return parsed.data;
}
