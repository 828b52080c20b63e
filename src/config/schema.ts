/**
 * Admission Control - Configuration Schema
 * Zod-based validation schemas for the admission engine configuration
 */

import { z } from 'zod';

import { parseDuration } from '../utils/helpers.js';

// =============================================================================
// Duration Schema
// =============================================================================

/**
 * Whole seconds, or a string such as "30s", "10m", "1h", "1d"
 */
export const DurationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

// =============================================================================
// Rule Schemas
// =============================================================================

/**
 * `[limit, period, strategy]`
 */
export const RuleTupleSchema = z
  .tuple([z.number(), DurationSchema, z.string()])
  .transform(([limit, periodSeconds, strategy]) => ({ limit, periodSeconds, strategy }));

/**
 * `{ limit, period, strategy }`
 */
export const RuleObjectSchema = z
  .object({
    limit: z.number(),
    period: DurationSchema,
    strategy: z.string().default('fixed'),
  })
  .transform(({ limit, period, strategy }) => ({ limit, periodSeconds: period, strategy }));

export const RuleValueSchema = z.union([RuleTupleSchema, RuleObjectSchema]);

/**
 * Pattern → rule. Limits, periods and strategies are checked again, with
 * every problem reported together, when the rule index is compiled.
 */
export const RulesSchema = z.record(z.string(), RuleValueSchema).default({});

// =============================================================================
// Ban Configuration Schema
// =============================================================================

export const BanConfigSchema = z.object({
  enableBans: z.boolean().default(true),
  siteBan: z.boolean().default(false),
  banOffenses: z.number().int().min(1).default(10),
  banLength: DurationSchema.default('5m'),
  banMaxLength: DurationSchema.default('1d'),
  banCounterTtl: DurationSchema.default('10m'),
});

// =============================================================================
// Redis Configuration Schema
// =============================================================================

export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).max(15).default(0),
  tls: z.boolean().default(false),
});

// =============================================================================
// Complete Configuration Schema
// =============================================================================

export const AdmissionConfigSchema = z
  .object({
    rules: RulesSchema,
    exempt: z.array(z.string()).default([]),
    failureMode: z.enum(['open', 'closed'], {
      required_error: 'failureMode is required ("open" or "closed")',
    }),
    store: z.enum(['redis', 'memory']).default('redis'),
    keyPrefix: z.string().default('admission:'),
    storeTimeoutMs: z.number().int().min(1).default(250),
    trustProxy: z.boolean().default(false),
    redis: RedisConfigSchema.default({}),
  })
  .merge(BanConfigSchema)
  .superRefine((config, ctx) => {
    const { banLength, banMaxLength, banCounterTtl } = config;

    // A duration that failed to parse is already reported and left unset
    if (![banLength, banMaxLength, banCounterTtl].every(Number.isFinite)) {
      return;
    }

    if (banMaxLength < banLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'banMaxLength must not be shorter than banLength',
        path: ['banMaxLength'],
      });
    }
    if (banLength < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'banLength must be at least one second',
        path: ['banLength'],
      });
    }
    if (banCounterTtl < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'banCounterTtl must be at least one second',
        path: ['banCounterTtl'],
      });
    }
  });

// =============================================================================
// Type Exports
// =============================================================================

export type RedisConfigInput = z.input<typeof RedisConfigSchema>;
export type RedisConfig = z.output<typeof RedisConfigSchema>;

export type RuleValueInput = z.input<typeof RuleValueSchema>;

export type AdmissionConfigInput = z.input<typeof AdmissionConfigSchema>;
export type AdmissionConfig = z.output<typeof AdmissionConfigSchema>;

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Validate configuration file content
 */
export function validateConfig(config: unknown): AdmissionConfig {
  return AdmissionConfigSchema.parse(config);
}

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfig(
  config: unknown
): z.SafeParseReturnType<AdmissionConfigInput, AdmissionConfig> {
  return AdmissionConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
