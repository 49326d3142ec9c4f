import { z } from 'zod';
import { parseDurationMs } from '../utils/time-parser.js';

/**
 * Milliseconds, given either as a number or as a string like "30s" / "5m".
 */
export const DurationSchema = z.union([z.number().nonnegative(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  try {
    return parseDurationMs(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error)
    });
    return z.NEVER;
  }
});

export const RateLimitSchema = z.object({
  requests: z.number().int().positive(),
  intervalMs: DurationSchema.refine(ms => ms > 0, 'intervalMs must be positive'),
  burst: z.number().int().positive(),
});

export type RateLimitConfig = z.infer<typeof RateLimitSchema>;

export const RetryPolicySchema = z.object({
  maxRetries: z.number().int().positive(),
  baseDelayMs: DurationSchema,
  backoffFactor: z.number().min(1, 'backoffFactor must be at least 1'),
  maxDelayMs: DurationSchema,
  jitterFraction: z.number().min(0).max(1).default(0.1),
  retryableStatusCodes: z.array(z.number().int()).default([429, 500, 502, 503, 504]),
  retryBlocked: z.boolean().default(false),
});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const ProxySchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  provider: z.string().optional(),
  type: z.enum(['residential', 'datacenter']).optional(),
  geo: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  endpointClasses: z.array(z.string()).optional(),
});

export const RotationPolicySchema = z.discriminatedUnion('strategy', [
  z.object({ strategy: z.literal('round-robin') }),
  z.object({ strategy: z.literal('random') }),
  z.object({ strategy: z.literal('sticky'), intervalMs: DurationSchema.refine(ms => ms > 0, 'intervalMs must be positive') }),
]);

export const IdentityPoolSchema = z.object({
  proxies: z.array(ProxySchema).default([]),
  userAgents: z.array(z.string().min(1)).min(1, 'at least one user agent is required'),
  rotation: RotationPolicySchema,
  failureThreshold: z.number().int().positive(),
  // No default: a degraded identity is skipped for exactly this long
  cooldownMs: DurationSchema,
  stallRetryMs: DurationSchema.default(250),
});

export type IdentityPoolConfig = z.infer<typeof IdentityPoolSchema>;

export const StageConfigSchema = z.object({
  endpointClass: z.string().min(1),
  targets: z.array(z.string().min(1)).default([]),
  maxPages: z.number().int().positive().default(1),
});

export type StageConfig = z.infer<typeof StageConfigSchema>;

export const OutputConfigSchema = z.object({
  s3: z.object({
    bucket: z.string().min(1),
    prefix: z.string().default('crawl'),
  }).optional(),
});

export const RunConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.amazon.com'),
  workers: z.number().int().positive(),
  requestTimeoutMs: DurationSchema.refine(ms => ms > 0, 'requestTimeoutMs must be positive'),
  abortThreshold: z.number().min(0).max(1),
  rateLimits: z.record(z.string(), RateLimitSchema).default({}),
  retry: RetryPolicySchema,
  identities: IdentityPoolSchema,
  stages: z.object({
    category: StageConfigSchema,
    product: StageConfigSchema,
    review: StageConfigSchema,
  }),
  output: OutputConfigSchema.default({}),
}).superRefine((config, ctx) => {
  const { proxies } = config.identities;
  // Without proxies every direct identity serves every class
  if (proxies.length === 0) return;

  for (const key of ['category', 'product', 'review'] as const) {
    const { endpointClass } = config.stages[key];
    const served = proxies.some(proxy => !proxy.endpointClasses || proxy.endpointClasses.includes(endpointClass));
    if (!served) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stages', key, 'endpointClass'],
        message: `No proxy serves endpoint class "${endpointClass}"`,
      });
    }
  }
});

/** Raw JSON shape, before defaults and duration parsing */
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export type RunConfig = z.infer<typeof RunConfigSchema>;
