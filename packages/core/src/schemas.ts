import { z } from 'zod';

/** Default per-attempt timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 2_000;

/**
 * Schema for a duration in milliseconds. 0 is allowed, fractions are kept.
 */
export const durationSchema = z.number().nonnegative();

/**
 * Schema for the per-request options a builder starts from.
 */
export const requestOptionsSchema = z.object({
  /** Per-attempt timeout in milliseconds, 0 disables it (default: 2000) */
  timeout: durationSchema.default(DEFAULT_TIMEOUT_MS),
});

export type RequestOptionsInput = z.input<typeof requestOptionsSchema>;
export type RequestOptionsParsed = z.output<typeof requestOptionsSchema>;

/**
 * Schema for the numeric part of a retry policy.
 */
export const retryPolicySchema = z.object({
  /** Additional attempts after the first (default: 0) */
  attempts: z.number().int().nonnegative().default(0),
  /** Fixed delay before each retry in milliseconds (default: 0) */
  delay: durationSchema.default(0),
});

export type RetryPolicyInput = z.input<typeof retryPolicySchema>;
export type RetryPolicyParsed = z.output<typeof retryPolicySchema>;
