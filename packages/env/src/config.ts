import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  RULEGATE_HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RULEGATE_REJECTION_POLICY: z.enum(['stop', 'collect']).default('stop'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const source = { ...process.env };
    // An empty value means "unset", not zero
    if (source['RULEGATE_HANDLER_TIMEOUT_MS'] === '') {
      delete source['RULEGATE_HANDLER_TIMEOUT_MS'];
    }

    const result = envSchema.safeParse(source);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next accessor re-reads process.env.
 * Tests use this after stubbing variables.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the current NODE_ENV value.
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}

/**
 * Default per-handler deadline for dispatch, in milliseconds.
 * `undefined` when RULEGATE_HANDLER_TIMEOUT_MS is unset: handlers may run
 * until they settle.
 */
export function getHandlerTimeoutMs(): number | undefined {
  return validateEnv().RULEGATE_HANDLER_TIMEOUT_MS;
}

/**
 * Default batch behavior after a business-rule rejection:
 * `stop` ends the batch, `collect` keeps evaluating to gather every rejection.
 */
export function getRejectionPolicy(): ValidatedEnv['RULEGATE_REJECTION_POLICY'] {
  return validateEnv().RULEGATE_REJECTION_POLICY;
}
