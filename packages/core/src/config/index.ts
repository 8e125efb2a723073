/**
 * Method Security Configuration
 *
 * zod-validated settings with environment variable loading.
 */

import { z } from 'zod';
import { ConfigurationError } from '../method-security/errors';

export const LOG_LEVELS = ['silent', 'debug', 'info', 'warn', 'error'] as const;

const BooleanStringSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const MethodSecurityConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      pretty: z.boolean().default(false),
      name: z.string().min(1, 'Logger name cannot be empty').default('method-security'),
    })
    .default({}),
  /** Prefix accepted (and ignored) in front of role names by hasRole/hasAnyRole */
  rolePrefix: z.string().default('ROLE_'),
});

export type MethodSecurityConfig = z.infer<typeof MethodSecurityConfigSchema>;
export type MethodSecurityConfigInput = z.input<typeof MethodSecurityConfigSchema>;

export const DEFAULT_CONFIG: MethodSecurityConfig = MethodSecurityConfigSchema.parse({});

/**
 * Validate a configuration object, applying defaults.
 * @throws ConfigurationError naming the first invalid field
 */
export function parseConfig(input: unknown): MethodSecurityConfig {
  const result = MethodSecurityConfigSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue.path.join('.');
    throw new ConfigurationError(`Invalid configuration at '${field}': ${issue.message}`, field);
  }
  return result.data;
}

/**
 * Build configuration from environment variables:
 * - METHOD_SECURITY_LOG_LEVEL
 * - METHOD_SECURITY_LOG_PRETTY ('true' | 'false')
 * - METHOD_SECURITY_ROLE_PREFIX
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MethodSecurityConfig {
  const logging: Record<string, unknown> = {};

  if (env.METHOD_SECURITY_LOG_LEVEL !== undefined) {
    logging.level = env.METHOD_SECURITY_LOG_LEVEL;
  }
  if (env.METHOD_SECURITY_LOG_PRETTY !== undefined) {
    const pretty = BooleanStringSchema.safeParse(env.METHOD_SECURITY_LOG_PRETTY);
    if (!pretty.success) {
      throw new ConfigurationError(
        `Invalid configuration at 'logging.pretty': expected 'true' or 'false', got '${env.METHOD_SECURITY_LOG_PRETTY}'`,
        'logging.pretty',
      );
    }
    logging.pretty = pretty.data;
  }

  return parseConfig({
    logging,
    rolePrefix: env.METHOD_SECURITY_ROLE_PREFIX,
  });
}
