/**
 * Configuration loader for scripts and hooks that read credentials from the
 * environment.
 */

import { z } from 'zod';
import { DEFAULT_TTL, MIN_TTL } from './constants.js';
import { formatIssues } from './types.js';
import type { LoopiaClientOptions } from './types.js';

const REQUIRED_ENV = ['LOOPIA_API_USER', 'LOOPIA_API_PASSWORD'] as const;

const EnvSchema = z.object({
  LOOPIA_API_USER: z.string(),
  LOOPIA_API_PASSWORD: z.string(),
  LOOPIA_API_URL: z.string().url('must be a valid URL').optional(),
  /** Seconds */
  LOOPIA_HTTP_TIMEOUT: z.coerce
    .number()
    .positive('must be a positive number of seconds')
    .optional(),
  LOOPIA_TTL: z.coerce
    .number()
    .int('must be an integer')
    .min(MIN_TTL, `must be at least ${MIN_TTL}`)
    .optional(),
});

export interface LoopiaEnvConfig extends LoopiaClientOptions {
  /** TTL for records created by the challenge solver */
  ttl: number;
}

/**
 * Load client options from environment variables.
 *
 * Empty variables count as unset. `LOOPIA_HTTP_TIMEOUT` is given in seconds.
 */
export function loadLoopiaConfig(
  env: NodeJS.ProcessEnv = process.env
): LoopiaEnvConfig {
  const values = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('LOOPIA_') && value !== undefined && value !== ''
    )
  );

  const missing = REQUIRED_ENV.filter((key) => !(key in values));
  if (missing.length > 0) {
    throw new Error(
      `Loopia: missing required configuration: ${missing.join(', ')}`
    );
  }

  const result = EnvSchema.safeParse(values);
  if (!result.success) {
    throw new Error(
      `Loopia: invalid configuration: ${formatIssues(result.error)}`
    );
  }

  const parsed = result.data;
  return {
    username: parsed.LOOPIA_API_USER,
    password: parsed.LOOPIA_API_PASSWORD,
    baseUrl: parsed.LOOPIA_API_URL,
    timeout:
      parsed.LOOPIA_HTTP_TIMEOUT === undefined
        ? undefined
        : Math.round(parsed.LOOPIA_HTTP_TIMEOUT * 1000),
    ttl: parsed.LOOPIA_TTL ?? DEFAULT_TTL,
  };
}
