/**
 * Environment schemas for proxy-config
 */

import { z } from 'zod';
import { PROXY_ENV_VARS } from './types.mjs';

/**
 * Log levels accepted in LOG_LEVEL; anything else falls back to 'info'
 */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LogLevelSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(LOG_LEVELS))
  .catch('info');

/**
 * Resolve the logger level from LOG_LEVEL
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return LogLevelSchema.parse(value ?? 'info');
}

/**
 * An unset or empty variable is absent
 */
const OptionalProxyUrl = z
  .string()
  .optional()
  .transform((value) => (value ? value : null));

/**
 * Shape of the proxy variables in the process environment
 */
export const ProxyEnvSchema = z.object({
  [PROXY_ENV_VARS.toolsProxy]: OptionalProxyUrl,
  [PROXY_ENV_VARS.llmProxy]: OptionalProxyUrl,
  [PROXY_ENV_VARS.allProxy]: OptionalProxyUrl,
});

export type ProxyEnv = z.infer<typeof ProxyEnvSchema>;

/**
 * Read the proxy variables out of an environment table
 */
export function parseProxyEnv(env: NodeJS.ProcessEnv): ProxyEnv {
  return ProxyEnvSchema.parse(env);
}
