/**
 * Logging for the proxy packages
 */

import process from 'node:process';
import pino, { type Logger } from 'pino';
import { resolveLogLevel } from './config.mjs';

const rootLogger = pino({
  name: 'strix-proxy',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
});

/**
 * Create a module logger
 * @param module - Module name added to every record
 */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

/**
 * Mask proxy URL for safe logging (hide credentials if present)
 */
export function maskProxyUrl(url: string | null | undefined): string {
  if (!url) return 'none';
  const protocolEnd = url.indexOf('://');
  if (protocolEnd === -1) return url;

  const authorityStart = protocolEnd + 3;
  const rest = url.slice(authorityStart);
  const authorityEnd = rest.search(/[/?#]/);
  const authority = authorityEnd === -1 ? rest : rest.slice(0, authorityEnd);
  const atPos = authority.lastIndexOf('@');
  if (atPos === -1) return url;

  return `${url.slice(0, authorityStart)}***@${url.slice(authorityStart + atPos + 1)}`;
}
