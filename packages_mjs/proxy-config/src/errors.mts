/**
 * Error types for proxy-config
 */

import type { ProxyFieldName } from './types.mjs';

/**
 * Thrown when a configured proxy URL is invalid.
 * Fatal at startup: callers let it propagate.
 */
export class ConfigurationError extends Error {
  readonly code = 'PROXY_CONFIGURATION_ERROR';
  readonly field: ProxyFieldName;
  readonly url: string;

  constructor(message: string, field: ProxyFieldName, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.field = field;
    this.url = url;
  }
}
