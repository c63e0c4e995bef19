/**
 * @strix/proxy-config
 * Upstream proxy settings for tools and LLM traffic
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

// Errors
export * from './errors.mjs';

// Environment schemas
export * from './config.mjs';

// Logging
export * from './logger.mjs';

// ProxyConfig
export * from './proxy-config.mjs';
export { ProxyConfig as default } from './proxy-config.mjs';

// Loader and process-wide accessor
export * from './loader.mjs';
