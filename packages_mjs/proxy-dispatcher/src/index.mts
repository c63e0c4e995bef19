/**
 * @strix/proxy-dispatcher
 * undici dispatchers built from the upstream proxy configuration
 * Pure ESM module
 */

// Environment switches
export * from './config.mjs';

// Errors
export * from './errors.mjs';

// Agent exports
export * from './agents.mjs';

// Dispatcher per traffic class
export * from './dispatcher.mjs';
