/**
 * Loading proxy configuration from the environment
 */

import process from 'node:process';
import { parseProxyEnv } from './config.mjs';
import { createLogger, maskProxyUrl } from './logger.mjs';
import { ProxyConfig } from './proxy-config.mjs';
import { PROXY_ENV_VARS } from './types.mjs';

const log = createLogger('proxy-config.loader');

/**
 * Load proxy configuration from STRIX_PROXY_TOOLS, STRIX_PROXY_LLM and STRIX_PROXY_ALL
 *
 * @param env - Environment table to read (default: process.env)
 * @throws ConfigurationError when any configured URL is invalid
 */
export function loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const parsed = parseProxyEnv(env);
  const config = new ProxyConfig({
    toolsProxy: parsed[PROXY_ENV_VARS.toolsProxy],
    llmProxy: parsed[PROXY_ENV_VARS.llmProxy],
    allProxy: parsed[PROXY_ENV_VARS.allProxy],
  });
  log.debug({ proxies: config.toJSON() }, 'loaded proxy configuration');
  return config;
}

/**
 * Load the configuration and export the LLM proxy as HTTP_PROXY/HTTPS_PROXY.
 *
 * Call once, early in startup, before any LLM client reads those variables.
 * Existing HTTP_PROXY/HTTPS_PROXY values are overwritten when an LLM proxy is
 * configured and left alone otherwise.
 *
 * @param env - Environment table to read and update (default: process.env)
 */
export function configureGlobalProxies(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const config = loadFromEnvironment(env);

  const llmEnv = config.toLlmClientEnv();
  for (const [key, value] of Object.entries(llmEnv)) {
    env[key] = value;
  }
  if (llmEnv.HTTPS_PROXY) {
    log.info(
      { vars: Object.keys(llmEnv), proxy: maskProxyUrl(llmEnv.HTTPS_PROXY) },
      'applied LLM proxy environment'
    );
  }

  return config;
}

let globalConfig: ProxyConfig | undefined;

/**
 * Process-wide proxy configuration.
 *
 * Created on first call through configureGlobalProxies(); later calls return
 * the same instance without reading the environment again. Fixed for the
 * lifetime of the process. A failed first call leaves nothing cached.
 */
export function getGlobalConfig(): ProxyConfig {
  if (globalConfig === undefined) {
    globalConfig = configureGlobalProxies();
    log.debug('global proxy configuration initialised');
  }
  return globalConfig;
}
