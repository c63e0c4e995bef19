/**
 * ProxyAgent construction for proxy-dispatcher
 */

import { ProxyAgent } from 'undici';
import { createLogger, maskProxyUrl } from '@strix/proxy-config';
import { isSslVerifyDisabledByEnv } from './config.mjs';

const log = createLogger('proxy-dispatcher.agents');

/**
 * TLS options with certificate validation disabled
 */
const insecureTlsOptions = {
  rejectUnauthorized: false,
};

export interface ProxyAgentOptions {
  /** Disable TLS validation (default: from NODE_TLS_REJECT_UNAUTHORIZED / SSL_CERT_VERIFY) */
  disableTls?: boolean;
}

/**
 * Create a proxy agent for an HTTP or HTTPS proxy
 * @param proxyUrl - The proxy server URL
 *
 * Priority for disabling TLS:
 * 1. Explicit disableTls option
 * 2. Environment variables (NODE_TLS_REJECT_UNAUTHORIZED=0 or SSL_CERT_VERIFY=0)
 */
export function createProxyAgent(proxyUrl: string, options: ProxyAgentOptions = {}): ProxyAgent {
  const shouldDisableTls = options.disableTls ?? isSslVerifyDisabledByEnv();

  const agentOptions: ProxyAgent.Options = {
    uri: proxyUrl,
    ...(shouldDisableTls && {
      requestTls: insecureTlsOptions,
      proxyTls: insecureTlsOptions,
    }),
  };

  log.debug(
    `createProxyAgent: uri=${maskProxyUrl(proxyUrl)}, disableTls=${options.disableTls}, ` +
      `shouldDisableTls=${shouldDisableTls}`
  );

  return new ProxyAgent(agentOptions);
}
