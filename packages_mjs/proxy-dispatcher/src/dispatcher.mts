/**
 * Dispatchers per traffic class
 * Turns a ProxyConfig route into something fetch/undici can use
 */

import type { Dispatcher } from 'undici';
import { TrafficClass, createLogger, maskProxyUrl } from '@strix/proxy-config';
import type { ProxyConfig } from '@strix/proxy-config';
import { createProxyAgent, type ProxyAgentOptions } from './agents.mjs';
import { UnsupportedProxyTransportError } from './errors.mjs';

const log = createLogger('proxy-dispatcher.dispatcher');

export type DispatcherOptions = ProxyAgentOptions;

/**
 * Get the dispatcher for a traffic class
 *
 * Logic:
 * 1. No effective proxy → undefined (use default fetch behavior)
 * 2. HTTP/HTTPS proxy → ProxyAgent
 * 3. SOCKS proxy → UnsupportedProxyTransportError; the caller builds its own transport
 *
 * @example
 * await fetch(url, { dispatcher: createTrafficDispatcher(config, TrafficClass.TOOLS) });
 */
export function createTrafficDispatcher(
  config: ProxyConfig,
  trafficClass: TrafficClass,
  options: DispatcherOptions = {}
): Dispatcher | undefined {
  const route = config.resolveRoute(trafficClass);

  switch (route.kind) {
    case 'none':
      log.debug(`createTrafficDispatcher: trafficClass=${trafficClass}, no proxy configured`);
      return undefined;
    case 'socks':
      throw new UnsupportedProxyTransportError(
        `${route.scheme} proxy for ${trafficClass} traffic needs a SOCKS transport: ${maskProxyUrl(route.url)}`,
        trafficClass,
        route.url
      );
    case 'simple':
      log.debug(
        `createTrafficDispatcher: trafficClass=${trafficClass}, proxy=${maskProxyUrl(route.url)}`
      );
      return createProxyAgent(route.url, options);
  }
}

/**
 * Fetch options an LLM client can be constructed with, so the LLM proxy is
 * passed in explicitly instead of through HTTP_PROXY/HTTPS_PROXY.
 */
export function createLlmFetchOptions(
  config: ProxyConfig,
  options: DispatcherOptions = {}
): { dispatcher?: Dispatcher } {
  const dispatcher = createTrafficDispatcher(config, TrafficClass.LLM, options);
  return dispatcher ? { dispatcher } : {};
}
