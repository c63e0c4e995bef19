/**
 * Upstream proxy configuration for tools traffic and LLM traffic
 *
 * Holds up to three proxy URLs, validates them once on construction and
 * derives the shapes HTTP client libraries expect. Specific-purpose settings
 * always win over the catch-all proxy.
 */

import { ConfigurationError } from './errors.mjs';
import { maskProxyUrl } from './logger.mjs';
import {
  PROXY_ENV_VARS,
  SOCKS_PROXY_SCHEMES,
  SOCKS_PROXY_SENTINEL,
  SUPPORTED_PROXY_SCHEMES,
  TrafficClass,
} from './types.mjs';
import type {
  LlmClientProxyEnv,
  ProxyConfigOptions,
  ProxyFieldName,
  ProxyRoute,
  ProxyScheme,
  SchemeKeyedProxyMap,
  SimpleProxyMap,
} from './types.mjs';

/** `scheme://authority`, capturing the authority */
const AUTHORITY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

function isSupportedScheme(scheme: string): scheme is ProxyScheme {
  return SUPPORTED_PROXY_SCHEMES.some((supported) => supported === scheme);
}

function isSocksScheme(scheme: ProxyScheme): scheme is 'socks5' | 'socks5h' {
  return SOCKS_PROXY_SCHEMES.includes(scheme);
}

/**
 * Read the port exactly as written in the URL.
 * WHATWG URL drops default ports (http://p:80 has port ''), so the parsed
 * port alone cannot tell an explicit :80 from a missing port.
 */
function explicitPort(proxyUrl: string): number | null {
  const authority = AUTHORITY_PATTERN.exec(proxyUrl)?.[1];
  if (authority === undefined) return null;

  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);
  const portStart = hostPort.startsWith('[')
    ? hostPort.indexOf(']:') + 1
    : hostPort.lastIndexOf(':');
  if (portStart <= 0) return null;

  const digits = hostPort.slice(portStart + 1);
  if (!/^\d+$/.test(digits)) return null;
  return Number(digits);
}

function schemeOf(proxyUrl: string): ProxyScheme {
  const scheme = new URL(proxyUrl).protocol.slice(0, -1);
  if (!isSupportedScheme(scheme)) {
    throw new TypeError(`Unsupported proxy scheme: ${scheme}`);
  }
  return scheme;
}

/**
 * Validate a proxy URL
 *
 * @param proxyUrl - URL to check
 * @param fieldName - Logical field the URL came from, used in the error
 * @returns The proxy scheme
 * @throws ConfigurationError when the URL is unparseable, uses an unsupported
 *   scheme, or lacks a hostname or an explicit non-zero port
 */
export function validateProxyUrl(proxyUrl: string, fieldName: ProxyFieldName): ProxyScheme {
  let parsed: URL;
  try {
    parsed = new URL(proxyUrl);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid proxy URL in ${fieldName}: ${proxyUrl}`,
      fieldName,
      proxyUrl,
      { cause: error }
    );
  }

  const scheme = parsed.protocol.slice(0, -1);
  if (!isSupportedScheme(scheme)) {
    throw new ConfigurationError(
      `Invalid proxy scheme in ${fieldName}: ${scheme}. ` +
        `Supported schemes: ${SUPPORTED_PROXY_SCHEMES.join(', ')} (${proxyUrl})`,
      fieldName,
      proxyUrl
    );
  }

  if (!parsed.hostname || !AUTHORITY_PATTERN.test(proxyUrl)) {
    throw new ConfigurationError(`Missing hostname in ${fieldName}: ${proxyUrl}`, fieldName, proxyUrl);
  }

  const port = explicitPort(proxyUrl);
  if (!port) {
    throw new ConfigurationError(`Missing port in ${fieldName}: ${proxyUrl}`, fieldName, proxyUrl);
  }

  return scheme;
}

/**
 * Configuration for upstream proxies
 *
 * @example
 * const config = new ProxyConfig({ allProxy: 'socks5://127.0.0.1:1080' });
 * config.getEffectiveLlmProxy(); // 'socks5://127.0.0.1:1080'
 */
export class ProxyConfig {
  readonly toolsProxy: string | null;
  readonly llmProxy: string | null;
  readonly allProxy: string | null;

  constructor(options: ProxyConfigOptions = {}) {
    this.toolsProxy = options.toolsProxy || null;
    this.llmProxy = options.llmProxy || null;
    this.allProxy = options.allProxy || null;

    const fields: Array<[ProxyFieldName, string | null]> = [
      [PROXY_ENV_VARS.toolsProxy, this.toolsProxy],
      [PROXY_ENV_VARS.llmProxy, this.llmProxy],
      [PROXY_ENV_VARS.allProxy, this.allProxy],
    ];
    for (const [fieldName, proxyUrl] of fields) {
      if (proxyUrl) {
        validateProxyUrl(proxyUrl, fieldName);
      }
    }

    Object.freeze(this);
  }

  /**
   * Proxy for tools traffic: tools proxy, else the catch-all
   */
  getEffectiveToolsProxy(): string | null {
    return this.toolsProxy ?? this.allProxy;
  }

  /**
   * Proxy for LLM traffic: LLM proxy, else the catch-all
   */
  getEffectiveLlmProxy(): string | null {
    return this.llmProxy ?? this.allProxy;
  }

  getEffectiveProxy(trafficClass: TrafficClass): string | null {
    switch (trafficClass) {
      case TrafficClass.TOOLS:
        return this.getEffectiveToolsProxy();
      case TrafficClass.LLM:
        return this.getEffectiveLlmProxy();
    }
  }

  /**
   * Describe how a traffic class must be routed
   */
  resolveRoute(trafficClass: TrafficClass = TrafficClass.TOOLS): ProxyRoute {
    const url = this.getEffectiveProxy(trafficClass);
    if (!url) {
      return { kind: 'none' };
    }

    const scheme = schemeOf(url);
    if (isSocksScheme(scheme)) {
      return { kind: 'socks', url, scheme };
    }
    return { kind: 'simple', url, scheme };
  }

  /**
   * Proxies in requests-library format
   *
   * @returns Both `http` and `https` set to the proxy URL, or null if no proxy
   */
  toSimpleProxyMap(trafficClass: TrafficClass = TrafficClass.TOOLS): SimpleProxyMap | null {
    const url = this.getEffectiveProxy(trafficClass);
    if (!url) {
      return null;
    }
    return { http: url, https: url };
  }

  /**
   * Proxies keyed by URL prefix, for clients that match on `http://` / `https://`.
   *
   * SOCKS proxies come back as `{ _socks_proxy: url }`: the caller has to build
   * a SOCKS transport itself. Prefer resolveRoute() in new code.
   */
  toSchemeKeyedProxyMap(trafficClass: TrafficClass = TrafficClass.TOOLS): SchemeKeyedProxyMap | null {
    const route = this.resolveRoute(trafficClass);
    switch (route.kind) {
      case 'none':
        return null;
      case 'socks':
        return { [SOCKS_PROXY_SENTINEL]: route.url };
      case 'simple':
        return { 'http://': route.url, 'https://': route.url };
    }
  }

  /**
   * Environment variables an LLM client reads its proxy from
   */
  toLlmClientEnv(): LlmClientProxyEnv {
    const llmProxy = this.getEffectiveLlmProxy();
    if (!llmProxy) {
      return {};
    }
    return { HTTP_PROXY: llmProxy, HTTPS_PROXY: llmProxy };
  }

  /**
   * Serialisable view with credentials masked
   */
  toJSON(): Record<'toolsProxy' | 'llmProxy' | 'allProxy', string | null> {
    return {
      toolsProxy: this.toolsProxy && maskProxyUrl(this.toolsProxy),
      llmProxy: this.llmProxy && maskProxyUrl(this.llmProxy),
      allProxy: this.allProxy && maskProxyUrl(this.allProxy),
    };
  }
}
