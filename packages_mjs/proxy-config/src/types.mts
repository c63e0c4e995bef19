/**
 * Type definitions for proxy-config
 */

/**
 * Traffic classes that can be routed through an upstream proxy
 */
export const TrafficClass = {
  TOOLS: 'tools',
  LLM: 'llm',
} as const;

/**
 * Traffic class names
 *
 * - tools: outbound requests made by agent/tool execution
 * - llm: requests to the language-model provider API
 */
export type TrafficClass = (typeof TrafficClass)[keyof typeof TrafficClass];

/**
 * Schemes accepted for an upstream proxy
 */
export const SUPPORTED_PROXY_SCHEMES = ['http', 'https', 'socks5', 'socks5h'] as const;

export type ProxyScheme = (typeof SUPPORTED_PROXY_SCHEMES)[number];

/**
 * Schemes that need a SOCKS transport instead of a plain HTTP proxy
 */
export const SOCKS_PROXY_SCHEMES: readonly ProxyScheme[] = ['socks5', 'socks5h'];

/**
 * Environment variables read by the loader, keyed by config field
 */
export const PROXY_ENV_VARS = {
  toolsProxy: 'STRIX_PROXY_TOOLS',
  llmProxy: 'STRIX_PROXY_LLM',
  allProxy: 'STRIX_PROXY_ALL',
} as const;

/**
 * Logical field names used in validation errors
 */
export type ProxyFieldName = (typeof PROXY_ENV_VARS)[keyof typeof PROXY_ENV_VARS];

/**
 * Options accepted by the ProxyConfig constructor.
 * Empty strings are treated like absent values.
 */
export interface ProxyConfigOptions {
  /** Proxy for tool/process traffic (STRIX_PROXY_TOOLS) */
  toolsProxy?: string | null;
  /** Proxy for LLM API traffic (STRIX_PROXY_LLM) */
  llmProxy?: string | null;
  /** Catch-all proxy used when no class-specific proxy is set (STRIX_PROXY_ALL) */
  allProxy?: string | null;
}

/**
 * How a traffic class has to be routed
 */
export type ProxyRoute =
  | { kind: 'none' }
  | { kind: 'simple'; url: string; scheme: 'http' | 'https' }
  | { kind: 'socks'; url: string; scheme: 'socks5' | 'socks5h' };

/**
 * One proxy URL per target scheme (requests-style proxies mapping)
 */
export interface SimpleProxyMap {
  http: string;
  https: string;
}

/**
 * Sentinel key marking a SOCKS proxy in a scheme-keyed mapping
 */
export const SOCKS_PROXY_SENTINEL = '_socks_proxy';

/**
 * URL-prefix keyed proxies mapping, or the SOCKS sentinel mapping
 */
export type SchemeKeyedProxyMap =
  | { 'http://': string; 'https://': string }
  | { [SOCKS_PROXY_SENTINEL]: string };

/**
 * Standard proxy environment variables honoured by LLM clients
 */
export interface LlmClientProxyEnv {
  HTTP_PROXY?: string;
  HTTPS_PROXY?: string;
}
