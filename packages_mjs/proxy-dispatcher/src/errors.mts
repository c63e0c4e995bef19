/**
 * Error types for proxy-dispatcher
 */

import type { TrafficClass } from '@strix/proxy-config';

/**
 * Thrown when a traffic class is routed through a proxy that needs a
 * transport this package does not build (SOCKS5).
 */
export class UnsupportedProxyTransportError extends Error {
  readonly code = 'UNSUPPORTED_PROXY_TRANSPORT';
  readonly trafficClass: TrafficClass;
  readonly url: string;

  constructor(message: string, trafficClass: TrafficClass, url: string) {
    super(message);
    this.name = 'UnsupportedProxyTransportError';
    this.trafficClass = trafficClass;
    this.url = url;
  }
}
