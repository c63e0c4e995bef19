/**
 * Environment switches for proxy-dispatcher
 */

import process from 'node:process';
import { createLogger } from '@strix/proxy-config';

const log = createLogger('proxy-dispatcher.config');

/**
 * Check whether TLS certificate validation is disabled through the environment.
 * True for NODE_TLS_REJECT_UNAUTHORIZED=0, or SSL_CERT_VERIFY=0 / false.
 */
export function isSslVerifyDisabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const nodeTls = env['NODE_TLS_REJECT_UNAUTHORIZED'];
  const certVerify = env['SSL_CERT_VERIFY']?.toLowerCase();
  const result = nodeTls === '0' || certVerify === '0' || certVerify === 'false';
  log.debug(
    `isSslVerifyDisabledByEnv: NODE_TLS_REJECT_UNAUTHORIZED=${nodeTls ?? 'undefined'}, ` +
      `SSL_CERT_VERIFY=${certVerify ?? 'undefined'}, result=${result}`
  );
  return result;
}
