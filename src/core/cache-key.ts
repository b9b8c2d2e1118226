/**
 * Cache key identity: (target host, proxy network host)
 *
 * Only network identity matters for header reuse. Scheme, credentials and
 * port of the proxy are dropped, so socks5://u:p@1.2.3.4:1080 and
 * http://v:q@1.2.3.4:8080 share a key. Hosts are lowercased: WHATWG URL
 * only folds case for special schemes, and socks4/socks5 are not special.
 */

import { ConfigurationError } from '../types/errors.js';

export const DIRECT_CONNECTION = 'direct';

/**
 * Bare host of a proxy URL, or null when there is no proxy
 */
export function getProxyHost(proxy: string | null | undefined): string | null {
  if (!proxy) {
    return null;
  }
  try {
    const host = new URL(proxy).hostname.toLowerCase();
    return host || null;
  } catch {
    throw new ConfigurationError(`Invalid proxy URL: ${proxy.replace(/\/\/[^@/]*@/, '//***@')}`);
  }
}

/**
 * Host component of the target URL (port included when explicit)
 */
export function getTargetHost(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid target URL: ${url}`);
  }
  if (!parsed.host) {
    throw new ConfigurationError(`Target URL has no host: ${url}`);
  }
  return parsed.host.toLowerCase();
}

export function computeCacheKey(url: string, proxy?: string | null): string {
  return `${getTargetHost(url)}:${getProxyHost(proxy) ?? DIRECT_CONNECTION}`;
}
