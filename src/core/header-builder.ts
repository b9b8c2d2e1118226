/**
 * Header Builder
 *
 * Turns the session's cookies into a replayable header set: the default
 * template overlaid with cookie, referer and user-agent.
 */

import { FormatError } from '../types/errors.js';
import type { CookieRecord, HeaderSet } from '../types/index.js';

function isCookieRecord(value: unknown): value is CookieRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'value' in value &&
    typeof value.name === 'string' &&
    typeof value.value === 'string'
  );
}

/**
 * Validate a raw readCookies() result.
 *
 * @throws FormatError when the result is not an array
 */
export function parseCookies(raw: unknown): CookieRecord[] {
  if (!Array.isArray(raw)) {
    const kind = raw === null ? 'null' : typeof raw;
    throw new FormatError(`Expected an array of cookies, got ${kind}`);
  }
  // Records without a string name and value are skipped, not fatal
  return raw.filter(isCookieRecord);
}

/**
 * `name=value; name=value` in session order, duplicates kept
 */
export function serializeCookies(cookies: readonly CookieRecord[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
}

export interface BuildHeadersInput {
  cookies: unknown;
  url: string;
  userAgent: string;
  template: Readonly<Record<string, string>>;
}

export function buildHeaders(input: BuildHeadersInput): HeaderSet {
  const cookie = serializeCookies(parseCookies(input.cookies));

  return Object.freeze({
    ...input.template,
    cookie,
    referer: input.url,
    'user-agent': input.userAgent,
  });
}
