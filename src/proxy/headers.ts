/**
 * Header filtering
 *
 * Headers travel as ordered name/value pairs (Node's rawHeaders) so that
 * repeated headers survive the trip. Values that are not visible ASCII are
 * dropped one by one instead of failing the request.
 */

import type { OutgoingHttpHeaders } from 'http';
import type { HeaderPairs } from './types.js';

/**
 * Inbound headers never sent upstream: `host` names this gate rather than
 * the upstream, and `authorization` carries the gate's own key.
 */
export const EXCLUDED_REQUEST_HEADERS: ReadonlySet<string> = new Set(['host', 'authorization']);

const TRANSMITTABLE_VALUE = /^[\t\x20-\x7e]*$/;

/**
 * Whether a header value can be re-sent as text (tab, space, visible ASCII)
 */
export function isTransmittableHeaderValue(value: string): boolean {
  return TRANSMITTABLE_VALUE.test(value);
}

/**
 * Turn Node's flat rawHeaders array into name/value pairs
 */
export function pairRawHeaders(rawHeaders: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    pairs.push([rawHeaders[i], rawHeaders[i + 1]]);
  }
  return pairs;
}

/**
 * Keep every pair whose name is not excluded and whose value is transmittable
 */
export function filterHeaders(
  headers: HeaderPairs,
  excluded: ReadonlySet<string> = new Set()
): Array<[string, string]> {
  const kept: Array<[string, string]> = [];
  for (const [name, value] of headers) {
    if (excluded.has(name.toLowerCase())) continue;
    if (!isTransmittableHeaderValue(value)) continue;
    kept.push([name, value]);
  }
  return kept;
}

/**
 * Group pairs by case-insensitive name. A repeated name becomes an array,
 * which Node writes back out as repeated header lines. The first spelling
 * seen is kept.
 */
export function groupHeaders(headers: HeaderPairs): OutgoingHttpHeaders {
  const grouped: OutgoingHttpHeaders = {};
  const spelling = new Map<string, string>();

  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    const key = spelling.get(lower);

    if (key === undefined) {
      spelling.set(lower, name);
      grouped[name] = value;
      continue;
    }

    const existing = grouped[key];
    if (Array.isArray(existing)) {
      existing.push(value);
    } else if (existing !== undefined) {
      grouped[key] = [String(existing), value];
    }
  }

  return grouped;
}
