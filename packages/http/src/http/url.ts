/**
 * URL utilities for the HTTP client.
 */

import type { OutgoingRequest, Scheme } from '../transport/types.js';
import type { HttpMethod, QueryParams } from '../types/public/http.js';
import type { Fields } from './fields.js';

/**
 * Maps a URL scheme to a transport scheme tag
 */
export function toScheme(url: URL): Scheme {
  const scheme = url.protocol.slice(0, -1);
  switch (scheme) {
    case 'http':
      return { tag: 'http' };
    case 'https':
      return { tag: 'https' };
    default:
      return { tag: 'other', value: scheme };
  }
}

/**
 * `host[:port]`, prefixed with userinfo when present
 */
export function toAuthority(url: URL): string {
  if (!url.username && !url.password) {
    return url.host;
  }
  const userinfo = url.password ? `${url.username}:${url.password}` : url.username;
  return `${userinfo}@${url.host}`;
}

/**
 * Path plus `?query`. An empty query is dropped, so `/a?` and `/a` send the same path.
 */
export function toPathWithQuery(url: URL): string {
  return url.search ? `${url.pathname}${url.search}` : url.pathname;
}

/**
 * Builds the transport-level request for one exchange
 */
export function toOutgoingRequest(url: URL, method: HttpMethod, headers: Fields, hasBody: boolean): OutgoingRequest {
  return {
    method,
    scheme: toScheme(url),
    authority: toAuthority(url),
    pathWithQuery: toPathWithQuery(url),
    headers,
    hasBody,
  };
}

/**
 * Parses an absolute URL. Relative references and malformed input return undefined.
 */
export function parseAbsoluteUrl(text: string): URL | undefined {
  if (!URL.canParse(text)) {
    return undefined;
  }
  return new URL(text);
}

/**
 * Builds a complete URL from base URL, path, and query parameters.
 * Parameter names are kept literal so bracketed names such as `filter[text]` stay readable.
 */
export function buildUrl(baseUrl: string, path: string, query?: QueryParams): URL {
  const url = new URL(joinUrl(baseUrl, path));

  if (query) {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        pairs.push(`${encodeQueryName(key)}=${encodeURIComponent(String(value))}`);
      }
    }
    if (pairs.length > 0) {
      const existing = url.search.slice(1);
      url.search = existing ? `${existing}&${pairs.join('&')}` : pairs.join('&');
    }
  }

  return url;
}

/**
 * Joins a base URL with a path
 */
export function joinUrl(baseUrl: string, path: string): string {
  if (!baseUrl) return path;
  if (!path) return baseUrl;
  if (/^https?:\/\//i.test(path)) return path;

  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const suffix = path.startsWith('/') ? path : `/${path}`;
  return base + suffix;
}

function encodeQueryName(name: string): string {
  return encodeURIComponent(name).replace(/%5B/g, '[').replace(/%5D/g, ']');
}
