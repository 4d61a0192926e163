/**
 * Single-hop redirect policy.
 *
 * @module
 */

import type { HttpResponse } from './response.js';
import { parseAbsoluteUrl } from './url.js';

/**
 * The absolute URL named by the first `Location` header, if any.
 * Values that are not UTF-8 or not absolute URLs are ignored.
 */
export function redirectTarget(response: HttpResponse): URL | undefined {
  const location = response.headers.firstText('Location');
  return location === undefined ? undefined : parseAbsoluteUrl(location);
}

/**
 * Follows at most one redirect.
 *
 * When `response` names a usable `Location`, its body is discarded and
 * `resend` is called once with the new URL; that second response is final
 * even if it carries a `Location` of its own. The status code is not
 * consulted.
 */
export async function followRedirectOnce(
  response: HttpResponse,
  resend: (location: URL) => Promise<HttpResponse>
): Promise<HttpResponse> {
  const location = redirectTarget(response);
  if (!location) {
    return response;
  }

  await response.discard();
  return resend(location);
}
