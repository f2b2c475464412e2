import type { CancellationToken, SessionCookie } from '@tunnelkit/core';

/** Resolves true when the portal still accepts the cookie. */
export type CookieProbe = (cookie: SessionCookie, token: CancellationToken) => Promise<boolean>;

export interface HttpCookieProbeOptions {
  portalUrl: string;
  userAgent: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Paths the portal redirects to when the session is gone. */
const SIGNED_OUT_PATH = /\/(welcome\.cgi|login|saml|logout)/i;

/**
 * Probes the portal with the cookie attached. A cookie is accepted when
 * the request ends in a 2xx without landing on a sign-in page. Network
 * errors count as rejection; the caller then logs in afresh.
 */
export function createHttpCookieProbe(options: HttpCookieProbeOptions): CookieProbe {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;

  return async (cookie, token) => {
    if (token.isCancelled) return false;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const unsubscribe = token.onCancel(() => controller.abort());
    try {
      const response = await fetchImpl(options.portalUrl, {
        method: 'GET',
        redirect: 'follow',
        headers: {
          Cookie: `${cookie.name}=${cookie.value}`,
          'User-Agent': options.userAgent,
        },
        signal: controller.signal,
      });
      return response.ok && !SIGNED_OUT_PATH.test(new URL(response.url || options.portalUrl).pathname);
    } catch {
      return false;
    } finally {
      clearTimeout(timer);
      unsubscribe();
    }
  };
}
