import type { Logging } from 'homebridge';

import { PortalError } from './types.js';

const REQUEST_TIMEOUT_MS = 30000;
const MAX_REDIRECTS = 10;
const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

export interface PortalRequest {
  method: string;
  headers?: Record<string, string>;
  body?: string;
}

/**
 * A fully read response. `url` is where the redirect chain ended.
 */
export interface PortalResponse {
  status: number;
  url: string;
  text: string;
}

/**
 * Cookie-carrying HTTP context for the portal.
 * Redirects are followed by hand so cookies set along the chain are kept.
 * Cookies are only sent back to the origin that set them.
 */
export class PortalSession {
  private readonly cookies = new Map<string, Map<string, string>>();

  constructor(private readonly log: Logging) {}

  async request(url: string, init: PortalRequest): Promise<PortalResponse> {
    let currentUrl = url;
    let method = init.method;
    let body = init.body;
    let headers = init.headers;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.send(currentUrl, method, headers, body);
      this.mergeCookies(currentUrl, response.headers.getSetCookie?.() || []);

      const location = response.headers.get('location');
      if (response.status >= 300 && response.status < 400 && location) {
        const nextUrl = new URL(location, currentUrl).toString();
        this.log.debug(`[Session] ${response.status} ${currentUrl} -> ${nextUrl}`);
        currentUrl = nextUrl;

        // 307/308 replay the request, everything else becomes a GET
        if (response.status !== 307 && response.status !== 308) {
          method = 'GET';
          body = undefined;
          headers = withoutContentType(headers);
        }
        continue;
      }

      return {
        status: response.status,
        url: currentUrl,
        text: await response.text(),
      };
    }

    throw new PortalError(`Too many redirects starting from ${url}`, 'network');
  }

  /**
   * Cookie header for a request to `url`; empty when that origin set none
   */
  cookieHeaderFor(url: string): string {
    const jar = this.cookies.get(new URL(url).origin);
    if (!jar) {
      return '';
    }
    return Array.from(jar.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  private async send(
    url: string,
    method: string,
    headers: Record<string, string> | undefined,
    body: string | undefined,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    const cookie = this.cookieHeaderFor(url);

    try {
      return await fetch(url, {
        method,
        headers: {
          'User-Agent': USER_AGENT,
          ...(cookie ? { Cookie: cookie } : {}),
          ...headers,
        },
        body,
        redirect: 'manual',
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new PortalError('Request timed out', 'network');
        }
        throw new PortalError(`Network error: ${error.message}`, 'network');
      }
      throw new PortalError('Unknown network error', 'network');
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Add/update the jar of the responding origin with Set-Cookie headers
   */
  private mergeCookies(url: string, setCookies: string[]): void {
    if (setCookies.length === 0) {
      return;
    }

    const origin = new URL(url).origin;
    const jar = this.cookies.get(origin) ?? new Map<string, string>();
    this.cookies.set(origin, jar);

    for (const setCookie of setCookies) {
      const cookiePart = setCookie.split(';')[0];
      const [name, ...valueParts] = cookiePart.split('=');
      if (name) {
        jar.set(name.trim(), valueParts.join('='));
      }
    }
  }
}

function withoutContentType(headers: Record<string, string> | undefined): Record<string, string> | undefined {
  if (!headers) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type'));
}
