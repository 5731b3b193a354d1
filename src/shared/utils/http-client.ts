/**
 * Shared HTTP Client Utilities
 *
 * Provides the HTTP session used by bank clients:
 * - Cookie jar management with tough-cookie
 * - Redirects followed by hand so every hop's cookies land in the jar
 * - GET / form submission helpers
 * - Body decoding from the response charset
 *
 * ## CookieFetch
 *
 * ```typescript
 * const http = createCookieFetch({ timeout: 10000 });
 * const page = await http.get('https://example.com/login');
 * await http.submitForm('https://example.com/auth', 'POST', { user: 'foo', pass: 'bar' });
 * ```
 *
 * @see {@link CookieFetch} - Main HTTP client class
 * @see {@link createCookieFetch} - Factory function
 */

import { CookieJar, Cookie } from 'tough-cookie';
import { SessionError } from '../errors.js';
import { getErrorMessage, lowerCaseKeys } from './helpers.js';
import { createLogger, type Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Custom user agent */
  userAgent?: string;
  /** Headers sent with every request (default: Accept-Language only) */
  defaultHeaders?: Record<string, string>;
  /** Redirect hops followed before giving up (default: 10) */
  maxRedirects?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  logger?: Logger;
}

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  ok: boolean;
  headers: Headers;
  body: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'fr-FR';
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar
// ============================================================================

export class CookieFetch {
  private cookieJar: CookieJar;
  private config: Required<Omit<HttpClientConfig, 'logger'>>;
  private logger: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? 30000,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      defaultHeaders: config.defaultHeaders ?? { 'Accept-Language': DEFAULT_ACCEPT_LANGUAGE },
      maxRedirects: config.maxRedirects ?? 10,
      fetch: config.fetch ?? ((input, init) => fetch(input, init))
    };
    this.logger = config.logger ?? createLogger('HTTP');
  }

  /**
   * Make an HTTP request with automatic cookie handling and redirects.
   * Network failures and timeouts surface as SessionError; HTTP error
   * statuses are returned to the caller.
   */
  async request(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    let method: HttpMethod = options.method ?? 'GET';
    let body = options.body;
    let currentUrl = url;

    for (let hop = 0; hop <= this.config.maxRedirects; hop++) {
      const response = await this.send(currentUrl, method, options.headers, body);
      const location = response.headers.get('location');

      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return {
          url: currentUrl,
          status: response.status,
          ok: response.ok,
          headers: response.headers,
          body: await decodeBody(response)
        };
      }

      // Drain the redirect body so the connection can be reused
      await response.arrayBuffer();

      const nextUrl = new URL(location, currentUrl).toString();
      this.logger.debug(`[Redirect] ${response.status} ${currentUrl} -> ${nextUrl}`);

      if (response.status !== 307 && response.status !== 308) {
        method = 'GET';
        body = undefined;
      }
      currentUrl = nextUrl;
    }

    throw new SessionError(`Too many redirects (more than ${this.config.maxRedirects})`, { url });
  }

  /**
   * GET a page
   */
  async get(url: string, headers?: Record<string, string>): Promise<HttpResponse> {
    return this.request(url, { method: 'GET', headers });
  }

  /**
   * Submit form data the way a browser would: POST as an urlencoded body,
   * GET as the query string.
   */
  async submitForm(
    url: string,
    method: HttpMethod,
    formData: Record<string, string>,
    headers?: Record<string, string>
  ): Promise<HttpResponse> {
    const encoded = new URLSearchParams(formData).toString();

    if (method === 'GET') {
      const target = new URL(url);
      target.search = encoded;
      return this.request(target.toString(), { method: 'GET', headers });
    }

    return this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': FORM_CONTENT_TYPE, ...(headers ?? {}) },
      body: encoded
    });
  }

  /**
   * Get all cookies for a URL
   */
  async getCookies(url: string): Promise<Cookie[]> {
    return this.cookieJar.getCookies(url);
  }

  /**
   * Get cookie string for a URL
   */
  async getCookieString(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  /**
   * Set a cookie manually
   */
  async setCookie(cookie: string, url: string): Promise<void> {
    await this.cookieJar.setCookie(cookie, url);
  }

  /**
   * Clear all cookies
   */
  async clearCookies(): Promise<void> {
    this.cookieJar = new CookieJar();
  }

  private async send(
    url: string,
    method: HttpMethod,
    extraHeaders: Record<string, string> | undefined,
    body: string | undefined
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'user-agent': this.config.userAgent,
      ...lowerCaseKeys(this.config.defaultHeaders),
      ...lowerCaseKeys(extraHeaders ?? {})
    };

    if (body === undefined) {
      delete headers['content-type'];
    }

    // Add cookies from jar
    const cookieString = await this.cookieJar.getCookieString(url);
    if (cookieString) {
      headers['cookie'] = cookieString;
      this.logger.debug(`   [Cookie] Sending ${cookieString.split(';').length} cookie(s)`);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    try {
      this.logger.debug(`   [${method}] ${url}`);
      response = await this.config.fetch(url, {
        method,
        headers,
        body,
        redirect: 'manual',
        signal: controller.signal
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new SessionError(`Request timeout after ${this.config.timeout}ms`, { url, cause: error });
      }
      throw new SessionError(`Request failed: ${getErrorMessage(error)}`, { url, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    // Capture cookies from response
    for (const header of response.headers.getSetCookie()) {
      const cookie = Cookie.parse(header);
      if (!cookie) {
        this.logger.debug(`   [Cookie] Ignoring unparseable Set-Cookie header`);
        continue;
      }
      await this.cookieJar.setCookie(cookie, url, { ignoreError: true });
      this.logger.debug(`   [Cookie] Set: ${cookie.key}`);
    }

    this.logger.debug(`   [Response] ${response.status} ${response.statusText}`);

    return response;
  }
}

// ============================================================================
// Body Decoding
// ============================================================================

/**
 * Read the charset parameter of a Content-Type header
 */
export function charsetOf(contentType: string | null): string {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : 'utf-8';
}

async function decodeBody(response: Response): Promise<string> {
  const bytes = await response.arrayBuffer();
  const charset = charsetOf(response.headers.get('content-type'));

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error: unknown) {
    if (!(error instanceof RangeError)) throw error;
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new CookieFetch instance
 */
export function createCookieFetch(config?: HttpClientConfig): CookieFetch {
  return new CookieFetch(config);
}
