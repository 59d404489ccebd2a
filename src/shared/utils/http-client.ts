/**
 * Shared HTTP Client Utilities
 *
 * - Cookie jar management with tough-cookie
 * - Form and raw-text POST helpers
 * - Hidden form field extraction (CSRF tokens)
 *
 * ## CookieFetch
 *
 * The main class for making HTTP requests with automatic session management:
 * ```typescript
 * const http = createCookieFetch({ debug: true });
 * const page = await http.get('https://cronometer.com/login/');
 * await http.postForm('https://cronometer.com/login', { username: 'me', password: 'pw' });
 * ```
 *
 * @see {@link CookieFetch} - Main HTTP client class
 * @see {@link createCookieFetch} - Factory function
 */

import { CookieJar, Cookie } from 'tough-cookie';
import * as cheerio from 'cheerio';
import { createLogger, type Logger } from './logger.js';
import { getErrorMessage } from './helpers.js';

// ============================================================================
// Types
// ============================================================================

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Custom user agent */
  userAgent?: string;
  /** Accept language header */
  acceptLanguage?: string;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Query parameters appended to the URL */
  query?: Record<string, string>;
  body?: string;
  redirect?: 'follow' | 'manual';
}

export interface HttpResult {
  response: Response;
  text: string;
  location?: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar
// ============================================================================

export class CookieFetch {
  private cookieJar: CookieJar;
  private config: Required<HttpClientConfig>;
  private logger: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? 30000,
      debug: config.debug ?? false,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      acceptLanguage: config.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE
    };
    this.logger = createLogger('HTTP', this.config.debug ? { level: 'debug' } : undefined);
  }

  /**
   * Make an HTTP request with automatic cookie handling
   */
  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? 'GET';
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      target.searchParams.set(key, value);
    }

    const headers = new Headers({
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      'Connection': 'keep-alive'
    });
    for (const [key, value] of Object.entries(options.headers ?? {})) {
      headers.set(key, value);
    }

    const cookieString = await this.cookieJar.getCookieString(target.href);
    if (cookieString) {
      headers.set('Cookie', cookieString);
      this.logger.debug(`   [Cookie] Sending: ${cookieString.substring(0, 60)}...`);
    }

    if (method === 'POST') {
      if (!headers.has('Content-Type')) {
        headers.set('Content-Type', 'application/x-www-form-urlencoded; charset=UTF-8');
      }
      headers.set('X-Requested-With', 'XMLHttpRequest');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      this.logger.debug(`   [${method}] ${target.origin}${target.pathname}`);

      const response = await fetch(target, {
        method,
        headers,
        body: options.body,
        redirect: options.redirect ?? 'follow',
        signal: controller.signal
      });

      clearTimeout(timeoutId);

      const setCookieHeaders = response.headers.getSetCookie?.() ?? [];
      for (const header of setCookieHeaders) {
        await this.storeCookie(header, target.href);
      }

      this.logger.debug(`   [Response] ${response.status} ${response.statusText}`);

      return response;

    } catch (error: unknown) {
      clearTimeout(timeoutId);
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.config.timeout}ms`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * GET request that returns the body as text
   */
  async get(url: string, options: { headers?: Record<string, string>; query?: Record<string, string> } = {}): Promise<HttpResult> {
    const response = await this.request(url, { method: 'GET', ...options });
    const text = await response.text();
    return { response, text };
  }

  /**
   * POST form data and return result
   */
  async postForm(url: string, formData: Record<string, string>, headers?: Record<string, string>): Promise<HttpResult> {
    return this.post(url, new URLSearchParams(formData).toString(), headers);
  }

  /**
   * POST a pre-encoded body (e.g. a GWT-RPC payload); callers set Content-Type
   */
  async postText(url: string, body: string, headers?: Record<string, string>): Promise<HttpResult> {
    return this.post(url, body, headers);
  }

  private async post(url: string, body: string, headers?: Record<string, string>): Promise<HttpResult> {
    const response = await this.request(url, {
      method: 'POST',
      headers,
      body,
      redirect: 'manual' // Handle redirects manually to capture cookies
    });

    const location = response.headers.get('location') ?? undefined;
    const text = await response.text();

    return { response, text, location };
  }

  /**
   * Get all cookies for a URL
   */
  async getCookies(url: string): Promise<Cookie[]> {
    return this.cookieJar.getCookies(url);
  }

  /**
   * Value of the named cookie visible to `url`, or null
   */
  async getCookieValue(name: string, url: string): Promise<string | null> {
    const cookies = await this.cookieJar.getCookies(url);
    const cookie = cookies.find(c => c.key === name);
    return cookie ? cookie.value : null;
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
  clearCookies(): void {
    this.cookieJar = new CookieJar();
  }

  private async storeCookie(header: string, url: string): Promise<void> {
    try {
      await this.cookieJar.setCookie(header, url);
      const cookie = Cookie.parse(header);
      if (cookie) {
        this.logger.debug(`   [Cookie] Set: ${cookie.key}=${cookie.value.substring(0, 4)}...`);
      }
    } catch (error: unknown) {
      // Cookies rejected by the jar (bad domain, malformed) are not fatal to the request
      this.logger.debug(`   [Cookie] Rejected: ${getErrorMessage(error)}`);
    }
  }
}

// ============================================================================
// Form Field Extraction
// ============================================================================

/**
 * Extract the value of a hidden form field (CSRF token and similar).
 *
 * Tries, in order:
 * 1. Input field: `<input name="..." value="..." />`
 * 2. Meta tag: `<meta name="..." content="..." />`
 * 3. Regex fallback for malformed HTML
 *
 * @returns The non-empty value, or null if not found
 *
 * @example
 * ```typescript
 * const { text } = await http.get('https://cronometer.com/login/');
 * const csrf = extractHiddenField(text, 'anticsrf');
 * ```
 */
export function extractHiddenField(html: string, name: string): string | null {
  const $ = cheerio.load(html);

  const inputValue = $(`input[name="${name}"]`).attr('value');
  if (inputValue) {
    return inputValue;
  }

  const metaValue = $(`meta[name="${name}"]`).attr('content');
  if (metaValue) {
    return metaValue;
  }

  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const match = html.match(new RegExp(`name="${escaped}"[^>]*value="([^"]+)"`));
  if (match) {
    return match[1];
  }

  return null;
}

/**
 * Parse a JSON body, returning undefined when it is not valid JSON
 */
export function parseJsonResponse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
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
