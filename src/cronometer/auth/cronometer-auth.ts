/**
 * Cronometer Session Authenticator
 *
 * Drives the login handshake over a single cookie-bearing HTTP session:
 * 1. GET `/login/` - Load login page, extract the `anticsrf` hidden field
 * 2. POST `/login` - Submit username + password + anticsrf, expect `{ success: true }`
 * 3. POST `/cronometer/app` - GWT `authenticate`, decode the user id
 * 4. Read the `sesnonce` cookie set by step 3
 *
 * Export tokens are minted per request with GWT `generateAuthorizationToken`.
 *
 * Failures are classified: {@link CronometerAuthError} for credential and
 * session problems, {@link GwtVersionError} when the GWT-RPC contract no
 * longer matches the built-in magic values.
 *
 * One instance holds one session. Do not run two logins on the same instance
 * concurrently; use one instance per account.
 */

import {
  CookieFetch,
  createCookieFetch,
  extractHiddenField,
  parseJsonResponse,
  type HttpResult
} from '../../shared/utils/http-client.js';
import { createLogger, redactSensitive, truncateForLog, type Logger } from '../../shared/utils/logger.js';
import { getErrorMessage, responsePrefix } from '../../shared/utils/helpers.js';
import { CronometerAuthError, GwtVersionError } from '../errors.js';
import { resolveGwtConfig } from '../gwt/gwt-config.js';
import {
  buildGwtHeaders,
  decodeToken,
  decodeUserId,
  encodeAuthenticate,
  encodeGenerateToken,
  encodeLogout
} from '../gwt/gwt-rpc.js';
import {
  CRONOMETER_CONFIG,
  CRONOMETER_URLS,
  type GwtConfig,
  type SessionIdentity
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CronometerAuthConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Custom user agent */
  userAgent?: string;
  /** GWT permutation hash (overrides CRONOMETER_GWT_PERMUTATION and the default) */
  gwtPermutation?: string;
  /** GWT policy header hash (overrides CRONOMETER_GWT_HEADER and the default) */
  gwtHeader?: string;
  /** Environment consulted for GWT overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

interface LoginResponseBody {
  success?: unknown;
  error?: unknown;
}

function isLoginResponseBody(value: unknown): value is LoginResponseBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// CronometerAuth
// ============================================================================

export class CronometerAuth {
  private readonly gwtConfig: GwtConfig;
  private readonly httpClient: CookieFetch;
  private readonly logger: Logger;
  private identity: SessionIdentity | null = null;

  constructor(config: CronometerAuthConfig = {}) {
    this.gwtConfig = resolveGwtConfig(
      { permutation: config.gwtPermutation, header: config.gwtHeader },
      config.env
    );

    this.httpClient = createCookieFetch({
      timeout: config.timeout ?? 30000,
      debug: config.debug ?? false,
      userAgent: config.userAgent
    });

    this.logger = createLogger('CronometerAuth', config.debug ? { level: 'debug' } : undefined);
    this.logger.debug(`Initialized with GWT permutation ${this.gwtConfig.permutation}`);
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Perform the complete login handshake.
   *
   * The stored identity is replaced only when every step succeeds; a failed
   * attempt leaves any previous identity in place.
   *
   * @throws {CronometerAuthError} bad credentials, missing CSRF token, network failure
   * @throws {GwtVersionError} the GWT `authenticate` response could not be decoded
   */
  async login(email: string, password: string): Promise<SessionIdentity> {
    this.logger.info(`Starting login for ${truncateForLog(email)}`);
    const startTime = Date.now();

    try {
      this.logger.debug('Step 1: Loading login page...');
      const csrfToken = await this.fetchCsrfToken();

      this.logger.debug('Step 2: Submitting credentials...');
      await this.submitCredentials(email, password, csrfToken);

      this.logger.debug('Step 3: GWT authenticate...');
      const userId = await this.authenticateGwt();

      this.logger.debug('Step 4: Reading session nonce...');
      const nonce = await this.httpClient.getCookieValue(
        CRONOMETER_CONFIG.nonceCookieName,
        CRONOMETER_URLS.GWT_APP
      );
      if (!nonce) {
        this.logger.warn(`No ${CRONOMETER_CONFIG.nonceCookieName} cookie after GWT authenticate; exports will fail`);
      }

      this.identity = Object.freeze({ userId, nonce });
      this.logger.info(`Login successful in ${Date.now() - startTime}ms (user ${truncateForLog(userId)})`);
      return this.identity;

    } catch (error: unknown) {
      this.logger.warn(`Login failed after ${Date.now() - startTime}ms: ${getErrorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Mint a fresh export token. Tokens are never cached.
   *
   * @throws {CronometerAuthError} not logged in, no session nonce, network failure
   * @throws {GwtVersionError} the token could not be decoded
   */
  async mintExportToken(): Promise<string> {
    const identity = this.identity;
    if (!identity) {
      throw new CronometerAuthError('Not authenticated. Call login() first.');
    }
    if (!identity.nonce) {
      throw new CronometerAuthError(
        `Session nonce cookie (${CRONOMETER_CONFIG.nonceCookieName}) missing. Call login() again.`
      );
    }

    const text = await this.callGwt(
      'generateAuthorizationToken',
      encodeGenerateToken(this.gwtConfig, identity.nonce, identity.userId)
    );

    const token = decodeToken(text);
    if (token === null) {
      throw new GwtVersionError('Could not parse auth token from GWT response.', responsePrefix(text));
    }

    this.logger.debug(`Minted export token (${token.length} chars)`);
    return token;
  }

  /**
   * Logout on the server (when a nonce is held) and clear local state.
   * Local state is cleared even when the request fails.
   */
  async logout(): Promise<void> {
    const nonce = this.identity?.nonce;

    try {
      if (nonce) {
        this.logger.debug('Sending GWT logout...');
        const { response } = await this.send('GWT logout failed', () =>
          this.httpClient.postText(
            CRONOMETER_URLS.GWT_APP,
            encodeLogout(this.gwtConfig, nonce),
            buildGwtHeaders(this.gwtConfig)
          )
        );
        if (!response.ok) {
          throw new CronometerAuthError(`Logout failed with status ${response.status}`);
        }
      }
    } finally {
      this.reset();
    }
  }

  /**
   * Drop the identity and all cookies without contacting the server
   */
  reset(): void {
    this.identity = null;
    this.httpClient.clearCookies();
    this.logger.debug('Session reset');
  }

  isAuthenticated(): boolean {
    return this.identity !== null;
  }

  getIdentity(): SessionIdentity | null {
    return this.identity;
  }

  getGwtConfig(): GwtConfig {
    return this.gwtConfig;
  }

  /**
   * The underlying cookie-bearing session, shared with export requests
   */
  getHttpClient(): CookieFetch {
    return this.httpClient;
  }

  // ==========================================================================
  // Internal: Login Flow
  // ==========================================================================

  private async fetchCsrfToken(): Promise<string> {
    const page = await this.send('Could not load login page', () =>
      this.httpClient.get(CRONOMETER_URLS.LOGIN_PAGE)
    );

    if (!page.response.ok) {
      throw new CronometerAuthError(`Could not load login page: status ${page.response.status}`);
    }
    this.logger.debug(`   Got login page (${page.text.length} chars)`);

    const token = extractHiddenField(page.text, CRONOMETER_CONFIG.csrfFieldName);
    if (!token) {
      throw new CronometerAuthError('Could not find CSRF token in login page');
    }

    return token;
  }

  private async submitCredentials(email: string, password: string, csrfToken: string): Promise<void> {
    const formData = {
      username: email,
      password,
      [CRONOMETER_CONFIG.csrfFieldName]: csrfToken
    };
    this.logger.debug('   Login form', redactSensitive(formData));

    const { response, text } = await this.send('Could not submit login', () =>
      this.httpClient.postForm(CRONOMETER_URLS.LOGIN, formData, {
        'Referer': CRONOMETER_URLS.LOGIN_PAGE,
        'Accept': 'application/json, text/plain, */*'
      })
    );

    if (!response.ok) {
      throw new CronometerAuthError(`Login failed with status ${response.status}`);
    }

    const body = parseJsonResponse(text);
    const result: LoginResponseBody = isLoginResponseBody(body) ? body : {};

    if (!result.success) {
      const message = typeof result.error === 'string' && result.error ? result.error : 'Unknown login error';
      throw new CronometerAuthError(`Login failed: ${message}`);
    }
  }

  private async authenticateGwt(): Promise<string> {
    const text = await this.callGwt('authenticate', encodeAuthenticate(this.gwtConfig));

    const userId = decodeUserId(text);
    if (!userId) {
      throw new GwtVersionError('Could not parse user ID from GWT response.', responsePrefix(text));
    }

    return userId;
  }

  /**
   * Run a request; transport failures become {@link CronometerAuthError}
   * with the original error as `cause`.
   */
  private async send(context: string, request: () => Promise<HttpResult>): Promise<HttpResult> {
    try {
      return await request();
    } catch (error: unknown) {
      throw new CronometerAuthError(`${context}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * POST a GWT-RPC body and return the response text.
   * 401/403 mean the session is gone; any other failure status is how the
   * GWT servlet rejects calls built from a stale permutation or policy.
   */
  private async callGwt(method: string, body: string): Promise<string> {
    const { response, text } = await this.send(`GWT ${method} failed`, () =>
      this.httpClient.postText(CRONOMETER_URLS.GWT_APP, body, buildGwtHeaders(this.gwtConfig))
    );

    if (response.status === 401 || response.status === 403) {
      throw new CronometerAuthError(`GWT ${method} rejected with status ${response.status}`);
    }
    if (!response.ok) {
      throw new GwtVersionError(`GWT ${method} failed with status ${response.status}.`, responsePrefix(text));
    }

    return text;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a Cronometer authenticator
 */
export function createCronometerAuth(config?: CronometerAuthConfig): CronometerAuth {
  return new CronometerAuth(config);
}
