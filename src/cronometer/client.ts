/**
 * CronometerClient - Unified client
 *
 * The recommended way to pull personal data out of Cronometer.
 *
 * ## Login Flow
 *
 * 1. GET `/login/` → Extract `anticsrf`
 * 2. POST `/login` → Email + password
 * 3. GWT `authenticate` → User id (+ `sesnonce` cookie)
 *
 * ## Exports
 *
 * Every export call mints a fresh token with GWT
 * `generateAuthorizationToken`, then downloads CSV from `/export`.
 * `get*Raw()` return that CSV; `get*()` parse it into records.
 *
 * @example
 * ```typescript
 * import { createCronometerClient } from 'cronometer-export';
 *
 * const client = createCronometerClient();
 * await client.login('me@example.com', 'my-password');
 * const servings = await client.getServings('2024-01-01', '2024-01-31');
 * await client.close();
 * ```
 *
 * @see {@link CronometerAuth} - Lower-level authenticator
 */

import { CronometerAuth, type CronometerAuthConfig } from './auth/cronometer-auth.js';
import { fetchExport } from './http/export-fetcher.js';
import {
  parseBiometrics,
  parseDailyNutrition,
  parseExercises,
  parseNotes,
  parseServings
} from './parsers/csv-parser.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';
import type {
  BiometricEntry,
  DailyNutrition,
  Exercise,
  ExportDate,
  ExportType,
  Note,
  Serving,
  SessionIdentity
} from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export type CronometerClientConfig = CronometerAuthConfig;

// ============================================================================
// CronometerClient
// ============================================================================

export class CronometerClient {
  private auth: CronometerAuth;
  private logger: Logger;

  constructor(config: CronometerClientConfig = {}) {
    this.auth = new CronometerAuth(config);
    this.logger = createLogger('CronometerClient', config.debug ? { level: 'debug' } : undefined);
  }

  /**
   * Authenticate with Cronometer
   *
   * @throws {CronometerAuthError} login rejected
   * @throws {GwtVersionError} GWT values are outdated
   */
  async login(email: string, password: string): Promise<SessionIdentity> {
    return this.auth.login(email, password);
  }

  async logout(): Promise<void> {
    await this.auth.logout();
  }

  isAuthenticated(): boolean {
    return this.auth.isAuthenticated();
  }

  /**
   * Access to the authenticator, e.g. to mint tokens for custom requests
   */
  getAuth(): CronometerAuth {
    return this.auth;
  }

  /**
   * Download one export as CSV text, with a freshly minted token
   */
  async exportRaw(type: ExportType, start: ExportDate, end: ExportDate): Promise<string> {
    const token = await this.auth.mintExportToken();
    this.logger.debug(`Exporting ${type}`);
    const csv = await fetchExport(this.auth.getHttpClient(), token, type, start, end);
    this.logger.debug(`Got ${type} export (${csv.length} chars)`);
    return csv;
  }

  // --- Raw exports ---

  async getServingsRaw(start: ExportDate, end: ExportDate): Promise<string> {
    return this.exportRaw('servings', start, end);
  }

  async getDailyNutritionRaw(start: ExportDate, end: ExportDate): Promise<string> {
    return this.exportRaw('dailySummary', start, end);
  }

  async getBiometricsRaw(start: ExportDate, end: ExportDate): Promise<string> {
    return this.exportRaw('biometrics', start, end);
  }

  async getNotesRaw(start: ExportDate, end: ExportDate): Promise<string> {
    return this.exportRaw('notes', start, end);
  }

  async getExercisesRaw(start: ExportDate, end: ExportDate): Promise<string> {
    return this.exportRaw('exercises', start, end);
  }

  // --- Parsed exports ---

  /**
   * Food servings for a date range (both ends inclusive)
   */
  async getServings(start: ExportDate, end: ExportDate): Promise<Serving[]> {
    return parseServings(await this.getServingsRaw(start, end));
  }

  async getDailyNutrition(start: ExportDate, end: ExportDate): Promise<DailyNutrition[]> {
    return parseDailyNutrition(await this.getDailyNutritionRaw(start, end));
  }

  async getBiometrics(start: ExportDate, end: ExportDate): Promise<BiometricEntry[]> {
    return parseBiometrics(await this.getBiometricsRaw(start, end));
  }

  async getNotes(start: ExportDate, end: ExportDate): Promise<Note[]> {
    return parseNotes(await this.getNotesRaw(start, end));
  }

  async getExercises(start: ExportDate, end: ExportDate): Promise<Exercise[]> {
    return parseExercises(await this.getExercisesRaw(start, end));
  }

  /**
   * Logout (when logged in) and drop the session
   */
  async close(): Promise<void> {
    if (this.auth.isAuthenticated()) {
      await this.auth.logout();
    } else {
      this.auth.reset();
    }
    this.logger.debug('Client closed');
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new CronometerClient instance
 */
export function createCronometerClient(config?: CronometerClientConfig): CronometerClient {
  return new CronometerClient(config);
}
