/**
 * cronometer-export - Cronometer Data Export Client
 *
 * A TypeScript library for pulling personal nutrition, biometric, note and
 * exercise history out of Cronometer through its web login and CSV export.
 *
 * @example
 * ```typescript
 * import { createCronometerClient, GwtVersionError } from 'cronometer-export';
 *
 * const client = createCronometerClient({ debug: true });
 * try {
 *   await client.login('me@example.com', 'my-password');
 *   const servings = await client.getServings(new Date(2024, 0, 1), new Date(2024, 0, 31));
 * } catch (error) {
 *   if (error instanceof GwtVersionError) {
 *     // Cronometer shipped a new build: set CRONOMETER_GWT_PERMUTATION / CRONOMETER_GWT_HEADER
 *   }
 *   throw error;
 * } finally {
 *   await client.close();
 * }
 * ```
 */

// ============================================================================
// Cronometer
// ============================================================================

export * from './cronometer/index.js';

// ============================================================================
// Shared Infrastructure Exports (Advanced)
// ============================================================================

export {
  CookieFetch,
  createCookieFetch,
  extractHiddenField,
  type HttpClientConfig,
  type RequestOptions,
  type HttpResult
} from './shared/utils/http-client.js';

export {
  Logger,
  createLogger,
  redactSensitive,
  truncateForLog,
  type LogLevel,
  type LoggerConfig
} from './shared/utils/logger.js';
