/**
 * Cronometer client
 *
 * ```typescript
 * import { createCronometerClient } from 'cronometer-export';
 *
 * const client = createCronometerClient();
 * await client.login('me@example.com', 'my-password');
 * const days = await client.getDailyNutrition('2024-01-01', '2024-01-07');
 * await client.close();
 * ```
 */

// Main client (recommended)
export {
  CronometerClient,
  createCronometerClient,
  type CronometerClientConfig
} from './client.js';

// Advanced: authenticator and export fetch
export {
  CronometerAuth,
  createCronometerAuth,
  type CronometerAuthConfig
} from './auth/cronometer-auth.js';
export { fetchExport, buildExportQuery } from './http/export-fetcher.js';

// Errors
export {
  CronometerError,
  CronometerAuthError,
  GwtVersionError,
  ExportError,
  isCronometerError
} from './errors.js';
export type { CronometerErrorKind, CronometerFailure } from './errors.js';

// GWT-RPC codec and configuration
export * from './gwt/index.js';

// CSV parsers
export {
  parseServings,
  parseDailyNutrition,
  parseBiometrics,
  parseNotes,
  parseExercises
} from './parsers/csv-parser.js';

// Types and constants
export type {
  CronometerCredentials,
  GwtConfig,
  GwtConfigOverrides,
  SessionIdentity,
  ExportType,
  ExportDate,
  RawRow,
  Serving,
  BiometricEntry,
  Note,
  DailyNutrition,
  Exercise
} from './types/index.js';

export { EXPORT_TYPES, CRONOMETER_URLS, CRONOMETER_CONFIG } from './types/index.js';

// Default export
import { CronometerClient } from './client.js';
export default CronometerClient;
