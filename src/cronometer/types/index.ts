// Centralized types for the Cronometer client

export interface CronometerCredentials {
  email: string;
  password: string;
}

/**
 * GWT-RPC values identifying the web client build to the server.
 * These go stale whenever Cronometer ships a new build.
 */
export interface GwtConfig {
  readonly contentType: string;
  readonly moduleBaseUrl: string;
  readonly permutation: string;
  readonly header: string;
}

export interface GwtConfigOverrides {
  permutation?: string;
  header?: string;
}

/**
 * Identity established by a successful login.
 * `nonce` is null when the server did not set the session nonce cookie.
 */
export interface SessionIdentity {
  readonly userId: string;
  readonly nonce: string | null;
}

export const EXPORT_TYPES = ['servings', 'dailySummary', 'biometrics', 'notes', 'exercises'] as const;

export type ExportType = (typeof EXPORT_TYPES)[number];

/** A calendar date: a `Date` (local calendar fields) or a YYYY-MM-DD string */
export type ExportDate = Date | string;

// Cronometer URLs and constants
export const CRONOMETER_URLS = {
  LOGIN_PAGE: 'https://cronometer.com/login/',
  LOGIN: 'https://cronometer.com/login',
  GWT_APP: 'https://cronometer.com/cronometer/app',
  EXPORT: 'https://cronometer.com/export'
} as const;

export const CRONOMETER_CONFIG = {
  csrfFieldName: 'anticsrf',
  nonceCookieName: 'sesnonce',
  /** Lifetime in seconds requested for export tokens */
  exportTokenValiditySeconds: 3600
} as const;

// ============================================================================
// Export records
// ============================================================================

/** Original CSV row, keyed by header */
export type RawRow = Record<string, string>;

interface BaseRecord {
  /** YYYY-MM-DD */
  date: string;
  raw: RawRow;
}

interface TimedRecord extends BaseRecord {
  /** HH:MM, or null when the export has no usable time */
  time: string | null;
}

/** A single food serving entry */
export interface Serving extends TimedRecord {
  foodName: string;
  servingSize: string;
  calories: number;
  proteinG: number;
  carbsG: number;
  fatG: number;
  fiberG: number;
  sugarG: number;
  sodiumMg: number;
  cholesterolMg: number;
  saturatedFatG: number;
  group: string | null;
}

/** A biometric measurement (weight, body fat, blood pressure...) */
export interface BiometricEntry extends TimedRecord {
  metric: string;
  value: number;
  unit: string;
}

export interface Note extends TimedRecord {
  content: string;
}

/** Daily nutrition totals */
export interface DailyNutrition extends BaseRecord {
  calories: number;
  proteinG: number;
  carbsG: number;
  fatG: number;
  fiberG: number;
  sugarG: number;
  sodiumMg: number;
}

export interface Exercise extends TimedRecord {
  name: string;
  durationMinutes: number;
  caloriesBurned: number;
}
