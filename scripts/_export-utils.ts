/**
 * Shared Script Utilities
 *
 * Environment loading and console helpers for the export script.
 */

import dotenv from "dotenv";
import { formatIsoDate, getErrorMessage } from "../src/shared/utils/helpers.js";

// ============================================================================
// Environment
// ============================================================================

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: ".env.local" });
}

function hasAll<K extends string>(
  values: Partial<Record<K, string>>,
  keys: readonly K[]
): values is Record<K, string> {
  return keys.every((key) => typeof values[key] === "string");
}

/**
 * Validate required environment variables. Exits with code 1 if any are missing.
 */
export function requireEnv<K extends string>(
  keys: readonly K[],
  env: NodeJS.ProcessEnv = process.env
): Record<K, string> {
  const result: Partial<Record<K, string>> = {};

  for (const key of keys) {
    const value = env[key];
    if (value) {
      result[key] = value;
    }
  }

  if (!hasAll(result, keys)) {
    const missing = keys.filter((key) => !env[key]);
    log(`❌ Missing required env vars: ${missing.join(", ")}`);
    process.exit(1);
  }

  return result;
}

/**
 * Number of days to export (CRONOMETER_DAYS), default 7
 */
export function parseDays(value: string | undefined, fallback: number = 7): number {
  if (!value) {
    return fallback;
  }
  const days = Number.parseInt(value, 10);
  return Number.isInteger(days) && days > 0 ? days : fallback;
}

/**
 * Inclusive YYYY-MM-DD window ending on `today` and starting `days` earlier
 */
export function dateWindow(days: number, today: Date): { start: string; end: string } {
  const start = new Date(today.getFullYear(), today.getMonth(), today.getDate() - days);
  return { start: formatIsoDate(start), end: formatIsoDate(today) };
}

// ============================================================================
// Session
// ============================================================================

/**
 * Close the client. A failed logout is logged, not thrown.
 */
export async function closeClient(client: { close(): Promise<void> }): Promise<void> {
  try {
    await client.close();
  } catch (error: unknown) {
    log(`⚠️  Logout failed: ${getErrorMessage(error)}`);
  }
}

// ============================================================================
// Output
// ============================================================================

export function log(message: string): void {
  console.log(message);
}
