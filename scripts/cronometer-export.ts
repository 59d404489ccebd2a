/**
 * Cronometer Export Script
 *
 * Logs into Cronometer and pulls every export type for a recent window.
 *
 * Usage:
 *   npx tsx scripts/cronometer-export.ts
 *
 * Environment:
 *   - CRONOMETER_EMAIL: account email
 *   - CRONOMETER_PASSWORD: account password
 *   - CRONOMETER_DAYS=N: days to export, ending today (default: 7)
 *   - CRONOMETER_GWT_PERMUTATION / CRONOMETER_GWT_HEADER: GWT overrides
 *   - EXPORT_VERBOSE=true: debug logging
 */

import { closeClient, dateWindow, loadEnv, log, parseDays, requireEnv } from "./_export-utils.js";

import { createCronometerClient, type CronometerClient } from "../src/cronometer/client.js";
import { ExportError, GwtVersionError } from "../src/cronometer/errors.js";
import type { CronometerCredentials } from "../src/cronometer/types/index.js";
import { truncateForLog } from "../src/shared/utils/logger.js";
import { getErrorMessage } from "../src/shared/utils/helpers.js";

interface ExportStep {
  label: string;
  run: (client: CronometerClient, start: string, end: string) => Promise<string>;
}

const EXPORT_STEPS: ExportStep[] = [
  {
    label: "Servings",
    run: async (client, start, end) => {
      const servings = await client.getServings(start, end);
      const first = servings[0];
      return first ? `${servings.length} (first: ${first.foodName})` : "0";
    },
  },
  {
    label: "Daily nutrition",
    run: async (client, start, end) => {
      const days = await client.getDailyNutrition(start, end);
      const first = days[0];
      return first ? `${days.length} (first: ${first.date} ${first.calories} kcal)` : "0";
    },
  },
  {
    label: "Biometrics",
    run: async (client, start, end) => {
      const entries = await client.getBiometrics(start, end);
      const first = entries[0];
      return first ? `${entries.length} (first: ${first.metric} = ${first.value} ${first.unit})` : "0";
    },
  },
  {
    label: "Notes",
    run: async (client, start, end) => `${(await client.getNotes(start, end)).length}`,
  },
  {
    label: "Exercises",
    run: async (client, start, end) => {
      const exercises = await client.getExercises(start, end);
      const first = exercises[0];
      return first ? `${exercises.length} (first: ${first.name} - ${first.durationMinutes} min)` : "0";
    },
  },
];

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  loadEnv();

  const env = requireEnv(["CRONOMETER_EMAIL", "CRONOMETER_PASSWORD"]);
  const credentials: CronometerCredentials = {
    email: env.CRONOMETER_EMAIL,
    password: env.CRONOMETER_PASSWORD,
  };

  const verbose = process.env.EXPORT_VERBOSE === "true";
  const { start, end } = dateWindow(parseDays(process.env.CRONOMETER_DAYS), new Date());

  const client = createCronometerClient({ debug: verbose });

  try {
    log(`🔐 Logging into Cronometer as ${truncateForLog(credentials.email)}...`);
    const identity = await client.login(credentials.email, credentials.password);
    log(`✅ Login successful (user ${truncateForLog(identity.userId)})\n`);

    log(`📊 Exporting ${start} → ${end}...`);
    let failures = 0;

    for (const step of EXPORT_STEPS) {
      try {
        const summary = await step.run(client, start, end);
        log(`   ✓ ${step.label}: ${summary}`);
      } catch (error: unknown) {
        if (!(error instanceof ExportError)) {
          throw error;
        }
        failures++;
        log(`   ✗ ${step.label}: ${error.message}`);
      }
    }

    log(failures === 0 ? "\n✅ Done!" : `\n⚠️  Done with ${failures} failed export(s)`);
  } finally {
    await closeClient(client);
  }
}

// ============================================================================
// Entry Point
// ============================================================================

log("🚀 Starting Cronometer export...\n");

main().catch((err: unknown) => {
  if (err instanceof GwtVersionError) {
    log("💥 Cronometer's GWT values have changed.");
    log("   Set CRONOMETER_GWT_PERMUTATION and CRONOMETER_GWT_HEADER from the web app's requests.");
  }
  log(`💥 Failed: ${getErrorMessage(err)}`);
  process.exit(1);
});
