/**
 * CSV parsers for Cronometer exports
 *
 * Column names differ between export versions, so each field lists the
 * headers it accepts in priority order. Rows without a usable date are
 * skipped.
 */

import { parse } from 'csv-parse/sync';
import { createLogger } from '../../shared/utils/logger.js';
import type {
  BiometricEntry,
  DailyNutrition,
  Exercise,
  Note,
  RawRow,
  Serving
} from '../types/index.js';

const logger = createLogger('CsvParser');

const DATE_COLUMNS = ['Day', 'Date', 'date'];
const TIME_COLUMNS = ['Time', 'time'];

// ============================================================================
// Row helpers
// ============================================================================

/**
 * Read CSV text into header-keyed rows
 */
export function readRows(csvText: string): RawRow[] {
  const records: string[][] = parse(csvText, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true
  });

  const [headers, ...rows] = records;
  if (!headers) {
    return [];
  }

  return rows.map(cells => {
    const row: RawRow = {};
    headers.forEach((header, index) => {
      row[header] = cells[index] ?? '';
    });
    return row;
  });
}

/**
 * First non-empty value among the given columns
 */
function pick(row: RawRow, columns: string[]): string {
  for (const column of columns) {
    const value = row[column];
    if (value) {
      return value;
    }
  }
  return '';
}

function pickOrNull(row: RawRow, columns: string[]): string | null {
  return pick(row, columns) || null;
}

/**
 * Numeric cell; blank or non-numeric cells become `fallback`
 */
export function parseNumber(value: string, fallback: number = 0): number {
  if (value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseDateCell(value: string): string | null {
  const trimmed = value.trim();
  return /^\d{4}-\d{2}-\d{2}$/.test(trimmed) ? trimmed : null;
}

function parseTimeCell(value: string): string | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return `${String(hours).padStart(2, '0')}:${match[2]}`;
}

/**
 * Parse every row with a valid date through `build`
 */
function parseDatedRows<T>(
  csvText: string,
  kind: string,
  build: (row: RawRow, date: string) => T
): T[] {
  const records: T[] = [];

  readRows(csvText).forEach((row, index) => {
    const date = parseDateCell(pick(row, DATE_COLUMNS));
    if (!date) {
      logger.debug(`Skipping ${kind} row ${index + 1}: no valid date`);
      return;
    }
    records.push(build(row, date));
  });

  return records;
}

// ============================================================================
// Export parsers
// ============================================================================

export function parseServings(csvText: string): Serving[] {
  return parseDatedRows(csvText, 'servings', (row, date) => ({
    date,
    time: parseTimeCell(pick(row, TIME_COLUMNS)),
    foodName: pick(row, ['Food Name', 'Name']),
    servingSize: pick(row, ['Amount', 'Serving']),
    calories: parseNumber(pick(row, ['Energy (kcal)', 'Calories'])),
    proteinG: parseNumber(pick(row, ['Protein (g)', 'Protein'])),
    carbsG: parseNumber(pick(row, ['Carbs (g)', 'Carbohydrates'])),
    fatG: parseNumber(pick(row, ['Fat (g)', 'Fat'])),
    fiberG: parseNumber(pick(row, ['Fiber (g)', 'Fiber'])),
    sugarG: parseNumber(pick(row, ['Sugars (g)', 'Sugar'])),
    sodiumMg: parseNumber(pick(row, ['Sodium (mg)', 'Sodium'])),
    cholesterolMg: parseNumber(pick(row, ['Cholesterol (mg)'])),
    saturatedFatG: parseNumber(pick(row, ['Saturated (g)'])),
    group: pickOrNull(row, ['Food Group', 'Group']),
    raw: row
  }));
}

export function parseDailyNutrition(csvText: string): DailyNutrition[] {
  return parseDatedRows(csvText, 'dailySummary', (row, date) => ({
    date,
    calories: parseNumber(pick(row, ['Energy (kcal)', 'Calories'])),
    proteinG: parseNumber(pick(row, ['Protein (g)', 'Protein'])),
    carbsG: parseNumber(pick(row, ['Carbs (g)', 'Carbohydrates'])),
    fatG: parseNumber(pick(row, ['Fat (g)', 'Fat'])),
    fiberG: parseNumber(pick(row, ['Fiber (g)', 'Fiber'])),
    sugarG: parseNumber(pick(row, ['Sugars (g)', 'Sugar'])),
    sodiumMg: parseNumber(pick(row, ['Sodium (mg)', 'Sodium'])),
    raw: row
  }));
}

export function parseBiometrics(csvText: string): BiometricEntry[] {
  return parseDatedRows(csvText, 'biometrics', (row, date) => ({
    date,
    time: parseTimeCell(pick(row, TIME_COLUMNS)),
    metric: pick(row, ['Metric', 'Name', 'Type']),
    value: parseNumber(pick(row, ['Amount', 'Value'])),
    unit: pick(row, ['Unit']),
    raw: row
  }));
}

export function parseNotes(csvText: string): Note[] {
  return parseDatedRows(csvText, 'notes', (row, date) => ({
    date,
    time: parseTimeCell(pick(row, TIME_COLUMNS)),
    content: pick(row, ['Note', 'Content', 'Text']),
    raw: row
  }));
}

export function parseExercises(csvText: string): Exercise[] {
  return parseDatedRows(csvText, 'exercises', (row, date) => ({
    date,
    time: parseTimeCell(pick(row, TIME_COLUMNS)),
    name: pick(row, ['Exercise', 'Name']),
    durationMinutes: parseNumber(pick(row, ['Minutes', 'Duration'])),
    caloriesBurned: parseNumber(pick(row, ['Calories Burned', 'Calories'])),
    raw: row
  }));
}
