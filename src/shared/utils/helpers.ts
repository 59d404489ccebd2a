/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * First `length` characters of a response body, for error messages.
 */
export function responsePrefix(text: string, length: number = 200): string {
  return text.substring(0, length);
}

/**
 * Format a calendar date as YYYY-MM-DD.
 *
 * `Date` values use their local calendar fields; strings must already be in
 * YYYY-MM-DD form and are returned unchanged.
 */
export function formatIsoDate(date: Date | string): string {
  if (typeof date === 'string') {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    return date;
  }

  if (Number.isNaN(date.getTime())) {
    throw new RangeError('Invalid date');
  }

  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
