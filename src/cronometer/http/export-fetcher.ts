/**
 * Cronometer CSV export
 *
 * GET `/export?nonce=<token>&generate=<type>&start=YYYY-MM-DD&end=YYYY-MM-DD`
 * with a token minted by {@link CronometerAuth.mintExportToken}.
 */

import type { CookieFetch } from '../../shared/utils/http-client.js';
import { formatIsoDate, responsePrefix } from '../../shared/utils/helpers.js';
import { ExportError } from '../errors.js';
import { CRONOMETER_URLS, type ExportDate, type ExportType } from '../types/index.js';

/**
 * Query parameters for an export request
 */
export function buildExportQuery(
  token: string,
  type: ExportType,
  start: ExportDate,
  end: ExportDate
): Record<string, string> {
  return {
    nonce: token,
    generate: type,
    start: formatIsoDate(start),
    end: formatIsoDate(end)
  };
}

/**
 * Fetch one export as raw CSV text.
 *
 * @throws {ExportError} the endpoint answered with anything but 200
 * @throws {RangeError} a date is not a valid `Date` or YYYY-MM-DD string
 */
export async function fetchExport(
  httpClient: CookieFetch,
  token: string,
  type: ExportType,
  start: ExportDate,
  end: ExportDate
): Promise<string> {
  const query = buildExportQuery(token, type, start, end);

  const { response, text } = await httpClient.get(CRONOMETER_URLS.EXPORT, {
    query,
    headers: {
      'sec-fetch-dest': 'document',
      'sec-fetch-mode': 'navigate',
      'sec-fetch-site': 'same-origin'
    }
  });

  if (response.status !== 200) {
    throw new ExportError(response.status, responsePrefix(text));
  }

  return text;
}
