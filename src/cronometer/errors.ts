/**
 * Cronometer error taxonomy
 *
 * Every error carries a `kind` tag so callers can branch without instanceof:
 * - `authentication`: credentials, CSRF, session state. Fix credentials or log in again.
 * - `protocol_version`: the GWT magic values no longer match the server build.
 * - `fetch`: the export endpoint returned a non-200 status.
 */

export type CronometerErrorKind = 'authentication' | 'protocol_version' | 'fetch';

export abstract class CronometerError extends Error {
  abstract readonly kind: CronometerErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CronometerAuthError extends CronometerError {
  readonly kind = 'authentication';
}

/**
 * Raised when a GWT-RPC response cannot be decoded. Usually means Cronometer
 * shipped a new build and the permutation/header values must be updated.
 */
export class GwtVersionError extends CronometerError {
  readonly kind = 'protocol_version';

  constructor(message: string, readonly responsePrefix: string, options?: ErrorOptions) {
    super(`${message} GWT values may be outdated. Response: ${responsePrefix}`, options);
  }
}

export class ExportError extends CronometerError {
  readonly kind = 'fetch';

  constructor(readonly status: number, readonly responsePrefix: string, options?: ErrorOptions) {
    super(`Export failed with status ${status}: ${responsePrefix}`, options);
  }
}

/** Union of concrete errors, discriminated by `kind` */
export type CronometerFailure = CronometerAuthError | GwtVersionError | ExportError;

export function isCronometerError(value: unknown): value is CronometerError {
  return value instanceof CronometerError;
}
