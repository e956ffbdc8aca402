/**
 * Result type shared by every facade operation.
 *
 * Facades never throw across their public boundary: failures come back as
 * `{ success: false, error }` with a `kind` callers can branch on.
 */

export type AuthFailureReason = 'missing_client_secret' | 'consent_denied';

export interface Candidate {
  name: string;
  id: string;
  type: string;
}

export type IntegrationError =
  | { kind: 'transport'; message: string; status: number }
  | { kind: 'auth'; message: string; reason: AuthFailureReason }
  | { kind: 'unrecognized_reference'; message: string; reference: string }
  | { kind: 'not_found'; message: string; query: string }
  | { kind: 'ambiguous'; message: string; candidates: Candidate[] }
  | { kind: 'cancelled'; message: string }
  | { kind: 'generic'; message: string };

export type IntegrationErrorKind = IntegrationError['kind'];

export type Result<T, E = IntegrationError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function fail<E = IntegrationError>(error: E): Result<never, E> {
  return { success: false, error };
}

// =============================================================================
// Error constructors
// =============================================================================

export const errors = {
  transport: (status: number, message: string): IntegrationError => ({
    kind: 'transport',
    status,
    message,
  }),
  auth: (reason: AuthFailureReason, message: string): IntegrationError => ({
    kind: 'auth',
    reason,
    message,
  }),
  unrecognizedReference: (reference: string): IntegrationError => ({
    kind: 'unrecognized_reference',
    reference,
    message: `Could not extract file ID from URL: ${reference}`,
  }),
  notFound: (query: string, message: string): IntegrationError => ({
    kind: 'not_found',
    query,
    message,
  }),
  ambiguous: (candidates: Candidate[], message: string): IntegrationError => ({
    kind: 'ambiguous',
    candidates,
    message,
  }),
  cancelled: (message: string): IntegrationError => ({ kind: 'cancelled', message }),
  generic: (message: string): IntegrationError => ({ kind: 'generic', message }),
};

function readStatus(value: unknown): number | undefined {
  if (value === null || typeof value !== 'object') return undefined;

  if ('status' in value && typeof value.status === 'number') {
    return value.status;
  }
  // gaxios reports the HTTP status as a numeric `code`
  if ('code' in value && typeof value.code === 'number') {
    return value.code;
  }
  if ('response' in value) {
    return readStatus(value.response);
  }
  return undefined;
}

/**
 * HTTP status carried by an SDK or fetch error, if any
 */
export function statusOf(error: unknown): number | undefined {
  return readStatus(error);
}

/**
 * Classify anything thrown by a vendor SDK into the error taxonomy
 */
export function toIntegrationError(error: unknown): IntegrationError {
  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  if (status !== undefined) {
    return errors.transport(status, message);
  }
  return errors.generic(message);
}

/**
 * Message suitable for `op.failure`
 */
export function describeError(error: unknown): Error | string {
  return error instanceof Error ? error : String(error);
}
