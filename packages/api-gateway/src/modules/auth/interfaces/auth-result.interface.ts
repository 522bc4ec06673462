export type AuthErrorKind =
  | 'Unauthorized'
  | 'Conflict'
  | 'NotFound'
  | 'BadRequest'
  | 'ServiceUnavailable';

export interface AuthError {
  kind: AuthErrorKind;
  message: string;
}

export type AuthSuccess<T> = { ok: true; value: T };
export type AuthFailure = { ok: false; error: AuthError };

/**
 * Outcome of an orchestrator operation. Expected failures are values;
 * only infrastructure faults are thrown.
 */
export type AuthResult<T> = AuthSuccess<T> | AuthFailure;

export function ok<T>(value: T): AuthSuccess<T> {
  return { ok: true, value };
}

export function fail(kind: AuthErrorKind, message: string): AuthFailure {
  return { ok: false, error: { kind, message } };
}
