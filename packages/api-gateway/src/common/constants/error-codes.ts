/**
 * Machine-readable error codes returned in the `error.code` field of every
 * failed response.
 */
export const ERROR_CODES = {
  // Request validation
  INVALID_REQUEST_BODY: 'INVALID_REQUEST_BODY',
  INVALID_FIELD_VALUE: 'INVALID_FIELD_VALUE',
  INVALID_EMAIL_FORMAT: 'INVALID_EMAIL_FORMAT',
  INVALID_URL: 'INVALID_URL',
  INVALID_UUID: 'INVALID_UUID',
  INVALID_DATE_FORMAT: 'INVALID_DATE_FORMAT',
  WEAK_PASSWORD: 'WEAK_PASSWORD',

  // Authentication and tokens
  AUTH_INVALID_CREDENTIALS: 'AUTH_INVALID_CREDENTIALS',
  AUTH_TOKEN_MISSING: 'AUTH_TOKEN_MISSING',
  AUTH_TOKEN_INVALID: 'AUTH_TOKEN_INVALID',
  AUTH_SESSION_EXPIRED: 'AUTH_SESSION_EXPIRED',
  AUTH_VERIFICATION_FAILED: 'AUTH_VERIFICATION_FAILED',
  AUTH_INVALID_REQUEST: 'AUTH_INVALID_REQUEST',
  AUTH_OAUTH_FAILED: 'AUTH_OAUTH_FAILED',

  // Authorization
  FORBIDDEN_RESOURCE_ACCESS: 'FORBIDDEN_RESOURCE_ACCESS',
  FORBIDDEN_INSUFFICIENT_ROLE: 'FORBIDDEN_INSUFFICIENT_ROLE',

  // Missing resources
  NOT_FOUND_RESOURCE: 'NOT_FOUND_RESOURCE',
  NOT_FOUND_USER: 'NOT_FOUND_USER',
  NOT_FOUND_SESSION: 'NOT_FOUND_SESSION',
  NOT_FOUND_VERIFICATION_CODE: 'NOT_FOUND_VERIFICATION_CODE',
  NOT_FOUND_ROLE: 'NOT_FOUND_ROLE',

  // Conflicts
  CONFLICT_DUPLICATE_EMAIL: 'CONFLICT_DUPLICATE_EMAIL',
  CONFLICT_RESOURCE_STATE: 'CONFLICT_RESOURCE_STATE',

  // Upstream services
  EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE: 'EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE',

  // Server
  SERVER_INTERNAL_ERROR: 'SERVER_INTERNAL_ERROR',
  SERVER_DATABASE_ERROR: 'SERVER_DATABASE_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  INVALID_REQUEST_BODY: 'The request body is invalid',
  INVALID_FIELD_VALUE: 'A field has an invalid value',
  INVALID_EMAIL_FORMAT: 'The email address is not valid',
  INVALID_URL: 'The URL is not valid',
  INVALID_UUID: 'The identifier is not a valid UUID',
  INVALID_DATE_FORMAT: 'The date is not valid',
  WEAK_PASSWORD: 'The password does not meet the password policy',
  AUTH_INVALID_CREDENTIALS: 'Incorrect email or password',
  AUTH_TOKEN_MISSING: 'Authentication token is missing',
  AUTH_TOKEN_INVALID: 'Authentication token is invalid',
  AUTH_SESSION_EXPIRED: 'Session has expired',
  AUTH_VERIFICATION_FAILED: 'Verification failed',
  AUTH_INVALID_REQUEST: 'The authentication request is invalid',
  AUTH_OAUTH_FAILED: 'Failed to authenticate with provider',
  FORBIDDEN_RESOURCE_ACCESS: 'Access to this resource is forbidden',
  FORBIDDEN_INSUFFICIENT_ROLE: 'Your role does not allow this action',
  NOT_FOUND_RESOURCE: 'Resource not found',
  NOT_FOUND_USER: 'User not found',
  NOT_FOUND_SESSION: 'Session not found',
  NOT_FOUND_VERIFICATION_CODE: 'Verification code not found',
  NOT_FOUND_ROLE: 'Role not found',
  CONFLICT_DUPLICATE_EMAIL: 'A user with this email already exists',
  CONFLICT_RESOURCE_STATE: 'The resource is in a conflicting state',
  EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE: 'The identity provider is unavailable',
  SERVER_INTERNAL_ERROR: 'An unexpected error occurred',
  SERVER_DATABASE_ERROR: 'Service temporarily unavailable',
};

const RETRY_AFTER_SECONDS: Partial<Record<ErrorCode, number>> = {
  EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE: 30,
  SERVER_DATABASE_ERROR: 5,
};

export function isRetryableError(code: ErrorCode): boolean {
  return code in RETRY_AFTER_SECONDS;
}

export function getRetryAfterSeconds(code: ErrorCode): number | undefined {
  return RETRY_AFTER_SECONDS[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && value in ERROR_MESSAGES;
}
