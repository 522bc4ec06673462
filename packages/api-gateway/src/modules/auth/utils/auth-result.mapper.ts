import { ERROR_CODES, ErrorCode } from '../../../common/constants/error-codes';
import {
  ApiException,
  AuthenticationException,
  ConflictException,
  ExternalServiceException,
  NotFoundException,
  ValidationException,
} from '../../../common/exceptions/api.exceptions';
import { AuthError, AuthErrorKind, AuthResult } from '../interfaces/auth-result.interface';

const DEFAULT_CODES: Record<AuthErrorKind, ErrorCode> = {
  Unauthorized: ERROR_CODES.AUTH_TOKEN_INVALID,
  Conflict: ERROR_CODES.CONFLICT_RESOURCE_STATE,
  NotFound: ERROR_CODES.NOT_FOUND_RESOURCE,
  BadRequest: ERROR_CODES.AUTH_INVALID_REQUEST,
  ServiceUnavailable: ERROR_CODES.EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE,
};

export type ErrorCodeOverrides = Partial<Record<AuthErrorKind, ErrorCode>>;

export function toApiException(error: AuthError, overrides: ErrorCodeOverrides = {}): ApiException {
  const code = overrides[error.kind] ?? DEFAULT_CODES[error.kind];
  switch (error.kind) {
    case 'Unauthorized':
      return new AuthenticationException(code, error.message);
    case 'Conflict':
      return new ConflictException(code, error.message);
    case 'NotFound':
      return new NotFoundException(code, error.message);
    case 'BadRequest':
      return new ValidationException(code, error.message);
    case 'ServiceUnavailable':
      return new ExternalServiceException(code, error.message);
  }
}

/**
 * Returns the success value or throws the ApiException matching the error kind
 */
export function unwrapResult<T>(result: AuthResult<T>, overrides?: ErrorCodeOverrides): T {
  if (!result.ok) {
    throw toApiException(result.error, overrides);
  }
  return result.value;
}
