import { HttpStatus } from '@nestjs/common';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import {
  AuthenticationException,
  ConflictException,
  ExternalServiceException,
  NotFoundException,
  ValidationException,
} from '../../../common/exceptions/api.exceptions';
import { fail, ok } from '../interfaces/auth-result.interface';
import { toApiException, unwrapResult } from '../utils/auth-result.mapper';

describe('auth result mapping', () => {
  it.each([
    ['Unauthorized', AuthenticationException, HttpStatus.UNAUTHORIZED, ERROR_CODES.AUTH_TOKEN_INVALID],
    ['Conflict', ConflictException, HttpStatus.CONFLICT, ERROR_CODES.CONFLICT_RESOURCE_STATE],
    ['NotFound', NotFoundException, HttpStatus.NOT_FOUND, ERROR_CODES.NOT_FOUND_RESOURCE],
    ['BadRequest', ValidationException, HttpStatus.BAD_REQUEST, ERROR_CODES.AUTH_INVALID_REQUEST],
    [
      'ServiceUnavailable',
      ExternalServiceException,
      HttpStatus.SERVICE_UNAVAILABLE,
      ERROR_CODES.EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE,
    ],
  ] as const)('maps %s to its exception', (kind, type, status, code) => {
    const exception = toApiException({ kind, message: 'nope' });

    expect(exception).toBeInstanceOf(type);
    expect(exception.getStatus()).toBe(status);
    expect(exception.code).toBe(code);
    expect(exception.message).toBe('nope');
  });

  it('uses the per-route code override', () => {
    const exception = toApiException(
      { kind: 'Conflict', message: 'taken' },
      { Conflict: ERROR_CODES.CONFLICT_DUPLICATE_EMAIL },
    );

    expect(exception.code).toBe(ERROR_CODES.CONFLICT_DUPLICATE_EMAIL);
  });

  it('unwraps a success and throws for a failure', () => {
    expect(unwrapResult(ok(42))).toBe(42);
    expect(() => unwrapResult(fail('NotFound', 'Session not found'))).toThrow(NotFoundException);
  });
});
