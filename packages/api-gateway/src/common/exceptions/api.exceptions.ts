import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorCode } from '../constants/error-codes';
import { ApiErrorDetails } from '../interfaces/api-response.interface';

export type ErrorDetails = ApiErrorDetails;

/**
 * Base API exception. The response body carries `{ code, message, details }`
 * which ApiExceptionFilter renders into the error envelope.
 */
export class ApiException extends HttpException {
  constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
    readonly details?: ErrorDetails,
  ) {
    super({ code, message, details }, status);
  }
}

export class ValidationException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.BAD_REQUEST, details);
  }
}

export class AuthenticationException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class AuthorizationException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.FORBIDDEN, details);
  }
}

export class NotFoundException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.NOT_FOUND, details);
  }
}

export class ConflictException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

/**
 * Upstream dependency (e.g. an OAuth provider) could not be reached
 */
export class ExternalServiceException extends ApiException {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, HttpStatus.SERVICE_UNAVAILABLE, details);
  }
}
