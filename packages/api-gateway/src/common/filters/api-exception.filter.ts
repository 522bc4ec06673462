import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyRequest, FastifyReply } from 'fastify';
import { ApiErrorDetails, errorResponse } from '../interfaces/api-response.interface';
import {
  ERROR_CODES,
  ERROR_MESSAGES,
  ErrorCode,
  isRetryableError,
  getRetryAfterSeconds,
} from '../constants/error-codes';
import { ApiException } from '../exceptions/api.exceptions';

/**
 * Renders every exception as `{ success: false, error: { code, message, ... } }`
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();
    const requestId = request.id;

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: ErrorCode = ERROR_CODES.SERVER_INTERNAL_ERROR;
    let message = ERROR_MESSAGES[ERROR_CODES.SERVER_INTERNAL_ERROR];
    let details: ApiErrorDetails | undefined;

    if (exception instanceof ApiException) {
      status = exception.getStatus();
      errorCode = exception.code;
      message = exception.message;
      details = exception.details;
    } else if (exception instanceof HttpException) {
      // Framework exceptions (unknown route, malformed JSON body, ...)
      status = exception.getStatus();
      errorCode = this.mapStatusToErrorCode(status);
      message = status >= 500 ? ERROR_MESSAGES[errorCode] : exception.message;
    } else if (exception instanceof Error) {
      this.logger.error(`Unexpected error [${requestId}]: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unexpected non-error exception [${requestId}]: ${String(exception)}`);
    }

    response.header('X-Request-ID', requestId);

    if (isRetryableError(errorCode)) {
      const retryAfter = getRetryAfterSeconds(errorCode);
      if (retryAfter) {
        response.header('Retry-After', retryAfter.toString());
      }
    }

    response
      .status(status)
      .send(errorResponse({ code: errorCode, message, ...(details ? { details } : {}) }, requestId));
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ERROR_CODES.INVALID_REQUEST_BODY;
      case HttpStatus.UNAUTHORIZED:
        return ERROR_CODES.AUTH_TOKEN_INVALID;
      case HttpStatus.FORBIDDEN:
        return ERROR_CODES.FORBIDDEN_RESOURCE_ACCESS;
      case HttpStatus.NOT_FOUND:
        return ERROR_CODES.NOT_FOUND_RESOURCE;
      case HttpStatus.CONFLICT:
        return ERROR_CODES.CONFLICT_RESOURCE_STATE;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ERROR_CODES.EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE;
      default:
        return ERROR_CODES.SERVER_INTERNAL_ERROR;
    }
  }
}
