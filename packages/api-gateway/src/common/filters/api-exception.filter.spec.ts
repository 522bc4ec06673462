import { NotFoundException as RouteNotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ERROR_CODES, ERROR_MESSAGES } from '../constants/error-codes';
import {
  AuthenticationException,
  ExternalServiceException,
  ValidationException,
} from '../exceptions/api.exceptions';
import { ApiExceptionFilter } from './api-exception.filter';

class FakeReply {
  statusCode = 0;
  body: unknown;
  readonly headers: Record<string, string> = {};

  header(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    return this;
  }
}

describe('ApiExceptionFilter', () => {
  const filter = new ApiExceptionFilter();

  function render(exception: unknown): FakeReply {
    const reply = new FakeReply();
    filter.catch(exception, new ExecutionContextHost([{ id: 'req-1' }, reply]));
    return reply;
  }

  it('renders an API exception with its code and the request id', () => {
    const reply = render(
      new AuthenticationException(ERROR_CODES.AUTH_INVALID_CREDENTIALS, 'Invalid email or password'),
    );

    expect(reply.statusCode).toBe(401);
    expect(reply.headers).toEqual({ 'X-Request-ID': 'req-1' });
    expect(reply.body).toEqual({
      success: false,
      error: {
        code: 'AUTH_INVALID_CREDENTIALS',
        message: 'Invalid email or password',
        timestamp: expect.any(String),
        traceId: 'req-1',
      },
    });
  });

  it('keeps validation details', () => {
    const reply = render(
      new ValidationException(ERROR_CODES.WEAK_PASSWORD, 'Password too short', {
        field: 'password',
      }),
    );

    expect(reply.statusCode).toBe(400);
    expect(reply.body).toMatchObject({
      error: { code: 'WEAK_PASSWORD', details: { field: 'password' } },
    });
  });

  it('asks clients to retry when the provider is unavailable', () => {
    const reply = render(
      new ExternalServiceException(
        ERROR_CODES.EXTERNAL_OAUTH_PROVIDER_UNAVAILABLE,
        'OAuth provider is unavailable',
      ),
    );

    expect(reply.statusCode).toBe(503);
    expect(reply.headers).toEqual({ 'X-Request-ID': 'req-1', 'Retry-After': '30' });
  });

  it('maps framework HTTP exceptions by status', () => {
    const reply = render(new RouteNotFoundException('Cannot GET /api/unknown'));

    expect(reply.statusCode).toBe(404);
    expect(reply.body).toMatchObject({
      error: { code: 'NOT_FOUND_RESOURCE', message: 'Cannot GET /api/unknown' },
    });
  });

  it('hides the message of an unexpected error', () => {
    const reply = render(new Error('connection terminated unexpectedly'));

    expect(reply.statusCode).toBe(500);
    expect(reply.body).toMatchObject({
      error: {
        code: 'SERVER_INTERNAL_ERROR',
        message: ERROR_MESSAGES[ERROR_CODES.SERVER_INTERNAL_ERROR],
      },
    });
  });
});
