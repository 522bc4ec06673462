import { Injectable, NestInterceptor, ExecutionContext, CallHandler } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { FastifyRequest, FastifyReply } from 'fastify';
import { SuccessEnvelope, successResponse } from '../interfaces/api-response.interface';
import { ConfigService } from '../../config/services/config.service';

/**
 * Wraps every handler result in the success envelope and echoes the request id
 */
@Injectable()
export class ResponseEnvelopeInterceptor implements NestInterceptor {
  private readonly apiVersion: string;

  constructor(configService: ConfigService) {
    this.apiVersion = configService.settings.http.apiVersion;
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<SuccessEnvelope<unknown>> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();
    const requestId = request.id;

    response.header('X-Request-ID', requestId);

    return next
      .handle()
      .pipe(map((data: unknown) => successResponse(data, { requestId, version: this.apiVersion })));
  }
}
