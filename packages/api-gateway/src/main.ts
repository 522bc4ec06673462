import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import fastifyCookie from '@fastify/cookie';
import { v4 as uuidv4 } from 'uuid';
import { AppModule } from './app.module';
import { ResponseEnvelopeInterceptor } from './common/interceptors/response-envelope.interceptor';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { ConfigService } from './config/services/config.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Fastify assigns request.id from X-Request-ID when the client sends one
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      logger: true,
      disableRequestLogging: true,
      requestIdHeader: 'x-request-id',
      genReqId: () => uuidv4(),
    }),
  );

  await app.register(fastifyCookie);

  const configService = app.get(ConfigService);
  const { http } = configService.settings;

  app.useGlobalFilters(new ApiExceptionFilter());
  app.useGlobalInterceptors(new ResponseEnvelopeInterceptor(configService));

  const config = new DocumentBuilder()
    .setTitle('Careport API')
    .setDescription('Identity and session API for the Careport marketplace')
    .setVersion(http.apiVersion)
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  app.setGlobalPrefix('api');

  app.enableCors({
    origin: [http.webAppUrl],
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Retry-After'],
  });

  await app.listen(http.port, http.host);
  logger.log(`Application is running on: ${await app.getUrl()}`);
  logger.log(`Swagger documentation available at: ${await app.getUrl()}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
