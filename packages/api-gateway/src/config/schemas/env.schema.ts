import { z } from 'zod';

const port = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();
const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform(value => value === 'true');

/**
 * Environment variables understood by the service. Everything except the JWT
 * secret has a development default.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: port.default(3001),
  API_VERSION: z.string().default('1.0.0'),
  WEB_APP_URL: z.string().url().default('http://localhost:3000'),
  API_BASE_URL: z.string().url().default('http://localhost:3001'),

  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: port.default(5432),
  POSTGRES_USER: z.string().default('careport'),
  POSTGRES_PASSWORD: z.string().default('careport_password'),
  POSTGRES_DB: z.string().default('careport_dev'),

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: port.default(6379),

  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ISSUER: z.string().default('careport'),
  ACCESS_TOKEN_TTL_SECONDS: positiveInt.default(15 * 60),
  REFRESH_TOKEN_TTL_SECONDS: positiveInt.default(30 * 24 * 60 * 60),
  SESSION_TTL_DAYS: positiveInt.default(30),
  VERIFICATION_CODE_TTL_MINUTES: positiveInt.default(15),

  OAUTH_STATE_TTL_SECONDS: positiveInt.default(600),
  OAUTH_ENABLED_PROVIDERS: z.string().default('google'),
  OAUTH_HTTP_TIMEOUT_MS: positiveInt.default(10000),
  GOOGLE_CLIENT_ID: z.string().default(''),
  GOOGLE_CLIENT_SECRET: z.string().default(''),
  GOOGLE_REDIRECT_URI: z
    .string()
    .url()
    .default('http://localhost:3001/api/v1/auth/oauth/google/callback'),

  EMAIL_FROM: z.string().default('Careport <no-reply@careport.local>'),
  EMAIL_TRANSPORT: z.enum(['smtp', 'json']).default('json'),
  SMTP_HOST: z.string().default('localhost'),
  SMTP_PORT: port.default(587),
  SMTP_SECURE: flag,
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;
