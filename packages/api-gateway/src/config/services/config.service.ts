import { Logger } from '@nestjs/common';
import { envSchema, Env } from '../schemas/env.schema';

export type Environment = Env['NODE_ENV'];

export interface AppSettings {
  readonly env: Environment;
  readonly http: {
    readonly host: string;
    readonly port: number;
    readonly apiVersion: string;
    readonly webAppUrl: string;
    readonly apiBaseUrl: string;
  };
  readonly database: {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
  };
  readonly redis: {
    readonly host: string;
    readonly port: number;
  };
  readonly auth: {
    readonly jwtSecret: string;
    readonly jwtIssuer: string;
    readonly accessTokenTtlSeconds: number;
    readonly refreshTokenTtlSeconds: number;
    readonly sessionTtlDays: number;
    readonly verificationCodeTtlMinutes: number;
    readonly oauthStateTtlSeconds: number;
  };
  readonly oauth: {
    readonly enabledProviders: readonly string[];
    readonly httpTimeoutMs: number;
    readonly google: {
      readonly clientId: string;
      readonly clientSecret: string;
      readonly redirectUri: string;
    };
  };
  readonly email: {
    readonly from: string;
    readonly transport: Env['EMAIL_TRANSPORT'];
    readonly smtp: {
      readonly host: string;
      readonly port: number;
      readonly secure: boolean;
      readonly user?: string;
      readonly password?: string;
    };
  };
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Validated, immutable application settings. Built once at startup from the
 * process environment and injected wherever configuration is needed.
 */
export class ConfigService {
  private static readonly logger = new Logger(ConfigService.name);

  readonly settings: AppSettings;

  constructor(source: Record<string, string | undefined>) {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      ConfigService.logger.error(`Configuration rejected: ${issues.join('; ')}`);
      throw new ConfigValidationError(issues);
    }

    this.settings = deepFreeze(ConfigService.toSettings(parsed.data));
  }

  isProduction(): boolean {
    return this.settings.env === 'production';
  }

  private static toSettings(env: Env): AppSettings {
    return {
      env: env.NODE_ENV,
      http: {
        host: env.HOST,
        port: env.PORT,
        apiVersion: env.API_VERSION,
        webAppUrl: trimTrailingSlash(env.WEB_APP_URL),
        apiBaseUrl: trimTrailingSlash(env.API_BASE_URL),
      },
      database: {
        host: env.POSTGRES_HOST,
        port: env.POSTGRES_PORT,
        user: env.POSTGRES_USER,
        password: env.POSTGRES_PASSWORD,
        database: env.POSTGRES_DB,
      },
      redis: {
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
      },
      auth: {
        jwtSecret: env.JWT_SECRET,
        jwtIssuer: env.JWT_ISSUER,
        accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
        refreshTokenTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
        sessionTtlDays: env.SESSION_TTL_DAYS,
        verificationCodeTtlMinutes: env.VERIFICATION_CODE_TTL_MINUTES,
        oauthStateTtlSeconds: env.OAUTH_STATE_TTL_SECONDS,
      },
      oauth: {
        enabledProviders: env.OAUTH_ENABLED_PROVIDERS.split(',')
          .map(provider => provider.trim().toLowerCase())
          .filter(provider => provider.length > 0),
        httpTimeoutMs: env.OAUTH_HTTP_TIMEOUT_MS,
        google: {
          clientId: env.GOOGLE_CLIENT_ID,
          clientSecret: env.GOOGLE_CLIENT_SECRET,
          redirectUri: env.GOOGLE_REDIRECT_URI,
        },
      },
      email: {
        from: env.EMAIL_FROM,
        transport: env.EMAIL_TRANSPORT,
        smtp: {
          host: env.SMTP_HOST,
          port: env.SMTP_PORT,
          secure: env.SMTP_SECURE,
          user: env.SMTP_USER,
          password: env.SMTP_PASSWORD,
        },
      },
    };
  }
}
