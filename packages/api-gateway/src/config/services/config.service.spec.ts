import { ConfigService, ConfigValidationError } from './config.service';

const SECRET = 'test-secret-value-123';

describe('ConfigService', () => {
  it('fills development defaults around the required secret', () => {
    const { settings } = new ConfigService({ JWT_SECRET: SECRET });

    expect(settings.env).toBe('development');
    expect(settings.http).toEqual({
      host: '0.0.0.0',
      port: 3001,
      apiVersion: '1.0.0',
      webAppUrl: 'http://localhost:3000',
      apiBaseUrl: 'http://localhost:3001',
    });
    expect(settings.auth).toEqual({
      jwtSecret: SECRET,
      jwtIssuer: 'careport',
      accessTokenTtlSeconds: 900,
      refreshTokenTtlSeconds: 2592000,
      sessionTtlDays: 30,
      verificationCodeTtlMinutes: 15,
      oauthStateTtlSeconds: 600,
    });
    expect(settings.oauth.enabledProviders).toEqual(['google']);
    expect(settings.email.transport).toBe('json');
    expect(settings.email.smtp.secure).toBe(false);
  });

  it('coerces numbers and flags from strings', () => {
    const { settings } = new ConfigService({
      JWT_SECRET: SECRET,
      PORT: '8080',
      SESSION_TTL_DAYS: '7',
      SMTP_SECURE: 'true',
    });

    expect(settings.http.port).toBe(8080);
    expect(settings.auth.sessionTtlDays).toBe(7);
    expect(settings.email.smtp.secure).toBe(true);
  });

  it('normalizes provider lists and URLs', () => {
    const { settings } = new ConfigService({
      JWT_SECRET: SECRET,
      OAUTH_ENABLED_PROVIDERS: ' Google, apple ,',
      WEB_APP_URL: 'http://app.test/',
    });

    expect(settings.oauth.enabledProviders).toEqual(['google', 'apple']);
    expect(settings.http.webAppUrl).toBe('http://app.test');
  });

  it('freezes the settings tree', () => {
    const { settings } = new ConfigService({ JWT_SECRET: SECRET });

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.auth)).toBe(true);
    expect(Object.isFrozen(settings.oauth.enabledProviders)).toBe(true);
  });

  it('refuses to start without a JWT secret', () => {
    expect(() => new ConfigService({})).toThrow(ConfigValidationError);
    expect(() => new ConfigService({})).toThrow('Invalid configuration: JWT_SECRET: Required');
  });

  it('lists every rejected variable', () => {
    let caught: unknown;
    try {
      new ConfigService({ JWT_SECRET: 'short', PORT: 'eighty' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught instanceof ConfigValidationError && caught.issues).toEqual([
      'PORT: Expected number, received nan',
      'JWT_SECRET: JWT_SECRET must be at least 16 characters',
    ]);
  });

  it('knows when it runs in production', () => {
    expect(new ConfigService({ JWT_SECRET: SECRET, NODE_ENV: 'production' }).isProduction()).toBe(
      true,
    );
    expect(new ConfigService({ JWT_SECRET: SECRET }).isProduction()).toBe(false);
  });
});
