import { ConfigService } from '../../../../config/services/config.service';

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  JWT_SECRET: 'test-secret-value-123',
  JWT_ISSUER: 'careport-test',
  API_BASE_URL: 'http://api.test',
  WEB_APP_URL: 'http://app.test',
  OAUTH_ENABLED_PROVIDERS: 'google',
  OAUTH_HTTP_TIMEOUT_MS: '2000',
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-client-secret',
  GOOGLE_REDIRECT_URI: 'http://api.test/api/v1/auth/oauth/google/callback',
  EMAIL_TRANSPORT: 'json',
};

export function createTestConfig(overrides: Record<string, string> = {}): ConfigService {
  return new ConfigService({ ...TEST_ENV, ...overrides });
}
