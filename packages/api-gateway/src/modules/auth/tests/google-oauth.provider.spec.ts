import nock from 'nock';
import { OAuthProviderError, OAuthProviderErrorCode } from '../interfaces/oauth-provider.interface';
import { GoogleOAuthProvider } from '../providers/google-oauth.provider';
import { createTestConfig } from './support/test-config';

const TOKEN_HOST = 'https://oauth2.googleapis.com';
const USERINFO_HOST = 'https://openidconnect.googleapis.com';

describe('GoogleOAuthProvider', () => {
  let provider: GoogleOAuthProvider;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    provider = new GoogleOAuthProvider(createTestConfig());
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('buildAuthorizationUrl', () => {
    it('embeds client id, redirect URI, scopes and state', () => {
      const url = new URL(provider.buildAuthorizationUrl('state-123'));

      expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/v2/auth');
      expect(Object.fromEntries(url.searchParams)).toEqual({
        client_id: 'test-client-id',
        redirect_uri: 'http://api.test/api/v1/auth/oauth/google/callback',
        response_type: 'code',
        scope: 'openid email profile',
        state: 'state-123',
        access_type: 'offline',
        prompt: 'select_account',
      });
    });
  });

  describe('isConfigured', () => {
    it('requires both client id and secret', () => {
      expect(provider.isConfigured()).toBe(true);
      expect(
        new GoogleOAuthProvider(createTestConfig({ GOOGLE_CLIENT_SECRET: '' })).isConfigured(),
      ).toBe(false);
    });
  });

  describe('exchangeCode', () => {
    it('posts the authorization code and maps the token response', async () => {
      nock(TOKEN_HOST)
        .post('/token', {
          code: 'auth-code',
          client_id: 'test-client-id',
          client_secret: 'test-client-secret',
          redirect_uri: 'http://api.test/api/v1/auth/oauth/google/callback',
          grant_type: 'authorization_code',
        })
        .reply(200, {
          access_token: 'provider-access',
          token_type: 'Bearer',
          expires_in: 3599,
          refresh_token: 'provider-refresh',
          id_token: 'header.payload.signature',
          scope: 'openid email profile',
        });

      await expect(provider.exchangeCode('auth-code')).resolves.toEqual({
        accessToken: 'provider-access',
        tokenType: 'Bearer',
        refreshToken: 'provider-refresh',
        idToken: 'header.payload.signature',
        expiresIn: 3599,
        scope: 'openid email profile',
      });
    });

    it('fills absent optional fields with null', async () => {
      nock(TOKEN_HOST).post('/token').reply(200, { access_token: 'provider-access' });

      await expect(provider.exchangeCode('auth-code')).resolves.toEqual({
        accessToken: 'provider-access',
        tokenType: 'Bearer',
        refreshToken: null,
        idToken: null,
        expiresIn: null,
        scope: null,
      });
    });

    it('reports a 4xx answer as a rejection', async () => {
      nock(TOKEN_HOST).post('/token').reply(400, { error: 'invalid_grant' });

      await expect(provider.exchangeCode('used-code')).rejects.toMatchObject({
        code: OAuthProviderErrorCode.PROVIDER_REJECTED,
        provider: 'google',
        status: 400,
      });
    });

    it('reports a 5xx answer as unreachable', async () => {
      nock(TOKEN_HOST).post('/token').reply(503, 'Service Unavailable');

      await expect(provider.exchangeCode('auth-code')).rejects.toMatchObject({
        code: OAuthProviderErrorCode.PROVIDER_UNREACHABLE,
        status: 503,
      });
    });

    it('reports a connection failure as unreachable', async () => {
      nock(TOKEN_HOST).post('/token').replyWithError('connect ECONNREFUSED');

      const failure = provider.exchangeCode('auth-code');

      await expect(failure).rejects.toBeInstanceOf(OAuthProviderError);
      await expect(failure).rejects.toMatchObject({
        code: OAuthProviderErrorCode.PROVIDER_UNREACHABLE,
      });
    });

    it('reports a body without an access token as invalid', async () => {
      nock(TOKEN_HOST).post('/token').reply(200, { token_type: 'Bearer' });

      await expect(provider.exchangeCode('auth-code')).rejects.toMatchObject({
        code: OAuthProviderErrorCode.INVALID_RESPONSE,
      });
    });
  });

  describe('fetchProfile', () => {
    it('sends the bearer token and maps the userinfo claims', async () => {
      nock(USERINFO_HOST)
        .get('/v1/userinfo')
        .matchHeader('authorization', 'Bearer provider-access')
        .reply(200, {
          sub: '1098765',
          email: 'Grace@Example.com',
          email_verified: true,
          given_name: 'Grace',
          family_name: 'Hopper',
          picture: 'https://images.example.com/grace.png',
        });

      await expect(provider.fetchProfile('provider-access')).resolves.toEqual({
        id: '1098765',
        email: 'grace@example.com',
        emailVerified: true,
        name: 'Grace Hopper',
        firstName: 'Grace',
        lastName: 'Hopper',
        picture: 'https://images.example.com/grace.png',
      });
    });

    it('treats a missing email_verified claim as unverified', async () => {
      nock(USERINFO_HOST).get('/v1/userinfo').reply(200, { sub: '42', name: 'Ada' });

      await expect(provider.fetchProfile('provider-access')).resolves.toEqual({
        id: '42',
        email: null,
        emailVerified: false,
        name: 'Ada',
        firstName: null,
        lastName: null,
        picture: null,
      });
    });

    it('reports a revoked token as a rejection', async () => {
      nock(USERINFO_HOST).get('/v1/userinfo').reply(401, { error: 'invalid_token' });

      await expect(provider.fetchProfile('revoked')).rejects.toMatchObject({
        code: OAuthProviderErrorCode.PROVIDER_REJECTED,
        status: 401,
      });
    });
  });
});
