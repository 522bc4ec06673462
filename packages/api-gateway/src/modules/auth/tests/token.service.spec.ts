import * as jwt from 'jsonwebtoken';
import { TokenService, TokenVerificationError } from '../services/token.service';
import { createTestConfig } from './support/test-config';

const SUBJECT = { userId: 'user-1', sessionId: 'session-1', roles: ['careseeker'] };

describe('TokenService', () => {
  let service: TokenService;

  beforeEach(() => {
    service = new TokenService(createTestConfig());
  });

  it('issues an access/refresh pair bound to the session', () => {
    const before = Math.floor(Date.now() / 1000);
    const pair = service.issuePair(SUBJECT);

    expect(pair.tokenType).toBe('Bearer');
    expect(pair.expiresIn).toBe(900);

    const access = service.verifyAccessToken(pair.accessToken);
    expect(access).toMatchObject({
      sub: 'user-1',
      sessionId: 'session-1',
      roles: ['careseeker'],
      type: 'access',
    });
    expect(access.iat).toBeGreaterThanOrEqual(before);
    expect(access.exp - access.iat).toBe(900);

    const refresh = service.verifyRefreshToken(pair.refreshToken);
    expect(refresh).toEqual({
      sub: 'user-1',
      sessionId: 'session-1',
      iat: refresh.iat,
      exp: refresh.iat + 30 * 24 * 60 * 60,
      type: 'refresh',
    });
  });

  it('keeps roles out of the refresh token', () => {
    const { refreshToken } = service.issuePair(SUBJECT);

    const payload = jwt.decode(refreshToken);

    expect(typeof payload === 'object' && payload !== null && 'roles' in payload).toBe(false);
  });

  it('signs with HS256 and the configured issuer', () => {
    const { accessToken } = service.issuePair(SUBJECT);

    const decoded = jwt.decode(accessToken, { complete: true });
    if (!decoded || typeof decoded.payload === 'string') {
      throw new Error('token did not decode');
    }

    expect(decoded.header.alg).toBe('HS256');
    expect(decoded.payload.iss).toBe('careport-test');
  });

  it('never accepts one token type in place of the other', () => {
    const pair = service.issuePair(SUBJECT);

    expect(() => service.verifyAccessToken(pair.refreshToken)).toThrow(
      new TokenVerificationError('Invalid token claims'),
    );
    expect(() => service.verifyRefreshToken(pair.accessToken)).toThrow(
      new TokenVerificationError('Invalid token claims'),
    );
  });

  it('rejects an expired token', () => {
    const now = Math.floor(Date.now() / 1000);
    const expired = jwt.sign(
      { sub: 'user-1', sessionId: 'session-1', iat: now - 120, exp: now - 60, type: 'refresh' },
      'test-secret-value-123',
      { algorithm: 'HS256', issuer: 'careport-test' },
    );

    expect(() => service.verifyRefreshToken(expired)).toThrow(
      new TokenVerificationError('Token has expired'),
    );
  });

  it('rejects a token signed with another secret', () => {
    const other = new TokenService(createTestConfig({ JWT_SECRET: 'another-test-secret' }));
    const { accessToken } = other.issuePair(SUBJECT);

    expect(() => service.verifyAccessToken(accessToken)).toThrow(TokenVerificationError);
  });

  it('rejects a token from another issuer', () => {
    const other = new TokenService(createTestConfig({ JWT_ISSUER: 'someone-else' }));
    const { accessToken } = other.issuePair(SUBJECT);

    expect(() => service.verifyAccessToken(accessToken)).toThrow(TokenVerificationError);
  });

  it('rejects a tampered payload', () => {
    const { accessToken } = service.issuePair(SUBJECT);
    const [header, , signature] = accessToken.split('.');
    const forged = Buffer.from(
      JSON.stringify({ ...(jwt.decode(accessToken, { json: true }) ?? {}), roles: ['admin'] }),
    ).toString('base64url');

    expect(() => service.verifyAccessToken(`${header}.${forged}.${signature}`)).toThrow(
      TokenVerificationError,
    );
  });

  it('rejects other HMAC algorithms', () => {
    const now = Math.floor(Date.now() / 1000);
    const hs512 = jwt.sign(
      { sub: 'user-1', sessionId: 'session-1', roles: [], iat: now, exp: now + 60, type: 'access' },
      'test-secret-value-123',
      { algorithm: 'HS512', issuer: 'careport-test' },
    );

    expect(() => service.verifyAccessToken(hs512)).toThrow(TokenVerificationError);
  });
});
