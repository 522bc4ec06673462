import { Injectable, Logger } from '@nestjs/common';
import * as jwt from 'jsonwebtoken';
import { z } from 'zod';
import { ConfigService } from '../../../config/services/config.service';

const AccessTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  sessionId: z.string().min(1),
  roles: z.array(z.string()),
  iat: z.number().int(),
  exp: z.number().int(),
  type: z.literal('access'),
});

const RefreshTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  sessionId: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  type: z.literal('refresh'),
});

export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema>;
export type RefreshTokenClaims = z.infer<typeof RefreshTokenClaimsSchema>;

export interface TokenSubject {
  userId: string;
  sessionId: string;
  roles: readonly string[];
}

export interface TokenResponse {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  expiresIn: number; // access token lifetime in seconds
}

export class TokenVerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenVerificationError';
  }
}

/**
 * Issues and verifies HS256 access/refresh token pairs bound to a session
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly secret: string;
  private readonly issuer: string;
  private readonly accessTtl: number;
  private readonly refreshTtl: number;

  constructor(configService: ConfigService) {
    const { jwtSecret, jwtIssuer, accessTokenTtlSeconds, refreshTokenTtlSeconds } =
      configService.settings.auth;
    this.secret = jwtSecret;
    this.issuer = jwtIssuer;
    this.accessTtl = accessTokenTtlSeconds;
    this.refreshTtl = refreshTokenTtlSeconds;
  }

  issuePair(subject: TokenSubject): TokenResponse {
    const iat = Math.floor(Date.now() / 1000);

    const accessClaims: AccessTokenClaims = {
      sub: subject.userId,
      sessionId: subject.sessionId,
      roles: [...subject.roles],
      iat,
      exp: iat + this.accessTtl,
      type: 'access',
    };
    const refreshClaims: RefreshTokenClaims = {
      sub: subject.userId,
      sessionId: subject.sessionId,
      iat,
      exp: iat + this.refreshTtl,
      type: 'refresh',
    };

    return {
      accessToken: this.sign(accessClaims),
      refreshToken: this.sign(refreshClaims),
      tokenType: 'Bearer',
      expiresIn: this.accessTtl,
    };
  }

  verifyAccessToken(token: string): AccessTokenClaims {
    return this.verify(token, AccessTokenClaimsSchema);
  }

  verifyRefreshToken(token: string): RefreshTokenClaims {
    return this.verify(token, RefreshTokenClaimsSchema);
  }

  private sign(claims: AccessTokenClaims | RefreshTokenClaims): string {
    return jwt.sign(claims, this.secret, { algorithm: 'HS256', issuer: this.issuer });
  }

  private verify<T>(token: string, schema: z.ZodType<T>): T {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        issuer: this.issuer,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenVerificationError('Token has expired');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new TokenVerificationError(`Invalid token: ${error.message}`);
      }
      throw error;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn('Rejected token with unexpected claims');
      throw new TokenVerificationError('Invalid token claims');
    }
    return parsed.data;
  }
}
