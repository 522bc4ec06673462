import { CanActivate, ExecutionContext, Inject, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthenticationException } from '../../../common/exceptions/api.exceptions';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import { UNIT_OF_WORK } from '../constants/auth.constants';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { fail, ok } from '../interfaces/auth-result.interface';
import { UnitOfWork } from '../interfaces/identity-stores.interface';
import { AuthenticatedRequest } from '../interfaces/principal.interface';
import { SessionIssuerService } from '../services/session-issuer.service';
import { AccessTokenClaims, TokenService, TokenVerificationError } from '../services/token.service';

export const ACCESS_TOKEN_COOKIE = 'access_token';

/**
 * Accepts a request when its access token verifies and the session it names
 * still exists, so signing out or resetting a password cuts off live tokens.
 */
@Injectable()
export class SessionAuthGuard implements CanActivate {
  private readonly logger = new Logger(SessionAuthGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly tokenService: TokenService,
    private readonly sessionIssuer: SessionIssuerService,
    @Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractToken(request);
    if (!token) {
      throw new AuthenticationException(
        ERROR_CODES.AUTH_TOKEN_MISSING,
        'Missing authentication token',
      );
    }

    let claims: AccessTokenClaims;
    try {
      claims = this.tokenService.verifyAccessToken(token);
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        this.logger.debug(`Token rejected: ${error.message}`);
        throw new AuthenticationException(
          ERROR_CODES.AUTH_TOKEN_INVALID,
          'Invalid authentication token',
        );
      }
      throw error;
    }

    const live = await this.unitOfWork.run<boolean>(async stores => {
      const session = await stores.sessions.findById(claims.sessionId);
      return session && session.userId === claims.sub && !this.sessionIssuer.isExpired(session)
        ? ok(true)
        : fail('Unauthorized', 'Session has expired');
    });
    if (!live.ok) {
      throw new AuthenticationException(ERROR_CODES.AUTH_SESSION_EXPIRED, live.error.message);
    }

    request.principal = {
      userId: claims.sub,
      sessionId: claims.sessionId,
      roles: claims.roles,
    };
    return true;
  }

  private extractToken(request: AuthenticatedRequest): string | null {
    const header = request.headers.authorization;
    if (header) {
      const [type, token] = header.split(' ');
      if (type === 'Bearer' && token) {
        return token;
      }
    }

    // Web clients carry the access token in an HttpOnly cookie
    return request.cookies?.[ACCESS_TOKEN_COOKIE] ?? null;
  }
}
