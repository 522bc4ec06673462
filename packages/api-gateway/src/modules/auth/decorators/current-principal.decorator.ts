import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { AuthenticationException } from '../../../common/exceptions/api.exceptions';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import { AuthenticatedPrincipal, AuthenticatedRequest } from '../interfaces/principal.interface';

export function principalFromContext(ctx: ExecutionContext): AuthenticatedPrincipal {
  const { principal } = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!principal) {
    throw new AuthenticationException(ERROR_CODES.AUTH_TOKEN_MISSING, 'Authentication required');
  }
  return principal;
}

/**
 * Injects the principal that SessionAuthGuard attached to the request
 */
export const CurrentPrincipal = createParamDecorator((_data: unknown, ctx: ExecutionContext) =>
  principalFromContext(ctx),
);
