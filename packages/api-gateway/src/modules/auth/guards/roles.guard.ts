import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthorizationException } from '../../../common/exceptions/api.exceptions';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { principalFromContext } from '../decorators/current-principal.decorator';

@Injectable()
export class RolesGuard implements CanActivate {
  private readonly logger = new Logger(RolesGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<string[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const principal = principalFromContext(context);
    if (!requiredRoles.some(role => principal.roles.includes(role))) {
      this.logger.warn(
        `User ${principal.userId} lacks any of the roles: ${requiredRoles.join(', ')}`,
      );
      throw new AuthorizationException(
        ERROR_CODES.FORBIDDEN_INSUFFICIENT_ROLE,
        'Insufficient permissions',
      );
    }
    return true;
  }
}
