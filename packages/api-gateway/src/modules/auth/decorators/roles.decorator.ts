import { SetMetadata } from '@nestjs/common';
import { RoleName } from '../constants/auth.constants';

// Caller needs at least one of the listed roles
export const ROLES_KEY = 'roles';
export const Roles = (...roles: RoleName[]) => SetMetadata(ROLES_KEY, roles);
