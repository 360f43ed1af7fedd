import { SetMetadata } from '@nestjs/common';
import { UserRole } from '@domain/value-objects';

export const ROLES_KEY = 'roles';

/**
 * Restricts a route to users holding at least one of the given roles.
 * Needs JwtAuthGuard ahead of RolesGuard.
 */
export const Roles = (...roles: UserRole[]): ReturnType<typeof SetMetadata> =>
  SetMetadata(ROLES_KEY, roles);
