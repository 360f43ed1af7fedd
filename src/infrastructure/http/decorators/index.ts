export { Roles, ROLES_KEY } from './roles.decorator';
export { CurrentUser, AuthenticatedRequest } from './current-user.decorator';
