import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import { Request } from 'express';
import { UnauthorizedError } from '@application/errors';
import { TokenPayload } from '@application/ports/outbound';

export type AuthenticatedRequest = Request & { user?: TokenPayload };

export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): TokenPayload => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedError();
    }
    return request.user;
  },
);
