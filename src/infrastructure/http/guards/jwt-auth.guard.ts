import { CanActivate, ExecutionContext, Inject, Injectable, Logger } from '@nestjs/common';
import { UnauthorizedError } from '@application/errors';
import { ITokenServicePort } from '@application/ports/outbound';
import { AppLoggerService } from '@infrastructure/observability/logging';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';

const BEARER_PREFIX = 'Bearer ';

/**
 * Reads the bearer token and puts its claims on `request.user`.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(
    @Inject('ITokenService')
    private readonly tokenService: ITokenServicePort,
    private readonly appLogger: AppLoggerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers.authorization;

    if (!header || !header.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedError('Missing bearer token');
    }

    try {
      request.user = await this.tokenService.verify(header.slice(BEARER_PREFIX.length).trim());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Rejected token on ${request.method} ${request.url}`);
      this.appLogger.logAuthEvent({ action: 'token_rejected', success: false, reason });
      throw error;
    }

    return true;
  }
}
