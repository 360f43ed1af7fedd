import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { UnauthorizedError } from '@application/errors';
import { ITokenServicePort, IssuedToken, TokenPayload } from '@application/ports/outbound';
import { isUserRole } from '@domain/value-objects';
import { EnvConfigService } from '../../config/env-config.service';

/**
 * Signs and verifies HS256 access tokens through @nestjs/jwt.
 */
@Injectable()
export class JwtTokenService implements ITokenServicePort {
  constructor(
    private readonly jwtService: JwtService,
    private readonly envConfig: EnvConfigService,
  ) {}

  async issue(payload: TokenPayload): Promise<IssuedToken> {
    const expiresIn = this.envConfig.jwtExpiresInSeconds;
    const issuedAt = Date.now();

    const token = await this.jwtService.signAsync(
      { sub: payload.sub, email: payload.email, roles: [...payload.roles] },
      { expiresIn },
    );

    return { token, expiresAt: new Date(issuedAt + expiresIn * 1000) };
  }

  async verify(token: string): Promise<TokenPayload> {
    let claims: Record<string, unknown>;
    try {
      claims = await this.jwtService.verifyAsync<Record<string, unknown>>(token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unreadable token';
      throw new UnauthorizedError(`Invalid token: ${reason}`);
    }

    const { sub, email, roles } = claims;
    if (typeof sub !== 'string' || typeof email !== 'string' || !Array.isArray(roles)) {
      throw new UnauthorizedError('Invalid token: missing claims');
    }

    return { sub, email, roles: roles.filter(isUserRole) };
  }
}
