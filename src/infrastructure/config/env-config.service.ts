import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are guaranteed to exist because they are validated
 * at application startup by the Zod schema.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): EnvConfig['PORT'] {
    return this.configService.get('PORT', { infer: true });
  }

  get logLevel(): EnvConfig['LOG_LEVEL'] {
    return this.configService.get('LOG_LEVEL', { infer: true });
  }

  get mongoUri(): EnvConfig['MONGO_URI'] {
    return this.configService.get('MONGO_URI', { infer: true });
  }

  get jwtSecret(): EnvConfig['JWT_SECRET'] {
    return this.configService.get('JWT_SECRET', { infer: true });
  }

  get jwtExpiresInSeconds(): EnvConfig['JWT_EXPIRES_IN_SECONDS'] {
    return this.configService.get('JWT_EXPIRES_IN_SECONDS', { infer: true });
  }

  get throttleTtlMs(): EnvConfig['THROTTLE_TTL_MS'] {
    return this.configService.get('THROTTLE_TTL_MS', { infer: true });
  }

  get throttleLimit(): EnvConfig['THROTTLE_LIMIT'] {
    return this.configService.get('THROTTLE_LIMIT', { infer: true });
  }

  get adminEmail(): EnvConfig['ADMIN_EMAIL'] {
    return this.configService.get('ADMIN_EMAIL', { infer: true });
  }

  get adminPassword(): EnvConfig['ADMIN_PASSWORD'] {
    return this.configService.get('ADMIN_PASSWORD', { infer: true });
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}
