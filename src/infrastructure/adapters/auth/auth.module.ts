import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { EnvConfigService } from '../../config/env-config.service';
import { JwtTokenService } from './jwt-token.service';
import { ScryptPasswordHasher } from './scrypt-password.hasher';

/**
 * Token and password adapters bound to their port tokens.
 */
@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService) => ({
        secret: envConfig.jwtSecret,
        signOptions: { algorithm: 'HS256' },
      }),
    }),
  ],
  providers: [
    { provide: 'ITokenService', useClass: JwtTokenService },
    { provide: 'IPasswordHasher', useClass: ScryptPasswordHasher },
  ],
  exports: ['ITokenService', 'IPasswordHasher'],
})
export class AuthModule {}
