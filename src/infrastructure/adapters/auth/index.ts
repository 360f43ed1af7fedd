export { AuthModule } from './auth.module';
export { JwtTokenService } from './jwt-token.service';
export { ScryptPasswordHasher } from './scrypt-password.hasher';
