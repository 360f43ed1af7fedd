import { UserRole } from '@domain/value-objects';

/**
 * Claims carried by an access token.
 */
export interface TokenPayload {
  /** User id */
  readonly sub: string;
  readonly email: string;
  readonly roles: readonly UserRole[];
}

export interface IssuedToken {
  readonly token: string;
  readonly expiresAt: Date;
}

export interface ITokenServicePort {
  issue(payload: TokenPayload): Promise<IssuedToken>;

  /**
   * @throws UnauthorizedError if the token is malformed, forged or expired
   */
  verify(token: string): Promise<TokenPayload>;
}
