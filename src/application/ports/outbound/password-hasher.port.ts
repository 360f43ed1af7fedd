export interface IPasswordHasherPort {
  hash(plainText: string): Promise<string>;

  /**
   * Constant-time comparison of a candidate password against a stored hash.
   */
  verify(plainText: string, hash: string): Promise<boolean>;
}
