import { Injectable } from '@nestjs/common';
import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import { IPasswordHasherPort } from '@application/ports/outbound';

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const PREFIX = 'scrypt';

const deriveKey = (plainText: string, salt: Buffer): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(plainText, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });

/**
 * Password hashing with Node's scrypt.
 * Stored format: `scrypt$<salt hex>$<key hex>`.
 */
@Injectable()
export class ScryptPasswordHasher implements IPasswordHasherPort {
  async hash(plainText: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(plainText, salt);
    return `${PREFIX}$${salt.toString('hex')}$${key.toString('hex')}`;
  }

  async verify(plainText: string, hash: string): Promise<boolean> {
    const [prefix, saltHex, keyHex] = hash.split('$');
    if (prefix !== PREFIX || !saltHex || !keyHex) {
      return false;
    }

    const expected = Buffer.from(keyHex, 'hex');
    if (expected.length !== KEY_LENGTH) {
      return false;
    }

    const actual = await deriveKey(plainText, Buffer.from(saltHex, 'hex'));
    return timingSafeEqual(actual, expected);
  }
}
