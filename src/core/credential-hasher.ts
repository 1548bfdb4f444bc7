/**
 * Credential Hasher
 *
 * bcrypt with a configurable cost. Salts are random per hash; comparison is
 * bcrypt's constant-time compare.
 */

import bcrypt from 'bcrypt';

export const DEFAULT_BCRYPT_COST = 10;

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  /** Never throws: a malformed digest simply does not match */
  verify(digest: string, plaintext: string): Promise<boolean>;
}

export class CredentialHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(cost: number = DEFAULT_BCRYPT_COST) {
    if (!Number.isInteger(cost) || cost < 4 || cost > 31) {
      throw new Error(`bcrypt cost must be an integer between 4 and 31, got ${cost}`);
    }
    this.cost = cost;
  }

  async hash(plaintext: string): Promise<string> {
    const salt = await bcrypt.genSalt(this.cost);
    return bcrypt.hash(plaintext, salt);
  }

  async verify(digest: string, plaintext: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plaintext, digest);
    } catch (error) {
      console.warn('[CredentialHasher] Digest comparison failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
