/**
 * E-mail verification tokens
 *
 * Signed with the session key but scoped to the `email-verification`
 * audience, so a bearer token is never accepted here and a verification
 * token carries no `token_type` to be accepted as a bearer token.
 */

import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import { AuthErrors } from '../utils/errors.js';

export const VERIFICATION_AUDIENCE = 'email-verification';

export interface VerificationTokenOptions {
  secret: string;
  issuer: string;
  /** Lifetime in seconds (default: 24 hours) */
  ttlSeconds?: number;
  now?: () => Date;
}

export class VerificationTokenCodec {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(options: VerificationTokenOptions) {
    this.key = new TextEncoder().encode(options.secret);
    this.issuer = options.issuer;
    this.ttlSeconds = options.ttlSeconds ?? 24 * 3600;
    this.now = options.now ?? (() => new Date());
  }

  async issue(accountId: string): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    return new SignJWT({})
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(accountId)
      .setIssuer(this.issuer)
      .setAudience(VERIFICATION_AUDIENCE)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.ttlSeconds)
      .sign(this.key);
  }

  /**
   * @returns the account id the token was issued for
   * @throws {ApiError} VERIFICATION_TOKEN_EXPIRED, VERIFICATION_TOKEN_INVALID
   */
  async parse(token: string): Promise<string> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: ['HS256'],
        issuer: this.issuer,
        audience: VERIFICATION_AUDIENCE,
        currentDate: this.now(),
        requiredClaims: ['sub', 'exp'],
      });
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw AuthErrors.VERIFICATION_TOKEN_INVALID();
      }
      return payload.sub;
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw AuthErrors.VERIFICATION_TOKEN_EXPIRED();
      }
      throw AuthErrors.VERIFICATION_TOKEN_INVALID();
    }
  }
}
