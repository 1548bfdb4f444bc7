/**
 * Token Codec - HS256 bearer tokens
 *
 * Mints and parses the self-contained access and refresh tokens. Parsing
 * proves only that the token was signed with our key, has not expired and
 * carries well-formed claims; whether it has been revoked is the Session
 * Authority's job (token version check).
 */

import { SignJWT, errors as joseErrors, jwtVerify, type JWTPayload } from 'jose';
import { ACCOUNT_ROLES, TOKEN_KINDS } from './types.js';
import type { AccountRole, TokenClaims, TokenKind } from './types.js';
import { ApiError, TokenErrors } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface TokenCodecOptions {
  /** Shared HMAC secret */
  secret: string;

  /** Value of the `iss` claim; tokens from any other issuer are rejected */
  issuer: string;

  /** Allowed clock skew in seconds when checking `exp` (default: 30) */
  clockTolerance?: number;

  /** Clock used for `iat`/`exp` and for expiry checks (default: system clock) */
  now?: () => Date;
}

/** Wire claims beyond the registered ones */
interface TokenPayload extends JWTPayload {
  role?: unknown;
  token_type?: unknown;
  version?: unknown;
}

/** HMAC family only: rejects `none` and every asymmetric algorithm */
const ACCEPTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'];
const SIGNING_ALGORITHM = 'HS256';

export const DEFAULT_CLOCK_TOLERANCE = 30;

export function isTokenKind(value: unknown): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

function isAccountRole(value: unknown): value is AccountRole {
  return ACCOUNT_ROLES.some((role) => role === value);
}

// ============================================================================
// Token Codec
// ============================================================================

export class TokenCodec {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly clockTolerance: number;
  private readonly now: () => Date;

  constructor(options: TokenCodecOptions) {
    if (options.secret.length === 0) {
      throw new Error('Token signing secret must not be empty');
    }
    this.key = new TextEncoder().encode(options.secret);
    this.issuer = options.issuer;
    this.clockTolerance = options.clockTolerance ?? DEFAULT_CLOCK_TOLERANCE;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Mint a signed token.
   *
   * @throws {ApiError} TOKEN_INVALID_KIND, TOKEN_INVALID_TTL
   */
  async issue(
    subject: string,
    kind: string,
    version: number,
    ttlSeconds: number,
    role: AccountRole = 'user'
  ): Promise<string> {
    if (!isTokenKind(kind)) {
      throw TokenErrors.INVALID_KIND(kind);
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw TokenErrors.INVALID_TTL(ttlSeconds);
    }

    const issuedAt = Math.floor(this.now().getTime() / 1000);

    return new SignJWT({ role, token_type: kind, version })
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: 'JWT' })
      .setSubject(subject)
      .setIssuer(this.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(this.key);
  }

  /**
   * Verify signature, expiry and issuer, then extract the claims.
   *
   * @throws {ApiError} TOKEN_MALFORMED, TOKEN_EXPIRED, TOKEN_BAD_SIGNATURE,
   *         TOKEN_INVALID_CLAIMS
   */
  async parse(token: string): Promise<TokenClaims> {
    this.validateTokenFormat(token);

    let payload: TokenPayload;
    try {
      ({ payload } = await jwtVerify<TokenPayload>(token, this.key, {
        algorithms: ACCEPTED_ALGORITHMS,
        issuer: this.issuer,
        clockTolerance: this.clockTolerance,
        currentDate: this.now(),
        requiredClaims: ['sub', 'iat', 'exp'],
      }));
    } catch (error) {
      throw this.mapVerificationError(error);
    }

    return this.extractClaims(payload);
  }

  /**
   * Compact JWS: non-empty base64url header and payload. The signature may
   * be empty so that an unsigned `alg: none` token fails the algorithm
   * check as a bad signature.
   */
  private validateTokenFormat(token: string): void {
    const [header, payload, signature, ...rest] = token.split('.');
    const segment = /^[A-Za-z0-9_-]+$/;
    if (
      rest.length > 0 ||
      header === undefined ||
      payload === undefined ||
      signature === undefined ||
      !segment.test(header) ||
      !segment.test(payload) ||
      (signature !== '' && !segment.test(signature))
    ) {
      throw TokenErrors.MALFORMED();
    }
  }

  private mapVerificationError(error: unknown): ApiError {
    if (error instanceof ApiError) {
      return error;
    }
    const details = { originalError: error instanceof Error ? error.message : String(error) };

    // JWTExpired must be checked before the general claim failure
    if (error instanceof joseErrors.JWTExpired) {
      return TokenErrors.EXPIRED(details);
    }
    if (error instanceof joseErrors.JWTClaimValidationFailed) {
      return TokenErrors.INVALID_CLAIMS(details);
    }
    if (
      error instanceof joseErrors.JWSSignatureVerificationFailed ||
      error instanceof joseErrors.JOSEAlgNotAllowed
    ) {
      return TokenErrors.BAD_SIGNATURE(details);
    }
    return TokenErrors.MALFORMED(details);
  }

  private extractClaims(payload: TokenPayload): TokenClaims {
    const { sub, role, token_type: kind, version, iss, iat, exp } = payload;

    if (typeof sub !== 'string' || sub.length === 0) {
      throw TokenErrors.INVALID_CLAIMS({ claim: 'sub' });
    }
    if (!isTokenKind(kind)) {
      throw TokenErrors.INVALID_CLAIMS({ claim: 'token_type' });
    }
    if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
      throw TokenErrors.INVALID_CLAIMS({ claim: 'version' });
    }
    if (!isAccountRole(role)) {
      throw TokenErrors.INVALID_CLAIMS({ claim: 'role' });
    }
    if (typeof iss !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
      throw TokenErrors.INVALID_CLAIMS({ claim: 'iss' });
    }

    return {
      subject: sub,
      role,
      kind,
      version,
      issuer: iss,
      issuedAt: iat,
      expiresAt: exp,
    };
  }
}
