/**
 * Session Authority
 *
 * Ties bearer tokens to the per-account token version. A token is valid
 * only while the version it carries equals the version stored for its
 * subject; bumping the stored version revokes every outstanding token of
 * the account at once (logout, refresh, lock, ban).
 */

import type { TokenCodec } from './token-codec.js';
import type {
  Account,
  KindPolicy,
  TokenClaims,
  TokenPair,
} from './types.js';
import type { AccountRepository, QueryContext } from '../persistence/types.js';
import { withPersistenceErrors } from '../persistence/errors.js';
import { AuthErrors, TokenErrors } from '../utils/errors.js';
import type { AuditService } from './audit-service.js';

export interface SessionAuthorityOptions {
  codec: TokenCodec;
  accounts: AccountRepository;
  /** Access token lifetime in seconds */
  accessTokenTtl: number;
  /** Refresh token lifetime in seconds */
  refreshTokenTtl: number;
  auditService?: AuditService;
}

export class SessionAuthority {
  private readonly codec: TokenCodec;
  private readonly accounts: AccountRepository;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;
  private readonly auditService?: AuditService;

  constructor(options: SessionAuthorityOptions) {
    if (options.refreshTokenTtl <= options.accessTokenTtl) {
      throw new Error('refreshTokenTtl must be longer than accessTokenTtl');
    }
    this.codec = options.codec;
    this.accounts = options.accounts;
    this.accessTokenTtl = options.accessTokenTtl;
    this.refreshTokenTtl = options.refreshTokenTtl;
    this.auditService = options.auditService;
  }

  /**
   * Mint an access/refresh pair stamped with the account's current version.
   *
   * @throws {ApiError} ACCOUNT_NOT_ACTIVE unless the account is active
   */
  async issue(account: Account): Promise<TokenPair> {
    if (account.status !== 'active') {
      throw AuthErrors.ACCOUNT_NOT_ACTIVE();
    }
    return this.mintPair(account.id, account.tokenVersion, account.role);
  }

  /**
   * Verify a token for an endpoint.
   *
   * Order: signature/expiry/claims, then the stored version, then the kind
   * policy. A missing account is reported as a stale version.
   */
  async verify(token: string, policy: KindPolicy, ctx?: QueryContext): Promise<TokenClaims> {
    const claims = await this.codec.parse(token);

    const currentVersion = await withPersistenceErrors(() =>
      this.accounts.getTokenVersion(claims.subject, ctx)
    );

    if (currentVersion === null || currentVersion !== claims.version) {
      throw TokenErrors.STALE_VERSION();
    }

    if (claims.kind !== policy) {
      throw TokenErrors.WRONG_KIND(policy);
    }

    return claims;
  }

  /**
   * Revoke every outstanding token of the account.
   *
   * @returns the new version
   */
  async invalidate(accountId: string, ctx?: QueryContext): Promise<number> {
    const version = await withPersistenceErrors(() =>
      this.accounts.incrementTokenVersion(accountId, ctx)
    );
    if (version === null) {
      throw AuthErrors.ACCOUNT_NOT_FOUND();
    }

    await this.auditService?.log({
      source: 'auth:session',
      userId: accountId,
      action: 'invalidate',
      success: true,
      metadata: { version },
    });
    return version;
  }

  /**
   * Exchange verified refresh-token claims for a new pair.
   *
   * The refresh token's version is burned first, so it cannot be replayed
   * and every access token minted before it stops working. The increment
   * only applies while the stored version still equals the one in the
   * claims; of two concurrent redemptions exactly one wins.
   *
   * @throws {ApiError} TOKEN_STALE_VERSION when the version has moved on
   */
  async refresh(claims: TokenClaims, ctx?: QueryContext): Promise<TokenPair> {
    if (claims.kind !== 'refresh') {
      throw TokenErrors.WRONG_KIND('refresh');
    }

    const version = await withPersistenceErrors(() =>
      this.accounts.incrementTokenVersionFrom(claims.subject, claims.version, ctx)
    );
    if (version === null) {
      await this.auditService?.log({
        source: 'auth:session',
        userId: claims.subject,
        action: 'refresh',
        success: false,
        error: 'TOKEN_STALE_VERSION',
      });
      throw TokenErrors.STALE_VERSION();
    }

    await this.auditService?.log({
      source: 'auth:session',
      userId: claims.subject,
      action: 'refresh',
      success: true,
      metadata: { version },
    });
    return this.mintPair(claims.subject, version, claims.role);
  }

  private async mintPair(
    subject: string,
    version: number,
    role: Account['role']
  ): Promise<TokenPair> {
    const [accessToken, refreshToken] = await Promise.all([
      this.codec.issue(subject, 'access', version, this.accessTokenTtl, role),
      this.codec.issue(subject, 'refresh', version, this.refreshTokenTtl, role),
    ]);
    return { accessToken, refreshToken };
  }
}
