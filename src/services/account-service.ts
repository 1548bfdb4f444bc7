/**
 * Account Service - public profiles and account state changes
 */

import type { Account, PublicProfile, TokenClaims } from '../core/types.js';
import { withPersistenceErrors } from '../persistence/errors.js';
import type { AccountRepository, ProfileChanges, QueryContext } from '../persistence/types.js';
import { AuthErrors, CommonErrors } from '../utils/errors.js';
import type { AuditService } from '../core/audit-service.js';

export interface AccountServiceOptions {
  accounts: AccountRepository;
  auditService?: AuditService;
}

export function toPublicProfile(account: Account): PublicProfile {
  return {
    id: account.id,
    username: account.username,
    description: account.description,
    status: account.status,
  };
}

function assertOwnAccount(claims: TokenClaims, accountId: string): void {
  if (claims.subject !== accountId) {
    throw AuthErrors.ACCOUNT_ID_MISMATCH();
  }
}

export class AccountService {
  private readonly accounts: AccountRepository;
  private readonly auditService?: AuditService;

  constructor(options: AccountServiceOptions) {
    this.accounts = options.accounts;
    this.auditService = options.auditService;
  }

  async getProfile(accountId: string, ctx?: QueryContext): Promise<PublicProfile> {
    const account = await withPersistenceErrors(() => this.accounts.getAccountById(accountId, ctx));
    if (!account) {
      throw CommonErrors.NOT_FOUND('Account');
    }
    if (account.status !== 'active') {
      throw AuthErrors.ACCOUNT_NOT_ACTIVE();
    }
    return toPublicProfile(account);
  }

  /**
   * Empty or absent fields keep their stored value.
   */
  async editProfile(
    claims: TokenClaims,
    accountId: string,
    changes: ProfileChanges,
    ctx?: QueryContext
  ): Promise<PublicProfile> {
    assertOwnAccount(claims, accountId);

    const normalized: ProfileChanges = {
      username: changes.username?.trim() || undefined,
      description: changes.description?.trim() || undefined,
    };

    const account = await withPersistenceErrors(() =>
      this.accounts.editProfile(accountId, normalized, ctx)
    );
    if (!account) {
      throw CommonErrors.NOT_FOUND('Account');
    }
    return toPublicProfile(account);
  }

  /**
   * Lock the caller's own account. Outstanding tokens are revoked by the
   * same statement that changes the status.
   */
  async lock(claims: TokenClaims, accountId: string, ctx?: QueryContext): Promise<PublicProfile> {
    assertOwnAccount(claims, accountId);
    return this.changeStatus(claims, accountId, 'locked', ctx);
  }

  async ban(claims: TokenClaims, accountId: string, ctx?: QueryContext): Promise<PublicProfile> {
    if (claims.role !== 'admin') {
      await this.auditService?.log({
        source: 'account:status',
        userId: claims.subject,
        action: 'ban',
        success: false,
        error: 'INSUFFICIENT_PERMISSIONS',
        metadata: { target: accountId },
      });
      throw AuthErrors.INSUFFICIENT_PERMISSIONS('ban account');
    }
    return this.changeStatus(claims, accountId, 'banned', ctx);
  }

  private async changeStatus(
    claims: TokenClaims,
    accountId: string,
    status: 'locked' | 'banned',
    ctx?: QueryContext
  ): Promise<PublicProfile> {
    const account = await withPersistenceErrors(() =>
      this.accounts.updateStatusAndInvalidate(accountId, status, ctx)
    );
    if (!account) {
      throw CommonErrors.NOT_FOUND('Account');
    }

    await this.auditService?.log({
      source: 'account:status',
      userId: claims.subject,
      action: status === 'locked' ? 'lock' : 'ban',
      success: true,
      metadata: { target: accountId, tokenVersion: account.tokenVersion },
    });
    return toPublicProfile(account);
  }
}
