/**
 * Subscription Service
 */

import type { TokenClaims } from '../core/types.js';
import { withPersistenceErrors } from '../persistence/errors.js';
import type { AccountRepository, QueryContext } from '../persistence/types.js';
import { AuthErrors, CommonErrors } from '../utils/errors.js';

export interface SubscriptionResult {
  subscriberId: string;
  subscribeToId: string;
  /** false when nothing changed (already subscribed) */
  changed: boolean;
}

export class SubscriptionService {
  constructor(private readonly accounts: AccountRepository) {}

  async subscribe(
    claims: TokenClaims,
    targetId: string,
    ctx?: QueryContext
  ): Promise<SubscriptionResult> {
    if (claims.subject === targetId) {
      throw CommonErrors.INVALID_REQUEST('Cannot subscribe to your own account');
    }

    const [subscriber, target] = await withPersistenceErrors(() =>
      Promise.all([
        this.accounts.getAccountById(claims.subject, ctx),
        this.accounts.getAccountById(targetId, ctx),
      ])
    );
    if (!subscriber || subscriber.status !== 'active') {
      throw AuthErrors.ACCOUNT_NOT_ACTIVE();
    }
    if (!target || target.status !== 'active') {
      throw CommonErrors.NOT_FOUND('Account');
    }

    const changed = await withPersistenceErrors(() =>
      this.accounts.subscribe(claims.subject, targetId, ctx)
    );
    return { subscriberId: claims.subject, subscribeToId: targetId, changed };
  }

  async unsubscribe(
    claims: TokenClaims,
    targetId: string,
    ctx?: QueryContext
  ): Promise<SubscriptionResult> {
    const removed = await withPersistenceErrors(() =>
      this.accounts.unsubscribe(claims.subject, targetId, ctx)
    );
    if (!removed) {
      throw CommonErrors.NOT_FOUND('Subscription');
    }
    return { subscriberId: claims.subject, subscribeToId: targetId, changed: true };
  }
}
