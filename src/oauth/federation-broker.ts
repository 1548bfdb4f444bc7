/**
 * Identity Federation Broker
 *
 * Completes the OAuth2 authorization-code flow and reconciles the external
 * identity with a local account exactly once:
 *
 * 1. `state` names the provider, `code` is exchanged for a provider token
 * 2. the provider profile is fetched with that token
 * 3. (provider, providerId) is looked up:
 *    - known identity: login, the account must be active
 *    - new identity: an active account is created, default media and the
 *      provider avatar are set up in the background, tokens are issued
 */

import type { AuditService } from '../core/audit-service.js';
import type { SessionAuthority } from '../core/session-authority.js';
import type { Account, AuthenticatedSession, ExternalIdentity } from '../core/types.js';
import { toApiError, withPersistenceErrors } from '../persistence/errors.js';
import type { AccountRepository, QueryContext } from '../persistence/types.js';
import type { MediaStorage } from '../services/media-storage.js';
import { ApiError, AuthErrors, FederationErrors } from '../utils/errors.js';
import type { ProviderRegistry } from './provider-registry.js';
import type { OAuthProvider } from './providers/types.js';

export interface CallbackParams {
  code?: string;
  /** Provider tag */
  state?: string;
}

export interface FederationBrokerOptions {
  registry: ProviderRegistry;
  accounts: AccountRepository;
  sessions: SessionAuthority;
  media: MediaStorage;
  auditService?: AuditService;
}

const MAX_USERNAME_LENGTH = 20;

export class FederationBroker {
  private readonly registry: ProviderRegistry;
  private readonly accounts: AccountRepository;
  private readonly sessions: SessionAuthority;
  private readonly media: MediaStorage;
  private readonly auditService?: AuditService;
  private readonly background = new Set<Promise<void>>();

  constructor(options: FederationBrokerOptions) {
    this.registry = options.registry;
    this.accounts = options.accounts;
    this.sessions = options.sessions;
    this.media = options.media;
    this.auditService = options.auditService;
  }

  /**
   * URL of the provider's consent page. The provider tag travels as `state`
   * and comes back on the callback.
   */
  authorizationUrl(providerName: string): string {
    return this.registry.get(providerName).authorizationUrl(providerName);
  }

  /**
   * @throws {ApiError} UNKNOWN_PROVIDER, MISSING_AUTHORIZATION_CODE,
   *         EXTERNAL_EXCHANGE_FAILED, EXTERNAL_FETCH_FAILED, ACCOUNT_NOT_ACTIVE,
   *         EMAIL_TAKEN, USERNAME_TAKEN
   */
  async handleCallback(params: CallbackParams, ctx?: QueryContext): Promise<AuthenticatedSession> {
    const provider = this.registry.get(params.state ?? '');
    if (!params.code) {
      throw FederationErrors.MISSING_AUTHORIZATION_CODE();
    }

    try {
      const providerToken = await provider.exchangeCode(params.code, ctx);
      const identity = await provider.fetchProfile(providerToken, ctx);
      return await this.reconcile(provider, identity, ctx);
    } catch (error) {
      if (error instanceof ApiError) {
        await this.audit('callback', false, provider.name, undefined, error.code);
      }
      throw error;
    }
  }

  /** Resolves once all background profile work has settled */
  async whenIdle(): Promise<void> {
    await Promise.allSettled([...this.background]);
  }

  private async reconcile(
    provider: OAuthProvider,
    identity: ExternalIdentity,
    ctx?: QueryContext
  ): Promise<AuthenticatedSession> {
    const registered = await withPersistenceErrors(() =>
      this.accounts.isAccountRegistered(provider.name, identity.id, ctx)
    );

    if (registered) {
      return this.loginExisting(provider, identity, ctx);
    }

    let account: Account;
    try {
      account = await this.accounts.createAccountWithOAuth(
        {
          email: identity.email,
          username: identity.username.slice(0, MAX_USERNAME_LENGTH),
          provider: provider.name,
          providerId: identity.id,
        },
        ctx
      );
    } catch (error) {
      const apiError = toApiError(error);
      // A concurrent callback for the same identity created it first
      if (apiError.code === 'OAUTH_IDENTITY_TAKEN') {
        return this.loginExisting(provider, identity, ctx);
      }
      throw apiError;
    }

    this.runInBackground(this.provisionMedia(account.id, identity.avatarUrl));
    await this.audit('register', true, provider.name, account.id);
    return this.toSession(account);
  }

  private async loginExisting(
    provider: OAuthProvider,
    identity: ExternalIdentity,
    ctx?: QueryContext
  ): Promise<AuthenticatedSession> {
    const account = await withPersistenceErrors(() =>
      this.accounts.loginWithOAuth(provider.name, identity.id, ctx)
    );
    if (!account) {
      throw AuthErrors.ACCOUNT_NOT_FOUND();
    }

    const session = await this.toSession(account);
    await this.audit('login', true, provider.name, account.id);
    return session;
  }

  private async toSession(account: Account): Promise<AuthenticatedSession> {
    const tokens = await this.sessions.issue(account);
    return {
      id: account.id,
      username: account.username,
      email: account.email,
      avatar: this.media.avatarUrl(account.id),
      ...tokens,
    };
  }

  /**
   * Default avatar and cover first, then the provider avatar on top.
   */
  private async provisionMedia(accountId: string, avatarUrl: string): Promise<void> {
    await this.media.createUserRepo(accountId);
    if (avatarUrl) {
      await this.media.downloadAvatar(accountId, avatarUrl);
    }
  }

  private runInBackground(task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      console.error('[FederationBroker] Background profile setup failed:', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    this.background.add(tracked);
    void tracked.finally(() => this.background.delete(tracked));
  }

  private async audit(
    action: string,
    success: boolean,
    provider: string,
    userId?: string,
    error?: string
  ): Promise<void> {
    await this.auditService?.log({
      source: 'auth:oauth',
      userId,
      action,
      success,
      error,
      metadata: { provider },
    });
  }
}
