/**
 * Password Authentication Service
 *
 * Registration with e-mail verification and username/password login.
 * Tokens are minted by the Session Authority; this service only decides
 * whether the credentials and the account state allow it.
 */

import type { AuditService } from './audit-service.js';
import type { PasswordHasher } from './credential-hasher.js';
import type { SessionAuthority } from './session-authority.js';
import type { Account, AccountStatus, AuthenticatedSession } from './types.js';
import type { VerificationTokenCodec } from './verification-token.js';
import type { AccountRepository, QueryContext } from '../persistence/types.js';
import { toApiError, withPersistenceErrors } from '../persistence/errors.js';
import type { Mailer } from '../services/mailer.js';
import type { MediaStorage } from '../services/media-storage.js';
import { ApiError, AuthErrors } from '../utils/errors.js';

export interface RegistrationInput {
  email: string;
  username: string;
  password: string;
}

export interface LoginInput {
  username: string;
  password: string;
}

export interface RegisteredAccount {
  id: string;
  email: string;
  username: string;
  status: AccountStatus;
}

export interface PasswordAuthServiceOptions {
  accounts: AccountRepository;
  hasher: PasswordHasher;
  sessions: SessionAuthority;
  verificationTokens: VerificationTokenCodec;
  mailer: Mailer;
  media: MediaStorage;
  /** Base URL used to build the verification link */
  publicUrl: string;
  auditService?: AuditService;
}

function toRegisteredAccount(account: Account): RegisteredAccount {
  return {
    id: account.id,
    email: account.email,
    username: account.username,
    status: account.status,
  };
}

export class PasswordAuthService {
  private readonly accounts: AccountRepository;
  private readonly hasher: PasswordHasher;
  private readonly sessions: SessionAuthority;
  private readonly verificationTokens: VerificationTokenCodec;
  private readonly mailer: Mailer;
  private readonly media: MediaStorage;
  private readonly publicUrl: string;
  private readonly auditService?: AuditService;

  constructor(options: PasswordAuthServiceOptions) {
    this.accounts = options.accounts;
    this.hasher = options.hasher;
    this.sessions = options.sessions;
    this.verificationTokens = options.verificationTokens;
    this.mailer = options.mailer;
    this.media = options.media;
    this.publicUrl = options.publicUrl.replace(/\/+$/, '');
    this.auditService = options.auditService;
  }

  /**
   * Create an inactive account and mail its verification link.
   *
   * @throws {ApiError} EMAIL_TAKEN, USERNAME_TAKEN, VERIFICATION_EMAIL_FAILED
   */
  async register(input: RegistrationInput, ctx?: QueryContext): Promise<RegisteredAccount> {
    const passwordHash = await this.hasher.hash(input.password);

    let account: Account;
    try {
      account = await this.accounts.createAccountWithPassword(
        { email: input.email, username: input.username, passwordHash },
        ctx
      );
    } catch (error) {
      const apiError = toApiError(error);
      await this.audit('register', false, undefined, apiError.code);
      throw apiError;
    }

    try {
      await this.media.createUserRepo(account.id);
    } catch (error) {
      // The account stays usable with no stored avatar
      console.error('[PasswordAuthService] Failed to create media directory:', {
        accountId: account.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    await this.sendVerification(account);
    await this.audit('register', true, account.id);
    return toRegisteredAccount(account);
  }

  /**
   * Check credentials and issue a token pair.
   *
   * Unknown usernames and wrong passwords produce the same error.
   *
   * @throws {ApiError} INVALID_CREDENTIALS, PASSWORDLESS_ACCOUNT, ACCOUNT_NOT_ACTIVE
   */
  async login(input: LoginInput, ctx?: QueryContext): Promise<AuthenticatedSession> {
    const account = await withPersistenceErrors(() =>
      this.accounts.getAccountByUsername(input.username, ctx)
    );

    if (!account) {
      await this.audit('login', false, undefined, 'INVALID_CREDENTIALS');
      throw AuthErrors.INVALID_CREDENTIALS();
    }

    if (account.passwordHash === null) {
      await this.audit('login', false, account.id, 'PASSWORDLESS_ACCOUNT');
      throw AuthErrors.PASSWORDLESS_ACCOUNT();
    }

    const matches = await this.hasher.verify(account.passwordHash, input.password);
    if (!matches) {
      await this.audit('login', false, account.id, 'INVALID_CREDENTIALS');
      throw AuthErrors.INVALID_CREDENTIALS();
    }

    try {
      const tokens = await this.sessions.issue(account);
      await this.audit('login', true, account.id);
      return {
        id: account.id,
        username: account.username,
        email: account.email,
        avatar: this.media.avatarUrl(account.id),
        ...tokens,
      };
    } catch (error) {
      if (error instanceof ApiError) {
        await this.audit('login', false, account.id, error.code);
      }
      throw error;
    }
  }

  /**
   * Activate the account named by a verification token.
   *
   * @throws {ApiError} VERIFICATION_TOKEN_INVALID, VERIFICATION_TOKEN_EXPIRED,
   *         ACCOUNT_NOT_FOUND, ACCOUNT_ALREADY_VERIFIED
   */
  async verifyEmail(token: string, ctx?: QueryContext): Promise<RegisteredAccount> {
    const accountId = await this.verificationTokens.parse(token);

    const account = await withPersistenceErrors(() => this.accounts.getAccountById(accountId, ctx));
    if (!account) {
      throw AuthErrors.ACCOUNT_NOT_FOUND();
    }
    // Only a pending account may be activated; a banned or locked one stays so
    if (account.status !== 'inactive') {
      throw AuthErrors.ACCOUNT_ALREADY_VERIFIED(account.status);
    }

    const activated = await withPersistenceErrors(() => this.accounts.activateAccount(accountId, ctx));
    if (!activated) {
      throw AuthErrors.ACCOUNT_NOT_FOUND();
    }

    await this.audit('verify-email', true, activated.id);
    return toRegisteredAccount(activated);
  }

  /**
   * @throws {ApiError} ACCOUNT_NOT_FOUND, ACCOUNT_ALREADY_VERIFIED, VERIFICATION_EMAIL_FAILED
   */
  async resendVerification(email: string, ctx?: QueryContext): Promise<void> {
    const account = await withPersistenceErrors(() => this.accounts.getAccountByEmail(email, ctx));
    if (!account) {
      throw AuthErrors.ACCOUNT_NOT_FOUND();
    }
    if (account.status !== 'inactive') {
      throw AuthErrors.ACCOUNT_ALREADY_VERIFIED(account.status);
    }
    await this.sendVerification(account);
  }

  private async sendVerification(account: Account): Promise<void> {
    const token = await this.verificationTokens.issue(account.id);
    const link = `${this.publicUrl}/auth/verification?token=${encodeURIComponent(token)}`;
    try {
      await this.mailer.sendVerificationEmail({
        to: account.email,
        username: account.username,
        link,
      });
    } catch (error) {
      console.error('[PasswordAuthService] Failed to send verification email:', {
        accountId: account.id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw AuthErrors.VERIFICATION_EMAIL_FAILED();
    }
  }

  private async audit(
    action: string,
    success: boolean,
    userId?: string,
    error?: string
  ): Promise<void> {
    await this.auditService?.log({
      source: 'auth:password',
      userId,
      action,
      success,
      error,
    });
  }
}
