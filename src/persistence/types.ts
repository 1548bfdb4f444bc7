/**
 * Persistence contracts
 *
 * Repositories return `null` for "not found" and throw PersistenceError for
 * everything else. Every method takes a QueryContext carrying the
 * request-scoped cancellation signal.
 */

import type { Account, AccountStatus } from '../core/types.js';

export interface QueryContext {
  /** Aborted when the originating request is cancelled */
  signal?: AbortSignal;
}

// ============================================================================
// Accounts
// ============================================================================

export interface NewPasswordAccount {
  email: string;
  username: string;
  passwordHash: string;
}

export interface NewOAuthAccount {
  email: string;
  username: string;
  provider: string;
  providerId: string;
}

export interface ProfileChanges {
  username?: string;
  description?: string;
}

export interface AccountRepository {
  getAccountByUsername(username: string, ctx?: QueryContext): Promise<Account | null>;
  getAccountByEmail(email: string, ctx?: QueryContext): Promise<Account | null>;
  getAccountById(id: string, ctx?: QueryContext): Promise<Account | null>;

  /** Current token version, or null when the account does not exist */
  getTokenVersion(id: string, ctx?: QueryContext): Promise<number | null>;

  /**
   * Atomically increments the token version.
   *
   * @returns the new version, or null when the account does not exist
   */
  incrementTokenVersion(id: string, ctx?: QueryContext): Promise<number | null>;

  /**
   * Increments the token version only while it still equals `expected`.
   *
   * @returns the new version, or null when the account does not exist or
   *          its version has already moved on
   */
  incrementTokenVersionFrom(id: string, expected: number, ctx?: QueryContext): Promise<number | null>;

  /** Creates an `inactive` account awaiting e-mail verification */
  createAccountWithPassword(input: NewPasswordAccount, ctx?: QueryContext): Promise<Account>;

  /** Creates an `active` account bound to an external identity */
  createAccountWithOAuth(input: NewOAuthAccount, ctx?: QueryContext): Promise<Account>;

  isAccountRegistered(provider: string, providerId: string, ctx?: QueryContext): Promise<boolean>;
  loginWithOAuth(provider: string, providerId: string, ctx?: QueryContext): Promise<Account | null>;

  activateAccount(id: string, ctx?: QueryContext): Promise<Account | null>;
  editProfile(id: string, changes: ProfileChanges, ctx?: QueryContext): Promise<Account | null>;

  /** Sets the status and increments the token version in one statement */
  updateStatusAndInvalidate(
    id: string,
    status: AccountStatus,
    ctx?: QueryContext
  ): Promise<Account | null>;

  /** @returns false when the subscription already existed */
  subscribe(subscriberId: string, targetId: string, ctx?: QueryContext): Promise<boolean>;

  /** @returns false when there was no subscription to remove */
  unsubscribe(subscriberId: string, targetId: string, ctx?: QueryContext): Promise<boolean>;
}

// ============================================================================
// Videos
// ============================================================================

export const VIDEO_STATUSES = ['published', 'deleted'] as const;
export type VideoStatus = (typeof VIDEO_STATUSES)[number];

export interface Video {
  id: string;
  title: string;
  duration: number;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
  publisherId: string;
  status: VideoStatus;
}

export interface VideoDetails extends Video {
  totalSubscriber: number;
  totalView: number;
  totalLike: number;
}

export interface NewVideo {
  title: string;
  duration: number;
  description: string | null;
  publisherId: string;
}

export interface VideoRepository {
  createVideo(input: NewVideo, ctx?: QueryContext): Promise<Video>;
  getVideo(id: string, ctx?: QueryContext): Promise<VideoDetails | null>;
}
