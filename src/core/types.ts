/**
 * Core Types
 *
 * Shared domain types for the authentication and session core. The HTTP
 * layer, the federation broker and the persistence layer all depend on
 * this module; it depends on nothing but the persistence contracts.
 */

import type { AccountRepository, VideoRepository } from '../persistence/types.js';

// ============================================================================
// Accounts
// ============================================================================

export const ACCOUNT_STATUSES = ['inactive', 'active', 'banned', 'locked'] as const;
export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

export const ACCOUNT_ROLES = ['user', 'admin'] as const;
export type AccountRole = (typeof ACCOUNT_ROLES)[number];

/**
 * Persisted account record.
 *
 * Exactly one of `passwordHash` or the OAuth identity pair is set for a
 * fully-created account.
 */
export interface Account {
  id: string;
  email: string;
  username: string;
  passwordHash: string | null;
  description: string | null;
  status: AccountStatus;
  role: AccountRole;
  oauthProvider: string | null;
  oauthProviderId: string | null;
  /** Monotonic revocation counter. Starts at 1, only ever incremented. */
  tokenVersion: number;
}

/** Account fields safe to return to any caller */
export interface PublicProfile {
  id: string;
  username: string;
  description: string | null;
  status: AccountStatus;
}

// ============================================================================
// Tokens
// ============================================================================

export const TOKEN_KINDS = ['access', 'refresh'] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number];

/** Claims carried by a bearer token after signature verification */
export interface TokenClaims {
  /** Account id */
  subject: string;
  role: AccountRole;
  kind: TokenKind;
  version: number;
  issuer: string;
  issuedAt: number;
  expiresAt: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Which token kind an endpoint accepts.
 *
 * The refresh endpoint accepts only refresh tokens; every other
 * authenticated endpoint accepts only access tokens.
 */
export type KindPolicy = 'access' | 'refresh';

/** Result of a successful login, registration callback or OAuth callback */
export interface AuthenticatedSession extends TokenPair {
  id: string;
  username: string;
  email: string;
  avatar: string;
}

// ============================================================================
// Federation
// ============================================================================

/** Identity returned by an external OAuth provider (never persisted as-is) */
export interface ExternalIdentity {
  id: string;
  username: string;
  avatarUrl: string;
  email: string;
}

// ============================================================================
// Audit
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track the origin of the
 * entry (e.g. 'auth:password', 'auth:oauth', 'auth:session').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Account ID associated with the event (if applicable) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error code if the action failed */
  error?: string;

  metadata?: Record<string, unknown>;
}

// ============================================================================
// Context
// ============================================================================

/**
 * Repositories shared by every service.
 */
export interface Repositories {
  accounts: AccountRepository;
  videos: VideoRepository;
}
