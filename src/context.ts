/**
 * Core context - the wired component graph
 *
 * Built once at startup from the validated AppConfig. Components receive
 * the configuration slices they need through their constructors.
 */

import type { AppConfig } from './config/schema.js';
import { AuditService } from './core/audit-service.js';
import { CredentialHasher, type PasswordHasher } from './core/credential-hasher.js';
import { PasswordAuthService } from './core/password-auth-service.js';
import { SessionAuthority } from './core/session-authority.js';
import { TokenCodec } from './core/token-codec.js';
import type { Repositories } from './core/types.js';
import { VerificationTokenCodec } from './core/verification-token.js';
import { FederationBroker } from './oauth/federation-broker.js';
import { createProviderRegistry, type ProviderRegistry } from './oauth/provider-registry.js';
import { AccountService } from './services/account-service.js';
import { LogMailer, type Mailer } from './services/mailer.js';
import { LocalMediaStorage, type MediaStorage } from './services/media-storage.js';
import { SubscriptionService } from './services/subscription-service.js';
import { VideoService } from './services/video-service.js';

export interface CoreContext {
  config: AppConfig;
  auditService: AuditService;
  sessions: SessionAuthority;
  passwordAuth: PasswordAuthService;
  federation: FederationBroker;
  accounts: AccountService;
  subscriptions: SubscriptionService;
  videos: VideoService;
}

/**
 * Collaborators that talk to the outside world. Tests replace them with
 * in-process fakes.
 */
export interface CoreDependencies {
  repositories: Repositories;
  mailer?: Mailer;
  media?: MediaStorage;
  hasher?: PasswordHasher;
  registry?: ProviderRegistry;
  auditService?: AuditService;
  /** Clock for token timestamps */
  now?: () => Date;
}

export function createCoreContext(config: AppConfig, deps: CoreDependencies): CoreContext {
  const { accounts, videos } = deps.repositories;

  const auditService =
    deps.auditService ??
    new AuditService({
      enabled: config.audit.enabled,
      logAllAttempts: config.audit.logAllAttempts,
    });

  const codec = new TokenCodec({
    secret: config.tokens.secret,
    issuer: config.tokens.issuer,
    clockTolerance: config.tokens.clockTolerance,
    now: deps.now,
  });

  const sessions = new SessionAuthority({
    codec,
    accounts,
    accessTokenTtl: config.tokens.accessTokenTtl,
    refreshTokenTtl: config.tokens.refreshTokenTtl,
    auditService,
  });

  const media =
    deps.media ??
    new LocalMediaStorage({
      resourcePath: config.storage.resourcePath,
      assetsPath: config.storage.assetsPath,
      publicUrl: config.server.publicUrl,
      retries: config.storage.avatarDownloadRetries,
      timeoutMs: config.storage.avatarDownloadTimeoutMs,
      maxBytes: config.storage.avatarMaxBytes,
    });

  const passwordAuth = new PasswordAuthService({
    accounts,
    hasher: deps.hasher ?? new CredentialHasher(config.hashing.cost),
    sessions,
    verificationTokens: new VerificationTokenCodec({
      secret: config.tokens.secret,
      issuer: config.tokens.issuer,
      ttlSeconds: config.verification.ttlSeconds,
      now: deps.now,
    }),
    mailer: deps.mailer ?? new LogMailer(),
    media,
    publicUrl: config.server.publicUrl,
    auditService,
  });

  const federation = new FederationBroker({
    registry: deps.registry ?? createProviderRegistry(config.oauth),
    accounts,
    sessions,
    media,
    auditService,
  });

  return {
    config,
    auditService,
    sessions,
    passwordAuth,
    federation,
    accounts: new AccountService({ accounts, auditService }),
    subscriptions: new SubscriptionService(accounts),
    videos: new VideoService(videos),
  };
}
