/**
 * Core authentication API
 *
 * Credential hashing, token encoding, the session authority and the
 * password flows. Persistence and HTTP depend on this layer, never the
 * other way round (apart from the repository interfaces).
 */

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage, AuditEvent } from './audit-service.js';

export { CredentialHasher, DEFAULT_BCRYPT_COST } from './credential-hasher.js';
export type { PasswordHasher } from './credential-hasher.js';

export { TokenCodec, isTokenKind, DEFAULT_CLOCK_TOLERANCE } from './token-codec.js';
export type { TokenCodecOptions } from './token-codec.js';

export { VerificationTokenCodec, VERIFICATION_AUDIENCE } from './verification-token.js';
export type { VerificationTokenOptions } from './verification-token.js';

export { SessionAuthority } from './session-authority.js';
export type { SessionAuthorityOptions } from './session-authority.js';

export { PasswordAuthService } from './password-auth-service.js';
export type {
  LoginInput,
  PasswordAuthServiceOptions,
  RegisteredAccount,
  RegistrationInput,
} from './password-auth-service.js';

export * from './types.js';
