export type {
  AccountRepository,
  NewOAuthAccount,
  NewPasswordAccount,
  NewVideo,
  ProfileChanges,
  QueryContext,
  Video,
  VideoDetails,
  VideoRepository,
  VideoStatus,
} from './types.js';
export { VIDEO_STATUSES } from './types.js';
export { PersistenceError, classifyDriverError, toApiError, withPersistenceErrors } from './errors.js';
export type { PersistenceErrorKind } from './errors.js';
export { createPool, runQuery, isUuid } from './postgres.js';
export type { PgPool } from './postgres.js';
export { PostgresAccountRepository } from './postgres-account-repository.js';
export { PostgresVideoRepository } from './postgres-video-repository.js';
