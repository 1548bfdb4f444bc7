/**
 * Persistence error classification
 *
 * Raw driver errors are wrapped into PersistenceError as they leave a
 * repository. Services translate them to ApiErrors with
 * `toApiError`, which knows the named unique constraints of the schema.
 */

import { ApiError, AuthErrors, CommonErrors, createApiError } from '../utils/errors.js';

export type PersistenceErrorKind =
  | 'unique_violation'
  | 'foreign_key_violation'
  | 'invalid_input'
  | 'aborted'
  | 'unavailable';

export class PersistenceError extends Error {
  constructor(
    public kind: PersistenceErrorKind,
    message: string,
    public constraint?: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/** PostgreSQL SQLSTATE codes we classify */
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_STRING_TOO_LONG = '22001';
const PG_CHECK_VIOLATION = '23514';

interface DriverErrorFields {
  code?: unknown;
  constraint?: unknown;
  message?: unknown;
}

function readDriverFields(error: unknown): DriverErrorFields {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const fields: DriverErrorFields = {};
  if ('code' in error) fields.code = error.code;
  if ('constraint' in error) fields.constraint = error.constraint;
  if ('message' in error) fields.message = error.message;
  return fields;
}

/**
 * Wrap a driver error.
 *
 * The constraint name is taken from the driver's `constraint` field, or
 * recovered from the message text (`... violates unique constraint "name"`).
 */
export function classifyDriverError(error: unknown): PersistenceError {
  if (error instanceof PersistenceError) {
    return error;
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new PersistenceError('aborted', 'Query cancelled', undefined, error);
  }

  const { code, constraint, message } = readDriverFields(error);
  const text = typeof message === 'string' ? message : 'Unknown persistence failure';
  const constraintName =
    typeof constraint === 'string' ? constraint : /constraint "([^"]+)"/.exec(text)?.[1];

  if (code === PG_UNIQUE_VIOLATION) {
    return new PersistenceError('unique_violation', text, constraintName, error);
  }
  if (code === PG_FOREIGN_KEY_VIOLATION) {
    return new PersistenceError('foreign_key_violation', text, constraintName, error);
  }
  if (code === PG_STRING_TOO_LONG || code === PG_CHECK_VIOLATION) {
    return new PersistenceError('invalid_input', text, constraintName, error);
  }
  return new PersistenceError('unavailable', text, constraintName, error);
}

const UNIQUE_CONSTRAINT_ERRORS: Record<string, () => ApiError> = {
  account_email_key: AuthErrors.EMAIL_TAKEN,
  account_username_key: AuthErrors.USERNAME_TAKEN,
  account_oauth_identity_key: () =>
    createApiError('OAUTH_IDENTITY_TAKEN', 'External identity is already linked', 400),
  video_title_key: () => createApiError('TITLE_TAKEN', 'Video title is already taken', 400),
};

/**
 * Translate any error thrown by a repository into an ApiError.
 *
 * ApiErrors pass through untouched. Unknown unique violations and all
 * infrastructure failures become PERSISTENCE_UNAVAILABLE.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  const persistenceError = classifyDriverError(error);
  if (persistenceError.kind === 'unique_violation' && persistenceError.constraint) {
    const mapped = UNIQUE_CONSTRAINT_ERRORS[persistenceError.constraint];
    if (mapped) {
      return mapped();
    }
  }
  if (persistenceError.kind === 'foreign_key_violation') {
    return CommonErrors.NOT_FOUND('Referenced account');
  }
  if (persistenceError.kind === 'invalid_input') {
    return CommonErrors.INVALID_REQUEST('Value rejected by storage constraints');
  }

  console.error('[Persistence] Query failed:', {
    kind: persistenceError.kind,
    constraint: persistenceError.constraint,
    message: persistenceError.message,
  });
  return CommonErrors.PERSISTENCE_UNAVAILABLE({ kind: persistenceError.kind });
}

/** Run a repository call, translating its failures with `toApiError` */
export async function withPersistenceErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toApiError(error);
  }
}
