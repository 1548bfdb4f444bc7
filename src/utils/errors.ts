/**
 * API error taxonomy
 *
 * Every failure that can reach a client is an ApiError carrying a stable
 * machine-readable code and the HTTP status it maps to. Handlers throw,
 * the HTTP layer renders `{ error: { code, message } }`.
 */

/** Codes a caller may retry without changing the request */
const RETRYABLE_CODES = new Set(['PERSISTENCE_UNAVAILABLE']);

export class ApiError extends Error {
  public readonly retryable: boolean;

  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.retryable = RETRYABLE_CODES.has(code);

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export function createApiError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): ApiError {
  return new ApiError(code, message, statusCode, details);
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

// ============================================================================
// Token errors
// ============================================================================

export const TokenErrors = {
  EXPIRED: (details?: Record<string, unknown>) =>
    createApiError('TOKEN_EXPIRED', 'Token has expired', 401, details),

  MALFORMED: (details?: Record<string, unknown>) =>
    createApiError('TOKEN_MALFORMED', 'Token is malformed', 400, details),

  BAD_SIGNATURE: (details?: Record<string, unknown>) =>
    createApiError('TOKEN_BAD_SIGNATURE', 'Token signature is invalid', 401, details),

  INVALID_CLAIMS: (details?: Record<string, unknown>) =>
    createApiError('TOKEN_INVALID_CLAIMS', 'Token claims are invalid', 401, details),

  INVALID_KIND: (kind: string) =>
    createApiError('TOKEN_INVALID_KIND', `Unsupported token kind: ${kind}`, 500),

  INVALID_TTL: (ttl: number) =>
    createApiError('TOKEN_INVALID_TTL', `Token lifetime must be a positive integer, got ${ttl}`, 500),

  STALE_VERSION: () =>
    createApiError('TOKEN_STALE_VERSION', 'Token has been revoked', 401),

  WRONG_KIND: (expected: string) =>
    createApiError('TOKEN_WRONG_KIND', `Invalid token type, expected ${expected} token`, 400),

  MISSING_BEARER: () =>
    createApiError('MISSING_BEARER_TOKEN', 'Missing bearer token', 401),
} as const;

// ============================================================================
// Account and credential errors
// ============================================================================

export const AuthErrors = {
  INVALID_CREDENTIALS: () =>
    createApiError('INVALID_CREDENTIALS', 'Invalid username or password', 400),

  PASSWORDLESS_ACCOUNT: () =>
    createApiError(
      'PASSWORDLESS_ACCOUNT',
      'Account does not have a password, please login with OAuth provider',
      400
    ),

  ACCOUNT_NOT_ACTIVE: () => createApiError('ACCOUNT_NOT_ACTIVE', 'Account is not active', 403),

  ACCOUNT_NOT_FOUND: () => createApiError('ACCOUNT_NOT_FOUND', 'Account not found', 400),

  ACCOUNT_ALREADY_VERIFIED: (status: string) =>
    createApiError('ACCOUNT_ALREADY_VERIFIED', `Account is ${status}`, 400),

  ACCOUNT_ID_MISMATCH: () =>
    createApiError('ACCOUNT_ID_MISMATCH', 'Account id does not match the authenticated account', 400),

  EMAIL_TAKEN: () => createApiError('EMAIL_TAKEN', 'Email is already taken', 400),

  USERNAME_TAKEN: () => createApiError('USERNAME_TAKEN', 'Username is already taken', 400),

  INSUFFICIENT_PERMISSIONS: (action: string) =>
    createApiError('INSUFFICIENT_PERMISSIONS', `Insufficient permissions for: ${action}`, 403),

  VERIFICATION_TOKEN_INVALID: () =>
    createApiError('VERIFICATION_TOKEN_INVALID', 'Verification token is invalid', 400),

  VERIFICATION_TOKEN_EXPIRED: () =>
    createApiError('VERIFICATION_TOKEN_EXPIRED', 'Verification token has expired', 400),

  VERIFICATION_EMAIL_FAILED: () =>
    createApiError('VERIFICATION_EMAIL_FAILED', 'Failed to send verification email', 500),
} as const;

// ============================================================================
// Federation errors
// ============================================================================

export const FederationErrors = {
  UNKNOWN_PROVIDER: (provider: string) =>
    createApiError('UNKNOWN_PROVIDER', `Unknown OAuth provider: ${provider}`, 400),

  MISSING_AUTHORIZATION_CODE: () =>
    createApiError('MISSING_AUTHORIZATION_CODE', 'Missing authorization code', 400),

  EXCHANGE_FAILED: (provider: string, status?: number) =>
    createApiError(
      'EXTERNAL_EXCHANGE_FAILED',
      `Failed to exchange authorization code with ${provider}`,
      502,
      status === undefined ? undefined : { upstreamStatus: status }
    ),

  FETCH_FAILED: (provider: string, status?: number) =>
    createApiError(
      'EXTERNAL_FETCH_FAILED',
      `Failed to fetch user profile from ${provider}`,
      502,
      status === undefined ? undefined : { upstreamStatus: status }
    ),
} as const;

// ============================================================================
// Generic errors
// ============================================================================

export const CommonErrors = {
  INVALID_REQUEST: (message: string, details?: Record<string, unknown>) =>
    createApiError('INVALID_REQUEST', message, 400, details),

  NOT_FOUND: (resource: string) => createApiError('NOT_FOUND', `${resource} not found`, 404),

  PERSISTENCE_UNAVAILABLE: (details?: Record<string, unknown>) =>
    createApiError('PERSISTENCE_UNAVAILABLE', 'Service temporarily unavailable', 503, details),

  INTERNAL: () => createApiError('INTERNAL_ERROR', 'Internal server error', 500),

  CONFIGURATION_ERROR: (message: string) =>
    createApiError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof ApiError) {
    return {
      type: 'ApiError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: ApiError): {
  statusCode: number;
  body: { error: { code: string; message: string; details?: Record<string, unknown> } };
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        // Only include details in development
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
