/**
 * Application Configuration Schema
 *
 * Validated after `{"$secret": "NAME"}` descriptors have been resolved, so
 * every secret field is a plain string by the time zod sees it.
 */

import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
}

/** URL that must use HTTPS outside development/test */
const secureUrl = (label: string) =>
  z
    .string()
    .url()
    .refine((url) => isDevelopment() || url.startsWith('https://'), {
      message: `${label} must use HTTPS (HTTP allowed in development/test)`,
    });

// ============================================================================
// Sections
// ============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  publicUrl: secureUrl('Public URL').describe('Externally visible base URL of the API'),
  corsOrigin: z.string().default('*'),
});

export const DatabaseConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().min(1),
  ssl: z.boolean().default(false),
  maxConnections: z.number().int().min(1).max(100).default(10),
  idleTimeoutMillis: z.number().int().min(0).default(30000),
  connectionTimeoutMillis: z.number().int().min(0).default(5000),
});

export const TokenConfigSchema = z
  .object({
    secret: z.string().min(32).describe('HMAC signing key (at least 32 characters)'),
    issuer: z.string().min(1).default('reelhub'),
    accessTokenTtl: z
      .number()
      .int()
      .positive()
      .default(900)
      .describe('Access token lifetime in seconds'),
    refreshTokenTtl: z
      .number()
      .int()
      .positive()
      .default(7 * 24 * 3600)
      .describe('Refresh token lifetime in seconds'),
    clockTolerance: z
      .number()
      .int()
      .min(0)
      .max(300)
      .default(30)
      .describe('Maximum clock skew tolerance in seconds (max 5 minutes)'),
  })
  .refine((tokens) => tokens.refreshTokenTtl > tokens.accessTokenTtl, {
    message: 'refreshTokenTtl must be longer than accessTokenTtl',
  });

export const HashingConfigSchema = z.object({
  cost: z.number().int().min(4).max(15).default(10).describe('bcrypt cost factor'),
});

export const VerificationConfigSchema = z.object({
  ttlSeconds: z.number().int().positive().default(24 * 3600),
});

export const OAuthProviderConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  scope: z.string().optional(),
});

export const OAuthConfigSchema = z.object({
  redirectUri: secureUrl('OAuth redirect URI'),
  providers: z
    .object({
      github: OAuthProviderConfigSchema.optional(),
      google: OAuthProviderConfigSchema.optional(),
    })
    .default({}),
});

export const StorageConfigSchema = z.object({
  resourcePath: z.string().min(1).default('./resources'),
  assetsPath: z.string().min(1).default('./assets'),
  avatarDownloadRetries: z.number().int().min(1).max(10).default(3),
  avatarDownloadTimeoutMs: z.number().int().min(100).max(60_000).default(10_000),
  avatarMaxBytes: z.number().int().min(1024).default(5 * 1024 * 1024),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  logAllAttempts: z.boolean().default(true),
});

// ============================================================================
// Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  database: DatabaseConfigSchema,
  tokens: TokenConfigSchema,
  hashing: HashingConfigSchema.default({}),
  verification: VerificationConfigSchema.default({}),
  oauth: OAuthConfigSchema,
  storage: StorageConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type HashingConfig = z.infer<typeof HashingConfigSchema>;
export type VerificationConfig = z.infer<typeof VerificationConfigSchema>;
export type OAuthProviderConfig = z.infer<typeof OAuthProviderConfigSchema>;
export type OAuthConfig = z.infer<typeof OAuthConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

/**
 * Environment variables read at startup (besides secrets)
 */
export const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CONFIG_PATH: z.string().optional(),
  SECRETS_PATH: z.string().optional(),
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
