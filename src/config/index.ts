/**
 * Configuration Module - Public API
 */

export { ConfigManager, loadEnvironment, type ConfigManagerOptions } from './manager.js';

export {
  AppConfigSchema,
  ServerConfigSchema,
  DatabaseConfigSchema,
  TokenConfigSchema,
  HashingConfigSchema,
  VerificationConfigSchema,
  OAuthConfigSchema,
  OAuthProviderConfigSchema,
  StorageConfigSchema,
  AuditConfigSchema,
  EnvironmentSchema,
  type AppConfig,
  type ServerConfig,
  type DatabaseConfig,
  type TokenConfig,
  type HashingConfig,
  type VerificationConfig,
  type OAuthConfig,
  type OAuthProviderConfig,
  type StorageConfig,
  type AuditConfig,
  type Environment,
} from './schema.js';

export * from './secrets/index.js';
