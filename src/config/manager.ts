import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { AppConfigSchema, EnvironmentSchema, type AppConfig, type Environment } from './schema.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';

export interface ConfigManagerOptions {
  /** AuditService for logging secret access */
  auditService?: AuditService;
  /** Directory for file-based secrets (default: SECRETS_PATH or '/run/secrets') */
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate the process environment variables the server reads.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Loads the JSON configuration document, resolves its secret descriptors
 * and validates it.
 *
 * Build one AppConfig at startup and pass it to the components that need
 * it; nothing reads configuration from a global.
 */
export class ConfigManager {
  private config: AppConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly environment: Environment;
  private readonly secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;
    this.environment = loadEnvironment(this.env);

    this.secretResolver = new SecretResolver({
      auditService: options?.auditService,
      failFast: true,
    });

    // Priority order: mounted secret files, then environment (.env in development)
    const secretsDir = options?.secretsDir ?? this.environment.SECRETS_PATH ?? '/run/secrets';
    this.secretResolver.addProvider(new FileSecretProvider(secretsDir));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.environment.CONFIG_PATH ?? './config/reelhub.json';

    try {
      const rawConfig: unknown = JSON.parse(await readFile(path, 'utf-8'));
      return await this.loadFromObject(rawConfig);
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Resolve and validate an already-parsed configuration document.
   */
  async loadFromObject(rawConfig: unknown): Promise<AppConfig> {
    console.log('[ConfigManager] Resolving secrets...');
    await this.secretResolver.resolveSecrets(rawConfig);

    const parsed = AppConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
      throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`);
    }

    this.warnAboutWeakSettings(parsed.data);
    this.config = parsed.data;
    console.log('[ConfigManager] Configuration loaded and validated successfully');
    return parsed.data;
  }

  getEnvironment(): Environment {
    return this.environment;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  private warnAboutWeakSettings(config: AppConfig): void {
    if (config.tokens.accessTokenTtl > 3600) {
      console.warn('[ConfigManager] Access tokens live longer than 1 hour - consider lowering accessTokenTtl');
    }
    if (config.hashing.cost < 10 && this.environment.NODE_ENV === 'production') {
      console.warn('[ConfigManager] bcrypt cost below 10 in production');
    }
    if (!config.oauth.providers.github && !config.oauth.providers.google) {
      console.warn('[ConfigManager] No OAuth providers configured - /oauth2 routes will reject every provider');
    }
  }
}
