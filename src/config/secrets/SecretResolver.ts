/**
 * Secret Resolver
 *
 * Walks a parsed configuration document and replaces every
 * `{"$secret": "NAME"}` descriptor with the value returned by the first
 * provider in the chain that knows NAME.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * await resolver.resolveSecrets(rawConfig); // rawConfig is modified in place
 * ```
 */

import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Receives one entry per resolution attempt (never the secret value) */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is { $secret: string } {
  return (
    isRecord(value) &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0 &&
    Object.keys(value).length === 1
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider to the chain. Order is priority: file mounts first,
   * environment last.
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const item: unknown = node[i];
        if (isSecretDescriptor(item)) {
          const value = await this.resolveDescriptor(item.$secret, `${path}[${i}]`);
          if (value !== undefined) node[i] = value;
        } else {
          await this.resolveNode(item, `${path}[${i}]`);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      const childPath = `${path}.${key}`;
      if (isSecretDescriptor(child)) {
        const value = await this.resolveDescriptor(child.$secret, childPath);
        if (value !== undefined) node[key] = value;
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(logicalName: string, path: string): Promise<string | undefined> {
    const value = await this.resolveSecret(logicalName, path);
    if (value !== undefined) {
      return value;
    }

    const message = `Secret "${logicalName}" at path "${path}" could not be resolved by any provider.`;
    if (this.failFast) {
      throw new Error(`[SecretResolver] ${message}`);
    }
    console.warn(`[SecretResolver] ${message}`);
    return undefined;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          await this.audit(logicalName, path, provider.constructor.name, true);
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.audit(logicalName, path, 'none', false);
    return undefined;
  }

  private async audit(
    logicalName: string,
    path: string,
    provider: string,
    success: boolean
  ): Promise<void> {
    if (!this.auditService) return;
    await this.auditService.log({
      source: 'config:secrets',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success,
      metadata: { secretName: logicalName, provider, configPath: path },
    });
  }
}
