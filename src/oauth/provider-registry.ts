/**
 * Provider Registry
 *
 * Maps the provider tag carried in the OAuth `state` parameter to a
 * provider instance. Built once from configuration.
 */

import type { OAuthConfig } from '../config/schema.js';
import { FederationErrors } from '../utils/errors.js';
import { GitHubProvider } from './providers/github-provider.js';
import { GoogleProvider } from './providers/google-provider.js';
import type { OAuthProvider } from './providers/types.js';

export class ProviderRegistry {
  private readonly providers = new Map<string, OAuthProvider>();

  constructor(providers: OAuthProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  register(provider: OAuthProvider): void {
    if (this.providers.has(provider.name)) {
      throw new Error(`OAuth provider already registered: ${provider.name}`);
    }
    this.providers.set(provider.name, provider);
  }

  /** @throws {ApiError} UNKNOWN_PROVIDER */
  get(name: string): OAuthProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw FederationErrors.UNKNOWN_PROVIDER(name);
    }
    return provider;
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

export function createProviderRegistry(config: OAuthConfig): ProviderRegistry {
  const registry = new ProviderRegistry();
  const { github, google } = config.providers;

  if (github) {
    registry.register(new GitHubProvider({ ...github, redirectUri: config.redirectUri }));
  }
  if (google) {
    registry.register(new GoogleProvider({ ...google, redirectUri: config.redirectUri }));
  }

  console.log(`[ProviderRegistry] OAuth providers: ${registry.names().join(', ') || '(none)'}`);
  return registry;
}
