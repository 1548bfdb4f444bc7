/**
 * Unit Tests for SecretResolver
 *
 * Providers are in-memory maps; the resolver's only job is walking the
 * document and choosing the first provider that answers.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../../src/core/audit-service.js';
import type { ISecretProvider } from '../../../../src/config/secrets/ISecretProvider.js';
import { SecretResolver } from '../../../../src/config/secrets/SecretResolver.js';

class MapProvider implements ISecretProvider {
  constructor(private readonly values: Record<string, string>) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    return this.values[logicalName];
  }
}

class BrokenProvider implements ISecretProvider {
  async resolve(): Promise<string | undefined> {
    throw new Error('permission denied');
  }
}

describe('SecretResolver', () => {
  it('should replace descriptors in nested objects and arrays', async () => {
    const resolver = new SecretResolver();
    resolver.addProvider(new MapProvider({ TOKEN_SECRET: 'test-secret', DB_PASSWORD: 'test-password' }));
    const config = {
      tokens: { secret: { $secret: 'TOKEN_SECRET' }, issuer: 'reelhub' },
      database: { password: { $secret: 'DB_PASSWORD' }, port: 5432 },
      list: [{ $secret: 'TOKEN_SECRET' }, 'plain'],
    };

    await resolver.resolveSecrets(config);

    expect(config).toEqual({
      tokens: { secret: 'test-secret', issuer: 'reelhub' },
      database: { password: 'test-password', port: 5432 },
      list: ['test-secret', 'plain'],
    });
  });

  it('should prefer the first provider that knows the name', async () => {
    const resolver = new SecretResolver();
    resolver.addProvider(new MapProvider({}));
    resolver.addProvider(new MapProvider({ NAME: 'second' }));
    resolver.addProvider(new MapProvider({ NAME: 'third' }));
    const config = { value: { $secret: 'NAME' } };

    await resolver.resolveSecrets(config);

    expect(config.value).toBe('second');
  });

  it('should skip a failing provider', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const resolver = new SecretResolver();
    resolver.addProvider(new BrokenProvider());
    resolver.addProvider(new MapProvider({ NAME: 'fallback' }));
    const config = { value: { $secret: 'NAME' } };

    await resolver.resolveSecrets(config);

    expect(config.value).toBe('fallback');
  });

  it('should fail fast on an unresolved secret', async () => {
    const resolver = new SecretResolver();
    resolver.addProvider(new MapProvider({}));

    await expect(resolver.resolveSecrets({ tokens: { secret: { $secret: 'MISSING' } } })).rejects.toThrow(
      '[SecretResolver] Secret "MISSING" at path "config.tokens.secret" could not be resolved by any provider.'
    );
  });

  it('should leave unresolved descriptors in place when failFast is off', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const resolver = new SecretResolver({ failFast: false });
    const config = { value: { $secret: 'MISSING' } };

    await resolver.resolveSecrets(config);

    expect(config.value).toEqual({ $secret: 'MISSING' });
  });

  it('should only treat single-key objects with a non-empty name as descriptors', async () => {
    const resolver = new SecretResolver();
    resolver.addProvider(new MapProvider({ NAME: 'resolved' }));
    const config = {
      extra: { $secret: 'NAME', other: 1 },
      numeric: { $secret: 42 },
      empty: { $secret: '' },
    };

    await resolver.resolveSecrets(config);

    expect(config).toEqual({
      extra: { $secret: 'NAME', other: 1 },
      numeric: { $secret: 42 },
      empty: { $secret: '' },
    });
  });

  it('should reject objects that are not providers', () => {
    const resolver = new SecretResolver();
    const notAProvider = { name: 'nope' };

    expect(() => resolver.addProvider(Object.assign(new MapProvider({}), { resolve: notAProvider }))).toThrow(
      'Provider must implement ISecretProvider interface'
    );
  });

  it('should audit each resolution without the value', async () => {
    const storage = new InMemoryAuditStorage();
    const resolver = new SecretResolver({ auditService: new AuditService({ enabled: true, storage }) });
    resolver.addProvider(new MapProvider({ NAME: 'test-secret' }));

    await resolver.resolveSecrets({ value: { $secret: 'NAME' } });

    expect(storage.getEntries()).toEqual([
      expect.objectContaining({
        source: 'config:secrets',
        action: 'resolve:NAME',
        success: true,
        metadata: { secretName: 'NAME', provider: 'MapProvider', configPath: 'config.value' },
      }),
    ]);
    expect(JSON.stringify(storage.getEntries())).not.toContain('test-secret');
  });
});
