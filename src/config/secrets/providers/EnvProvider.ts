/**
 * Environment Variable Secret Provider
 *
 * Reads `process.env[logicalName]`. Use it as the fallback after
 * FileSecretProvider; in development the start script loads `.env` through
 * dotenv before the resolver runs.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
