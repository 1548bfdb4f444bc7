/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout used by Docker and
 * Kubernetes secret mounts. Preferred over environment variables in
 * production.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  public async resolve(logicalName: string): Promise<string | undefined> {
    // Names are single path segments inside secretDir
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');
      // Files written with echo/heredoc end with a newline
      return secretValue.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR') {
        return undefined;
      }
      throw error;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
