/**
 * Media Storage - per-account resource directories on local disk
 *
 * Layout: `{resourcePath}/{accountId}/avatar.png` and `cover.png`, seeded
 * from the default images in `{assetsPath}` when the account is created.
 */

import { promises as fs } from 'fs';
import * as path from 'path';

export interface MediaStorage {
  /** Create the account's directory with the default avatar and cover */
  createUserRepo(accountId: string): Promise<void>;

  /** Replace the account's avatar with the image at `url` */
  downloadAvatar(accountId: string, url: string): Promise<void>;

  /** Public URL of the account's avatar */
  avatarUrl(accountId: string): string;
}

export interface LocalMediaStorageOptions {
  resourcePath: string;
  assetsPath: string;
  /** Base URL the resources directory is served under */
  publicUrl: string;
  /** Attempts per avatar download (default: 3) */
  retries?: number;
  /** Delay before the second attempt, doubled for each later one (default: 500ms) */
  retryDelayMs?: number;
  /** Per-attempt time limit for an avatar download (default: 10s) */
  timeoutMs?: number;
  /** Largest avatar accepted (default: 5 MiB) */
  maxBytes?: number;
}

const DEFAULT_IMAGES = ['avatar.png', 'cover.png'] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class LocalMediaStorage implements MediaStorage {
  private readonly resourcePath: string;
  private readonly assetsPath: string;
  private readonly publicUrl: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxBytes: number;

  constructor(options: LocalMediaStorageOptions) {
    this.resourcePath = path.resolve(options.resourcePath);
    this.assetsPath = path.resolve(options.assetsPath);
    this.publicUrl = options.publicUrl.replace(/\/+$/, '');
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxBytes = options.maxBytes ?? 5 * 1024 * 1024;
  }

  private accountDir(accountId: string): string {
    const dir = path.resolve(this.resourcePath, accountId);
    if (!dir.startsWith(this.resourcePath + path.sep)) {
      throw new Error(`Invalid account id for storage: ${accountId}`);
    }
    return dir;
  }

  async createUserRepo(accountId: string): Promise<void> {
    const dir = this.accountDir(accountId);
    await fs.mkdir(dir, { recursive: true });
    for (const image of DEFAULT_IMAGES) {
      await fs.copyFile(path.join(this.assetsPath, image), path.join(dir, image));
    }
  }

  async downloadAvatar(accountId: string, url: string): Promise<void> {
    const target = path.join(this.accountDir(accountId), 'avatar.png');
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
          throw new Error(`Avatar download failed with status ${response.status}`);
        }
        const image = await this.readLimited(response);
        await fs.writeFile(target, image);
        return;
      } catch (error) {
        lastError = error;
        console.warn(
          `[MediaStorage] Avatar download attempt ${attempt}/${this.retries} failed for ${accountId}:`,
          error instanceof Error ? error.message : error
        );
        if (attempt < this.retries) {
          await sleep(this.retryDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Avatar download failed');
  }

  /**
   * Read the body, giving up as soon as it passes maxBytes.
   */
  private async readLimited(response: Response): Promise<Buffer> {
    const tooLarge = () => new Error(`Avatar exceeds ${this.maxBytes} bytes`);

    const declared = Number(response.headers.get('content-length'));
    if (declared > this.maxBytes) {
      await response.body?.cancel();
      throw tooLarge();
    }
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > this.maxBytes) {
        await reader.cancel();
        throw tooLarge();
      }
      chunks.push(value);
    }
    return Buffer.concat(chunks);
  }

  avatarUrl(accountId: string): string {
    return `${this.publicUrl}/resources/${accountId}/avatar.png`;
  }
}
