/**
 * Audit Service - write-only trail of authentication events
 *
 * Null Object pattern: a service constructed without configuration is
 * disabled and every `log` call is a no-op, so components never need to
 * check whether auditing is on.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Record successful events too, not only failures (default: true) */
  logAllAttempts?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Invoked with every buffered entry when in-memory storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage for audit entries. Write-only: querying belongs to whatever
 * indexed store the entries are shipped to.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

/** Entry as passed by callers; the timestamp is filled in when absent */
export type AuditEvent = Omit<AuditEntry, 'timestamp'> & { timestamp?: Date };

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /** @internal test inspection only */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

export class AuditService {
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;
    this.storage = config?.storage ?? new InMemoryAuditStorage(10000, config?.onOverflow);
  }

  /**
   * Record an event.
   *
   * Storage failures are reported on the console and never propagate: an
   * unavailable audit sink must not fail a login.
   */
  async log(event: AuditEvent): Promise<void> {
    if (!this.enabled) {
      return;
    }
    if (event.success && !this.logAllAttempts) {
      return;
    }
    if (!event.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    const entry: AuditEntry = { ...event, timestamp: event.timestamp ?? new Date() };
    try {
      await this.storage.log(entry);
    } catch (error) {
      console.error('[AuditService] Failed to store audit entry:', {
        source: entry.source,
        action: entry.action,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
