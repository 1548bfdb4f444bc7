/**
 * PostgreSQL Account Repository
 *
 * Parameterized queries only. The token version is changed exclusively by
 * single-statement `token_version = token_version + 1` updates so that
 * concurrent invalidations never lose an increment.
 */

import { ACCOUNT_ROLES, ACCOUNT_STATUSES } from '../core/types.js';
import type { Account, AccountRole, AccountStatus } from '../core/types.js';
import { PersistenceError } from './errors.js';
import { isUuid, runQuery, type PgPool } from './postgres.js';
import type {
  AccountRepository,
  NewOAuthAccount,
  NewPasswordAccount,
  ProfileChanges,
  QueryContext,
} from './types.js';

type AccountRow = {
  account_id: string;
  email: string;
  username: string;
  password: string | null;
  description: string | null;
  status: string;
  role: string;
  oauth_provider: string | null;
  oauth_provider_id: string | null;
  token_version: number;
};

const ACCOUNT_COLUMNS = `account_id, email, username, password, description, status, role,
  oauth_provider, oauth_provider_id, token_version`;

function parseStatus(value: string): AccountStatus {
  const status = ACCOUNT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new PersistenceError('unavailable', `Unexpected account status: ${value}`);
  }
  return status;
}

function parseRole(value: string): AccountRole {
  return ACCOUNT_ROLES.find((candidate) => candidate === value) ?? 'user';
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.account_id,
    email: row.email,
    username: row.username,
    passwordHash: row.password,
    description: row.description,
    status: parseStatus(row.status),
    role: parseRole(row.role),
    oauthProvider: row.oauth_provider,
    oauthProviderId: row.oauth_provider_id,
    tokenVersion: row.token_version,
  };
}

export class PostgresAccountRepository implements AccountRepository {
  constructor(private readonly pool: PgPool) {}

  private async one(text: string, values: unknown[], ctx?: QueryContext): Promise<Account | null> {
    const result = await runQuery<AccountRow>(this.pool, text, values, ctx);
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  }

  async getAccountByUsername(username: string, ctx?: QueryContext): Promise<Account | null> {
    return this.one(`SELECT ${ACCOUNT_COLUMNS} FROM account WHERE username = $1`, [username], ctx);
  }

  async getAccountByEmail(email: string, ctx?: QueryContext): Promise<Account | null> {
    return this.one(`SELECT ${ACCOUNT_COLUMNS} FROM account WHERE email = $1`, [email], ctx);
  }

  async getAccountById(id: string, ctx?: QueryContext): Promise<Account | null> {
    if (!isUuid(id)) return null;
    return this.one(`SELECT ${ACCOUNT_COLUMNS} FROM account WHERE account_id = $1`, [id], ctx);
  }

  async getTokenVersion(id: string, ctx?: QueryContext): Promise<number | null> {
    if (!isUuid(id)) return null;
    const result = await runQuery<{ token_version: number }>(
      this.pool,
      'SELECT token_version FROM account WHERE account_id = $1',
      [id],
      ctx
    );
    return result.rows[0]?.token_version ?? null;
  }

  async incrementTokenVersion(id: string, ctx?: QueryContext): Promise<number | null> {
    if (!isUuid(id)) return null;
    const result = await runQuery<{ token_version: number }>(
      this.pool,
      `UPDATE account SET token_version = token_version + 1
       WHERE account_id = $1
       RETURNING token_version`,
      [id],
      ctx
    );
    return result.rows[0]?.token_version ?? null;
  }

  async incrementTokenVersionFrom(
    id: string,
    expected: number,
    ctx?: QueryContext
  ): Promise<number | null> {
    if (!isUuid(id)) return null;
    const result = await runQuery<{ token_version: number }>(
      this.pool,
      `UPDATE account SET token_version = token_version + 1
       WHERE account_id = $1 AND token_version = $2
       RETURNING token_version`,
      [id, expected],
      ctx
    );
    return result.rows[0]?.token_version ?? null;
  }

  async createAccountWithPassword(input: NewPasswordAccount, ctx?: QueryContext): Promise<Account> {
    const account = await this.one(
      `INSERT INTO account (email, username, password, status)
       VALUES ($1, $2, $3, 'inactive')
       RETURNING ${ACCOUNT_COLUMNS}`,
      [input.email, input.username, input.passwordHash],
      ctx
    );
    if (!account) {
      throw new PersistenceError('unavailable', 'Insert returned no row');
    }
    return account;
  }

  async createAccountWithOAuth(input: NewOAuthAccount, ctx?: QueryContext): Promise<Account> {
    const account = await this.one(
      `INSERT INTO account (email, username, status, oauth_provider, oauth_provider_id)
       VALUES ($1, $2, 'active', $3, $4)
       RETURNING ${ACCOUNT_COLUMNS}`,
      [input.email, input.username, input.provider, input.providerId],
      ctx
    );
    if (!account) {
      throw new PersistenceError('unavailable', 'Insert returned no row');
    }
    return account;
  }

  async isAccountRegistered(
    provider: string,
    providerId: string,
    ctx?: QueryContext
  ): Promise<boolean> {
    const result = await runQuery<{ registered: boolean }>(
      this.pool,
      `SELECT EXISTS (
         SELECT 1 FROM account WHERE oauth_provider = $1 AND oauth_provider_id = $2
       ) AS registered`,
      [provider, providerId],
      ctx
    );
    return result.rows[0]?.registered ?? false;
  }

  async loginWithOAuth(
    provider: string,
    providerId: string,
    ctx?: QueryContext
  ): Promise<Account | null> {
    return this.one(
      `SELECT ${ACCOUNT_COLUMNS} FROM account WHERE oauth_provider = $1 AND oauth_provider_id = $2`,
      [provider, providerId],
      ctx
    );
  }

  async activateAccount(id: string, ctx?: QueryContext): Promise<Account | null> {
    if (!isUuid(id)) return null;
    return this.one(
      `UPDATE account SET status = 'active'
       WHERE account_id = $1
       RETURNING ${ACCOUNT_COLUMNS}`,
      [id],
      ctx
    );
  }

  async editProfile(id: string, changes: ProfileChanges, ctx?: QueryContext): Promise<Account | null> {
    if (!isUuid(id)) return null;
    // Absent fields keep their stored value
    return this.one(
      `UPDATE account
       SET username = COALESCE($2, username),
           description = COALESCE($3, description)
       WHERE account_id = $1
       RETURNING ${ACCOUNT_COLUMNS}`,
      [id, changes.username ?? null, changes.description ?? null],
      ctx
    );
  }

  async updateStatusAndInvalidate(
    id: string,
    status: AccountStatus,
    ctx?: QueryContext
  ): Promise<Account | null> {
    if (!isUuid(id)) return null;
    return this.one(
      `UPDATE account
       SET status = $2, token_version = token_version + 1
       WHERE account_id = $1
       RETURNING ${ACCOUNT_COLUMNS}`,
      [id, status],
      ctx
    );
  }

  async subscribe(subscriberId: string, targetId: string, ctx?: QueryContext): Promise<boolean> {
    const result = await runQuery(
      this.pool,
      `INSERT INTO subscribe (subscriber_id, subscribe_to_id)
       VALUES ($1, $2)
       ON CONFLICT DO NOTHING`,
      [subscriberId, targetId],
      ctx
    );
    return (result.rowCount ?? 0) > 0;
  }

  async unsubscribe(subscriberId: string, targetId: string, ctx?: QueryContext): Promise<boolean> {
    const result = await runQuery(
      this.pool,
      'DELETE FROM subscribe WHERE subscriber_id = $1 AND subscribe_to_id = $2',
      [subscriberId, targetId],
      ctx
    );
    return (result.rowCount ?? 0) > 0;
  }
}
