import { describe, it, expect, beforeEach } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import type { Account } from '../../../src/core/types.js';
import { AccountService } from '../../../src/services/account-service.js';
import { claimsFor } from '../../helpers/fakes.js';
import { InMemoryAccountRepository } from '../../helpers/in-memory-repositories.js';

describe('AccountService', () => {
  let accounts: InMemoryAccountRepository;
  let storage: InMemoryAuditStorage;
  let service: AccountService;
  let alice: Account;

  beforeEach(() => {
    accounts = new InMemoryAccountRepository();
    storage = new InMemoryAuditStorage();
    service = new AccountService({ accounts, auditService: new AuditService({ enabled: true, storage }) });
    alice = accounts.seed({ username: 'alice', description: 'hello', passwordHash: 'hashed:pw' });
  });

  describe('getProfile', () => {
    it('should return public fields only', async () => {
      await expect(service.getProfile(alice.id)).resolves.toEqual({
        id: alice.id,
        username: 'alice',
        description: 'hello',
        status: 'active',
      });
    });

    it('should return 404 for an unknown account', async () => {
      await expect(service.getProfile('missing')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Account not found',
        statusCode: 404,
      });
    });

    it('should hide accounts that are not active', async () => {
      const pending = accounts.seed({ status: 'inactive' });

      await expect(service.getProfile(pending.id)).rejects.toMatchObject({ code: 'ACCOUNT_NOT_ACTIVE' });
    });
  });

  describe('editProfile', () => {
    it('should update trimmed fields and keep empty ones', async () => {
      const profile = await service.editProfile(claimsFor(alice), alice.id, {
        username: '  alice2 ',
        description: '   ',
      });

      expect(profile).toMatchObject({ username: 'alice2', description: 'hello' });
    });

    it("should refuse to edit someone else's profile", async () => {
      const bob = accounts.seed({ username: 'bob' });

      await expect(service.editProfile(claimsFor(alice), bob.id, { username: 'x' })).rejects.toMatchObject({
        code: 'ACCOUNT_ID_MISMATCH',
        statusCode: 400,
      });
    });

    it('should report a taken username', async () => {
      accounts.seed({ username: 'bob' });

      await expect(service.editProfile(claimsFor(alice), alice.id, { username: 'bob' })).rejects.toMatchObject({
        code: 'USERNAME_TAKEN',
      });
    });
  });

  describe('lock', () => {
    it('should lock the own account and revoke its tokens', async () => {
      const profile = await service.lock(claimsFor(alice), alice.id);

      expect(profile.status).toBe('locked');
      await expect(accounts.getTokenVersion(alice.id)).resolves.toBe(2);
      expect(storage.getEntries()[0]).toMatchObject({
        source: 'account:status',
        action: 'lock',
        success: true,
        metadata: { target: alice.id, tokenVersion: 2 },
      });
    });

    it('should not lock another account', async () => {
      const bob = accounts.seed({ username: 'bob' });

      await expect(service.lock(claimsFor(alice), bob.id)).rejects.toMatchObject({
        code: 'ACCOUNT_ID_MISMATCH',
      });
      await expect(accounts.getTokenVersion(bob.id)).resolves.toBe(1);
    });
  });

  describe('ban', () => {
    it('should let an admin ban an account', async () => {
      const admin = accounts.seed({ username: 'root', role: 'admin' });

      const profile = await service.ban(claimsFor(admin), alice.id);

      expect(profile.status).toBe('banned');
      await expect(accounts.getTokenVersion(alice.id)).resolves.toBe(2);
    });

    it('should refuse non-admins and audit the attempt', async () => {
      const bob = accounts.seed({ username: 'bob' });

      await expect(service.ban(claimsFor(bob), alice.id)).rejects.toMatchObject({
        code: 'INSUFFICIENT_PERMISSIONS',
        statusCode: 403,
      });
      expect(storage.getEntries()).toEqual([
        expect.objectContaining({ action: 'ban', success: false, userId: bob.id }),
      ]);
      await expect(accounts.getTokenVersion(alice.id)).resolves.toBe(1);
    });

    it('should return 404 for an unknown account', async () => {
      const admin = accounts.seed({ username: 'root', role: 'admin' });

      await expect(service.ban(claimsFor(admin), 'missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });
  });
});
