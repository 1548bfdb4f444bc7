/**
 * PasswordAuthService Tests
 *
 * Registration, e-mail verification and password login against in-memory
 * repositories.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { PasswordAuthService } from '../../../src/core/password-auth-service.js';
import { SessionAuthority } from '../../../src/core/session-authority.js';
import { TokenCodec } from '../../../src/core/token-codec.js';
import { VerificationTokenCodec } from '../../../src/core/verification-token.js';
import {
  FakeHasher,
  FakeMediaStorage,
  PUBLIC_URL,
  RecordingMailer,
  TEST_SECRET,
} from '../../helpers/fakes.js';
import { InMemoryAccountRepository } from '../../helpers/in-memory-repositories.js';

describe('PasswordAuthService', () => {
  let accounts: InMemoryAccountRepository;
  let mailer: RecordingMailer;
  let media: FakeMediaStorage;
  let storage: InMemoryAuditStorage;
  let sessions: SessionAuthority;
  let service: PasswordAuthService;

  beforeEach(() => {
    accounts = new InMemoryAccountRepository();
    mailer = new RecordingMailer();
    media = new FakeMediaStorage();
    storage = new InMemoryAuditStorage();
    const auditService = new AuditService({ enabled: true, storage });
    sessions = new SessionAuthority({
      codec: new TokenCodec({ secret: TEST_SECRET, issuer: 'reelhub' }),
      accounts,
      accessTokenTtl: 900,
      refreshTokenTtl: 3600,
    });
    service = new PasswordAuthService({
      accounts,
      hasher: new FakeHasher(),
      sessions,
      verificationTokens: new VerificationTokenCodec({ secret: TEST_SECRET, issuer: 'reelhub' }),
      mailer,
      media,
      publicUrl: `${PUBLIC_URL}/`,
      auditService,
    });
  });

  describe('register', () => {
    it('should create an inactive account with a hashed password', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });

      expect(registered).toEqual({
        id: expect.any(String),
        email: 'a@x.com',
        username: 'a',
        status: 'inactive',
      });
      const stored = await accounts.getAccountById(registered.id);
      expect(stored?.passwordHash).toBe('hashed:pw');
      expect(stored?.tokenVersion).toBe(1);
    });

    it('should mail a verification link and create the media directory', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });

      expect(media.repos).toEqual([registered.id]);
      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0]).toMatchObject({ to: 'a@x.com', username: 'a' });
      expect(mailer.sent[0]?.link.startsWith(`${PUBLIC_URL}/auth/verification?token=`)).toBe(true);
    });

    it('should still register when the media directory cannot be created', async () => {
      media.failCreate = true;
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await expect(
        service.register({ email: 'a@x.com', username: 'a', password: 'pw' })
      ).resolves.toMatchObject({ status: 'inactive' });
    });

    it('should report a taken email as a 400', async () => {
      accounts.seed({ email: 'a@x.com', username: 'someone' });

      await expect(
        service.register({ email: 'a@x.com', username: 'a', password: 'pw' })
      ).rejects.toMatchObject({ code: 'EMAIL_TAKEN', statusCode: 400, message: 'Email is already taken' });
      expect(storage.getEntries()).toEqual([
        expect.objectContaining({ source: 'auth:password', action: 'register', success: false, error: 'EMAIL_TAKEN' }),
      ]);
    });

    it('should report a taken username as a 400', async () => {
      accounts.seed({ email: 'b@x.com', username: 'a' });

      await expect(
        service.register({ email: 'a@x.com', username: 'a', password: 'pw' })
      ).rejects.toMatchObject({ code: 'USERNAME_TAKEN', statusCode: 400 });
    });

    it('should fail when the verification mail cannot be sent', async () => {
      mailer.failWith = new Error('smtp down');
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await expect(
        service.register({ email: 'a@x.com', username: 'a', password: 'pw' })
      ).rejects.toMatchObject({ code: 'VERIFICATION_EMAIL_FAILED', statusCode: 500 });
    });
  });

  describe('login', () => {
    it('should refuse an unverified account with 403', async () => {
      await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });

      await expect(service.login({ username: 'a', password: 'pw' })).rejects.toMatchObject({
        code: 'ACCOUNT_NOT_ACTIVE',
        statusCode: 403,
        message: 'Account is not active',
      });
    });

    it('should issue tokens once the account is verified', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });
      await service.verifyEmail(mailer.lastToken());

      const session = await service.login({ username: 'a', password: 'pw' });

      expect(session).toMatchObject({
        id: registered.id,
        username: 'a',
        email: 'a@x.com',
        avatar: `${PUBLIC_URL}/resources/${registered.id}/avatar.png`,
      });
      await expect(sessions.verify(session.accessToken, 'access')).resolves.toMatchObject({
        subject: registered.id,
        version: 1,
      });
      await expect(sessions.verify(session.refreshToken, 'refresh')).resolves.toMatchObject({
        kind: 'refresh',
      });
    });

    it('should give the same answer for an unknown user and a wrong password', async () => {
      accounts.seed({ username: 'a', passwordHash: 'hashed:pw' });

      const unknown = service.login({ username: 'nobody', password: 'pw' });
      const wrong = service.login({ username: 'a', password: 'nope' });

      await expect(unknown).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid username or password',
        statusCode: 400,
      });
      await expect(wrong).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid username or password',
        statusCode: 400,
      });
    });

    it('should check the password before revealing the account status', async () => {
      accounts.seed({ username: 'a', passwordHash: 'hashed:pw', status: 'banned' });

      await expect(service.login({ username: 'a', password: 'nope' })).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
      });
      await expect(service.login({ username: 'a', password: 'pw' })).rejects.toMatchObject({
        code: 'ACCOUNT_NOT_ACTIVE',
      });
    });

    it('should point OAuth-only accounts at their provider', async () => {
      accounts.seed({ username: 'gh', oauthProvider: 'github', oauthProviderId: '42' });

      await expect(service.login({ username: 'gh', password: 'pw' })).rejects.toMatchObject({
        code: 'PASSWORDLESS_ACCOUNT',
        statusCode: 400,
      });
    });

    it('should audit failed logins', async () => {
      await expect(service.login({ username: 'nobody', password: 'pw' })).rejects.toThrow();

      expect(storage.getEntries()).toEqual([
        expect.objectContaining({ action: 'login', success: false, error: 'INVALID_CREDENTIALS' }),
      ]);
    });
  });

  describe('verifyEmail', () => {
    it('should activate the account', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });

      await expect(service.verifyEmail(mailer.lastToken())).resolves.toEqual({
        id: registered.id,
        email: 'a@x.com',
        username: 'a',
        status: 'active',
      });
    });

    it('should refuse to verify twice', async () => {
      await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });
      const token = mailer.lastToken();
      await service.verifyEmail(token);

      await expect(service.verifyEmail(token)).rejects.toMatchObject({
        code: 'ACCOUNT_ALREADY_VERIFIED',
        message: 'Account is active',
      });
    });

    it('should not reactivate a banned account', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });
      await accounts.updateStatusAndInvalidate(registered.id, 'banned');

      await expect(service.verifyEmail(mailer.lastToken())).rejects.toMatchObject({
        code: 'ACCOUNT_ALREADY_VERIFIED',
        message: 'Account is banned',
      });
    });

    it('should reject an invalid token', async () => {
      await expect(service.verifyEmail('bogus')).rejects.toMatchObject({
        code: 'VERIFICATION_TOKEN_INVALID',
      });
    });

    it('should report a token for a deleted account', async () => {
      const registered = await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });
      accounts.accounts.delete(registered.id);

      await expect(service.verifyEmail(mailer.lastToken())).rejects.toMatchObject({
        code: 'ACCOUNT_NOT_FOUND',
      });
    });
  });

  describe('resendVerification', () => {
    it('should send a fresh link to a pending account', async () => {
      await service.register({ email: 'a@x.com', username: 'a', password: 'pw' });

      await service.resendVerification('a@x.com');

      expect(mailer.sent).toHaveLength(2);
      expect(mailer.sent[1]?.to).toBe('a@x.com');
    });

    it('should refuse an unknown email', async () => {
      await expect(service.resendVerification('nobody@x.com')).rejects.toMatchObject({
        code: 'ACCOUNT_NOT_FOUND',
      });
    });

    it('should refuse an active account', async () => {
      accounts.seed({ email: 'a@x.com' });

      await expect(service.resendVerification('a@x.com')).rejects.toMatchObject({
        code: 'ACCOUNT_ALREADY_VERIFIED',
      });
      expect(mailer.sent).toHaveLength(0);
    });
  });
});
