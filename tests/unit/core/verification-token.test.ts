import { describe, it, expect } from 'vitest';
import { TokenCodec } from '../../../src/core/token-codec.js';
import { VerificationTokenCodec } from '../../../src/core/verification-token.js';
import { TEST_SECRET } from '../../helpers/fakes.js';

const T0 = new Date('2026-03-01T12:00:00.000Z');
const ACCOUNT_ID = '0d8e5b4a-31f2-4c55-8d0e-6a1b2c3d4e5f';

function codecAt(now: Date, ttlSeconds = 3600): VerificationTokenCodec {
  return new VerificationTokenCodec({ secret: TEST_SECRET, issuer: 'reelhub', ttlSeconds, now: () => now });
}

describe('VerificationTokenCodec', () => {
  it('should return the account id it was issued for', async () => {
    const token = await codecAt(T0).issue(ACCOUNT_ID);

    await expect(codecAt(T0).parse(token)).resolves.toBe(ACCOUNT_ID);
  });

  it('should report expired tokens distinctly', async () => {
    const token = await codecAt(T0, 60).issue(ACCOUNT_ID);
    const later = new Date(T0.getTime() + 61_000);

    await expect(codecAt(later).parse(token)).rejects.toMatchObject({
      code: 'VERIFICATION_TOKEN_EXPIRED',
      statusCode: 400,
    });
  });

  it('should not accept a bearer token', async () => {
    const bearer = await new TokenCodec({ secret: TEST_SECRET, issuer: 'reelhub', now: () => T0 }).issue(
      ACCOUNT_ID,
      'access',
      1,
      900
    );

    await expect(codecAt(T0).parse(bearer)).rejects.toMatchObject({
      code: 'VERIFICATION_TOKEN_INVALID',
    });
  });

  it('should not be accepted as a bearer token', async () => {
    const token = await codecAt(T0).issue(ACCOUNT_ID);
    const bearerCodec = new TokenCodec({ secret: TEST_SECRET, issuer: 'reelhub', now: () => T0 });

    await expect(bearerCodec.parse(token)).rejects.toMatchObject({ code: 'TOKEN_INVALID_CLAIMS' });
  });

  it('should reject garbage', async () => {
    await expect(codecAt(T0).parse('garbage')).rejects.toMatchObject({
      code: 'VERIFICATION_TOKEN_INVALID',
    });
  });
});
