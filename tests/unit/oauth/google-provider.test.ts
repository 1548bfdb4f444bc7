import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GoogleProvider } from '../../../src/oauth/providers/google-provider.js';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('GoogleProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const provider = new GoogleProvider({
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    redirectUri: 'https://api.example.test/oauth2/callback',
    scope: 'openid email',
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request a code with the configured scope', () => {
    const url = new URL(provider.authorizationUrl('google'));

    expect(url.host).toBe('accounts.google.com');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('scope')).toBe('openid email');
    expect(url.searchParams.get('state')).toBe('google');
  });

  it('should exchange the code with the authorization_code grant', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: 'g-token', expires_in: 3599 }));

    await expect(provider.exchangeCode('the-code')).resolves.toBe('g-token');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    const form = new URLSearchParams(String(init?.body));
    expect(url).toBe('https://oauth2.googleapis.com/token');
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('redirect_uri')).toBe('https://api.example.test/oauth2/callback');
  });

  it('should fail on a rejected code', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: 'invalid_grant' }, 400));

    await expect(provider.exchangeCode('used-code')).rejects.toMatchObject({
      code: 'EXTERNAL_EXCHANGE_FAILED',
      details: { upstreamStatus: 400 },
    });
  });

  it('should map the userinfo response', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ id: '1098', email: 'g@example.com', name: 'Gina Example', picture: 'https://img.example.test/g' })
    );

    await expect(provider.fetchProfile('g-token')).resolves.toEqual({
      id: '1098',
      username: 'Gina Example',
      avatarUrl: 'https://img.example.test/g',
      email: 'g@example.com',
    });
  });

  it('should default to no avatar', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: '1098', email: 'g@example.com', name: 'Gina' }));

    await expect(provider.fetchProfile('g-token')).resolves.toMatchObject({ avatarUrl: '' });
  });

  it('should fail on a non-JSON body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

    await expect(provider.fetchProfile('g-token')).rejects.toMatchObject({
      code: 'EXTERNAL_FETCH_FAILED',
    });
  });
});
