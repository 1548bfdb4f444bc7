/**
 * GitHubProvider Tests
 *
 * fetch is stubbed; no request leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GitHubProvider, GITHUB_DEFAULT_SCOPE } from '../../../src/oauth/providers/github-provider.js';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GitHubProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const provider = new GitHubProvider({
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    redirectUri: 'https://api.example.test/oauth2/callback',
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('authorizationUrl', () => {
    it('should carry client id, redirect uri, scope and state', () => {
      const url = new URL(provider.authorizationUrl('github'));

      expect(url.origin + url.pathname).toBe('https://github.com/login/oauth/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('redirect_uri')).toBe('https://api.example.test/oauth2/callback');
      expect(url.searchParams.get('scope')).toBe(GITHUB_DEFAULT_SCOPE);
      expect(url.searchParams.get('state')).toBe('github');
    });
  });

  describe('exchangeCode', () => {
    it('should post the code as a form and return the access token', async () => {
      fetchMock.mockResolvedValueOnce(json({ access_token: 'gh-token', token_type: 'bearer' }));

      await expect(provider.exchangeCode('the-code')).resolves.toBe('gh-token');

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://github.com/login/oauth/access_token');
      expect(init?.method).toBe('POST');
      expect(new URLSearchParams(String(init?.body)).get('code')).toBe('the-code');
      expect(new URLSearchParams(String(init?.body)).get('client_secret')).toBe('test-client-secret');
    });

    it('should fail on a non-2xx response without retrying', async () => {
      fetchMock.mockResolvedValueOnce(json({ message: 'Bad credentials' }, 401));

      await expect(provider.exchangeCode('the-code')).rejects.toMatchObject({
        code: 'EXTERNAL_EXCHANGE_FAILED',
        statusCode: 502,
        details: { upstreamStatus: 401 },
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should fail when GitHub answers 200 with an error body', async () => {
      fetchMock.mockResolvedValueOnce(json({ error: 'bad_verification_code' }));

      await expect(provider.exchangeCode('stale-code')).rejects.toMatchObject({
        code: 'EXTERNAL_EXCHANGE_FAILED',
      });
    });

    it('should log the upstream body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('upstream exploded', { status: 500 }));

      await expect(provider.exchangeCode('the-code')).rejects.toMatchObject({
        code: 'EXTERNAL_EXCHANGE_FAILED',
      });
      expect(console.error).toHaveBeenCalledWith('[OAuth:github] exchange returned 500:', {
        url: 'https://github.com/login/oauth/access_token',
        body: 'upstream exploded',
      });
    });

    it('should fail when the network call throws', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(provider.exchangeCode('the-code')).rejects.toMatchObject({
        code: 'EXTERNAL_EXCHANGE_FAILED',
        details: undefined,
      });
    });
  });

  describe('fetchProfile', () => {
    it('should map the user profile', async () => {
      fetchMock.mockResolvedValueOnce(
        json({ id: 4242, login: 'octo', avatar_url: 'https://avatars.example.test/4242', email: 'octo@example.com' })
      );

      await expect(provider.fetchProfile('gh-token')).resolves.toEqual({
        id: '4242',
        username: 'octo',
        avatarUrl: 'https://avatars.example.test/4242',
        email: 'octo@example.com',
      });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://api.github.com/user');
      expect(init?.headers).toMatchObject({ Authorization: 'Bearer gh-token' });
    });

    it('should fall back to the primary verified e-mail', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ id: 7, login: 'quiet', avatar_url: '', email: null }))
        .mockResolvedValueOnce(
          json([
            { email: 'old@example.com', primary: false, verified: true },
            { email: 'quiet@example.com', primary: true, verified: true },
          ])
        );

      await expect(provider.fetchProfile('gh-token')).resolves.toMatchObject({
        id: '7',
        email: 'quiet@example.com',
      });
      expect(fetchMock.mock.calls[1]?.[0]).toBe('https://api.github.com/user/emails');
    });

    it('should fail when no verified e-mail exists', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ id: 7, login: 'quiet', avatar_url: '', email: null }))
        .mockResolvedValueOnce(json([{ email: 'quiet@example.com', primary: true, verified: false }]));

      await expect(provider.fetchProfile('gh-token')).rejects.toMatchObject({
        code: 'EXTERNAL_FETCH_FAILED',
      });
    });

    it('should fail on a non-2xx profile response', async () => {
      fetchMock.mockResolvedValueOnce(json({ message: 'Requires authentication' }, 401));

      await expect(provider.fetchProfile('expired')).rejects.toMatchObject({
        code: 'EXTERNAL_FETCH_FAILED',
        statusCode: 502,
        details: { upstreamStatus: 401 },
      });
    });

    it('should fail on a profile of the wrong shape', async () => {
      fetchMock.mockResolvedValueOnce(json({ id: 'not-a-number', login: 'octo' }));

      await expect(provider.fetchProfile('gh-token')).rejects.toMatchObject({
        code: 'EXTERNAL_FETCH_FAILED',
      });
    });
  });
});
