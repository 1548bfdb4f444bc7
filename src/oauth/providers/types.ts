/**
 * OAuth provider contract
 */

import type { ExternalIdentity } from '../../core/types.js';

export interface ProviderRequestContext {
  signal?: AbortSignal;
}

/**
 * One external identity provider.
 *
 * `authorizationUrl` builds step 1 of the authorization-code flow; the
 * callback drives `exchangeCode` then `fetchProfile`.
 */
export interface OAuthProvider {
  /** Tag carried in the `state` parameter and stored with the account */
  readonly name: string;

  authorizationUrl(state: string): string;

  /**
   * @returns the provider's access token
   * @throws {ApiError} EXTERNAL_EXCHANGE_FAILED
   */
  exchangeCode(code: string, ctx?: ProviderRequestContext): Promise<string>;

  /** @throws {ApiError} EXTERNAL_FETCH_FAILED */
  fetchProfile(accessToken: string, ctx?: ProviderRequestContext): Promise<ExternalIdentity>;
}

export interface OAuthClientCredentials {
  clientId: string;
  clientSecret: string;
  /** Registered callback URL, sent with the authorize and token requests */
  redirectUri: string;
  scope?: string;
}
