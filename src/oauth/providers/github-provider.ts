/**
 * GitHub OAuth provider
 */

import { z } from 'zod';
import type { ExternalIdentity } from '../../core/types.js';
import { FederationErrors } from '../../utils/errors.js';
import { BaseOAuthProvider } from './base-provider.js';
import type { OAuthClientCredentials, ProviderRequestContext } from './types.js';

const GITHUB_AUTH_URL = 'https://github.com/login/oauth/authorize';
const GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token';
const GITHUB_USER_URL = 'https://api.github.com/user';
const GITHUB_USER_EMAIL_URL = 'https://api.github.com/user/emails';

export const GITHUB_DEFAULT_SCOPE = 'read:user user:email';

// GitHub answers a bad code with 200 and an `error` field, so a missing
// access_token is what marks the failure.
const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const UserSchema = z.object({
  id: z.number().int(),
  login: z.string().min(1),
  avatar_url: z.string(),
  email: z.string().nullable().optional(),
});

const EmailsSchema = z.array(
  z.object({
    email: z.string(),
    primary: z.boolean(),
    verified: z.boolean(),
  })
);

export class GitHubProvider extends BaseOAuthProvider {
  readonly name = 'github';

  constructor(credentials: OAuthClientCredentials) {
    super(credentials);
  }

  private get scope(): string {
    return this.credentials.scope ?? GITHUB_DEFAULT_SCOPE;
  }

  authorizationUrl(state: string): string {
    return this.buildAuthorizationUrl(GITHUB_AUTH_URL, state, this.scope);
  }

  async exchangeCode(code: string, ctx?: ProviderRequestContext): Promise<string> {
    const token = await this.postForm(
      GITHUB_TOKEN_URL,
      {
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        code,
        redirect_uri: this.credentials.redirectUri,
      },
      TokenResponseSchema,
      ctx
    );
    return token.access_token;
  }

  async fetchProfile(accessToken: string, ctx?: ProviderRequestContext): Promise<ExternalIdentity> {
    const user = await this.getJson(GITHUB_USER_URL, accessToken, UserSchema, ctx);

    // Users with a private e-mail address return null here
    let email = user.email ?? null;
    if (!email) {
      const emails = await this.getJson(GITHUB_USER_EMAIL_URL, accessToken, EmailsSchema, ctx);
      email = emails.find((entry) => entry.primary && entry.verified)?.email ?? null;
    }
    if (!email) {
      console.error('[OAuth:github] Profile has no verified e-mail address', { id: user.id });
      throw FederationErrors.FETCH_FAILED(this.name);
    }

    return {
      id: String(user.id),
      username: user.login,
      avatarUrl: user.avatar_url,
      email,
    };
  }
}
