/**
 * Google OAuth provider
 */

import { z } from 'zod';
import type { ExternalIdentity } from '../../core/types.js';
import { BaseOAuthProvider } from './base-provider.js';
import type { OAuthClientCredentials, ProviderRequestContext } from './types.js';

const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
const GOOGLE_USERINFO_URL = 'https://www.googleapis.com/oauth2/v2/userinfo';

export const GOOGLE_DEFAULT_SCOPE = 'openid email profile';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const UserInfoSchema = z.object({
  id: z.string().min(1),
  email: z.string().min(1),
  name: z.string().min(1),
  picture: z.string().optional(),
});

export class GoogleProvider extends BaseOAuthProvider {
  readonly name = 'google';

  constructor(credentials: OAuthClientCredentials) {
    super(credentials);
  }

  authorizationUrl(state: string): string {
    return this.buildAuthorizationUrl(
      GOOGLE_AUTH_URL,
      state,
      this.credentials.scope ?? GOOGLE_DEFAULT_SCOPE,
      { response_type: 'code', access_type: 'online' }
    );
  }

  async exchangeCode(code: string, ctx?: ProviderRequestContext): Promise<string> {
    const token = await this.postForm(
      GOOGLE_TOKEN_URL,
      {
        grant_type: 'authorization_code',
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
    const info = await this.getJson(GOOGLE_USERINFO_URL, accessToken, UserInfoSchema, ctx);
    return {
      id: info.id,
      username: info.name,
      avatarUrl: info.picture ?? '',
      email: info.email,
    };
  }
}
