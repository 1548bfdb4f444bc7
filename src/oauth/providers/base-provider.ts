/**
 * Shared HTTP plumbing for OAuth providers
 *
 * Upstream failures are terminal: a non-2xx status, an unparseable body or
 * a body of the wrong shape is logged with the upstream response and
 * converted to the stage's ApiError. Nothing is retried.
 */

import type { ZodTypeDef, ZodType } from 'zod';
import type { ExternalIdentity } from '../../core/types.js';
import { ApiError, FederationErrors } from '../../utils/errors.js';
import type {
  OAuthClientCredentials,
  OAuthProvider,
  ProviderRequestContext,
} from './types.js';

type Stage = 'exchange' | 'fetch';
type BodySchema<T> = ZodType<T, ZodTypeDef, unknown>;

const USER_AGENT = 'reelhub-api';

export abstract class BaseOAuthProvider implements OAuthProvider {
  abstract readonly name: string;

  constructor(protected readonly credentials: OAuthClientCredentials) {}

  abstract authorizationUrl(state: string): string;
  abstract exchangeCode(code: string, ctx?: ProviderRequestContext): Promise<string>;
  abstract fetchProfile(accessToken: string, ctx?: ProviderRequestContext): Promise<ExternalIdentity>;

  protected buildAuthorizationUrl(
    endpoint: string,
    state: string,
    scope: string,
    extra: Record<string, string> = {}
  ): string {
    const url = new URL(endpoint);
    url.searchParams.set('client_id', this.credentials.clientId);
    url.searchParams.set('redirect_uri', this.credentials.redirectUri);
    url.searchParams.set('scope', scope);
    url.searchParams.set('state', state);
    for (const [key, value] of Object.entries(extra)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /** POST an x-www-form-urlencoded body to a token endpoint */
  protected async postForm<T>(
    url: string,
    form: Record<string, string>,
    schema: BodySchema<T>,
    ctx?: ProviderRequestContext
  ): Promise<T> {
    return this.request(
      'exchange',
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
        },
        body: new URLSearchParams(form).toString(),
        signal: ctx?.signal,
      },
      schema
    );
  }

  /** GET a JSON resource with the provider access token */
  protected async getJson<T>(
    url: string,
    accessToken: string,
    schema: BodySchema<T>,
    ctx?: ProviderRequestContext
  ): Promise<T> {
    return this.request(
      'fetch',
      url,
      {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
        },
        signal: ctx?.signal,
      },
      schema
    );
  }

  private failure(stage: Stage, status?: number): ApiError {
    return stage === 'exchange'
      ? FederationErrors.EXCHANGE_FAILED(this.name, status)
      : FederationErrors.FETCH_FAILED(this.name, status);
  }

  private async request<T>(
    stage: Stage,
    url: string,
    init: RequestInit,
    schema: BodySchema<T>
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      console.error(`[OAuth:${this.name}] ${stage} request failed:`, {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      throw this.failure(stage);
    }

    const body = await response.text();
    if (!response.ok) {
      console.error(`[OAuth:${this.name}] ${stage} returned ${response.status}:`, { url, body });
      throw this.failure(stage, response.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      console.error(`[OAuth:${this.name}] ${stage} returned a non-JSON body:`, { url, body });
      throw this.failure(stage, response.status);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      console.error(`[OAuth:${this.name}] ${stage} returned an unexpected body:`, {
        url,
        body,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw this.failure(stage, response.status);
    }
    return parsed.data;
  }
}
