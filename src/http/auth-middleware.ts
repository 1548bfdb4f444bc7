/**
 * Bearer authentication for routes
 *
 * `withAuth` verifies the token against the Session Authority and hands
 * the claims to the handler as an explicit argument. Nothing is attached
 * to the express request.
 */

import type { Request, RequestHandler, Response } from 'express';
import type { SessionAuthority } from '../core/session-authority.js';
import type { KindPolicy, TokenClaims } from '../core/types.js';
import type { QueryContext } from '../persistence/types.js';
import { TokenErrors } from '../utils/errors.js';
import { asyncHandler } from './responses.js';

export interface AuthenticatedRequest {
  request: Request;
  claims: TokenClaims;
  ctx: QueryContext;
}

export type AuthenticatedHandler = (auth: AuthenticatedRequest, res: Response) => Promise<void>;

/**
 * @throws {ApiError} MISSING_BEARER_TOKEN when the header is absent or not a Bearer credential
 */
export function extractBearerToken(header: string | undefined): string {
  const match = header ? /^Bearer\s+(\S+)\s*$/i.exec(header) : null;
  if (!match?.[1]) {
    throw TokenErrors.MISSING_BEARER();
  }
  return match[1];
}

/**
 * Guard a route.
 *
 * @param policy - 'refresh' for the token refresh endpoint, 'access' everywhere else
 */
export function withAuth(
  sessions: SessionAuthority,
  policy: KindPolicy,
  handler: AuthenticatedHandler
): RequestHandler {
  return asyncHandler(async (req, res, ctx) => {
    const token = extractBearerToken(req.headers.authorization);
    const claims = await sessions.verify(token, policy, ctx);
    await handler({ request: req, claims, ctx }, res);
  });
}
