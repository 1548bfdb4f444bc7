/**
 * Authentication routes
 *
 * POST /auth/login, POST /auth/register, GET /auth/verification,
 * POST /auth/verification/resend, POST /auth/token/refresh, POST /auth/logout,
 * GET /oauth2/callback, GET /oauth2/:provider/authorize
 */

import { Router, type Response } from 'express';
import type { CoreContext } from '../../context.js';
import type { AuthenticatedSession, TokenPair } from '../../core/types.js';
import { withAuth } from '../auth-middleware.js';
import { asyncHandler, sendData } from '../responses.js';
import {
  LoginBodySchema,
  OAuthCallbackQuerySchema,
  RegisterBodySchema,
  ResendVerificationSchema,
  VerificationQuerySchema,
  parseRequest,
} from '../validation.js';

function tokenBody(tokens: TokenPair): { access_token: string; refresh_token: string } {
  return { access_token: tokens.accessToken, refresh_token: tokens.refreshToken };
}

function sendTokens(res: Response, tokens: TokenPair): void {
  res.setHeader('Cache-Control', 'no-store');
  sendData(res, tokenBody(tokens));
}

function sendSession(res: Response, session: AuthenticatedSession): void {
  // Tokens must never be cached by intermediaries
  res.setHeader('Cache-Control', 'no-store');
  sendData(res, {
    id: session.id,
    username: session.username,
    email: session.email,
    avatar: session.avatar,
    ...tokenBody(session),
  });
}

export function createAuthRouter(context: CoreContext): Router {
  const router = Router();
  const { passwordAuth, federation, sessions } = context;

  router.post(
    '/auth/login',
    asyncHandler(async (req, res, ctx) => {
      const body = parseRequest(LoginBodySchema, req.body, 'body');
      sendSession(res, await passwordAuth.login(body, ctx));
    })
  );

  router.post(
    '/auth/register',
    asyncHandler(async (req, res, ctx) => {
      const body = parseRequest(RegisterBodySchema, req.body, 'body');
      sendData(res, await passwordAuth.register(body, ctx));
    })
  );

  router.get(
    '/auth/verification',
    asyncHandler(async (req, res, ctx) => {
      const { token } = parseRequest(VerificationQuerySchema, req.query, 'query');
      sendData(res, await passwordAuth.verifyEmail(token, ctx));
    })
  );

  router.post(
    '/auth/verification/resend',
    asyncHandler(async (req, res, ctx) => {
      const source = typeof req.query.email === 'string' ? req.query : req.body;
      const { email } = parseRequest(ResendVerificationSchema, source, 'email');
      await passwordAuth.resendVerification(email, ctx);
      sendData(res, { email, sent: true });
    })
  );

  router.post(
    '/auth/token/refresh',
    withAuth(sessions, 'refresh', async ({ claims, ctx }, res) => {
      sendTokens(res, await sessions.refresh(claims, ctx));
    })
  );

  router.post(
    '/auth/logout',
    withAuth(sessions, 'access', async ({ claims, ctx }, res) => {
      await sessions.invalidate(claims.subject, ctx);
      sendData(res, { id: claims.subject, logged_out: true });
    })
  );

  router.get(
    '/oauth2/callback',
    asyncHandler(async (req, res, ctx) => {
      const query = parseRequest(OAuthCallbackQuerySchema, req.query, 'query');
      sendSession(res, await federation.handleCallback(query, ctx));
    })
  );

  router.get(
    '/oauth2/:provider/authorize',
    asyncHandler(async (req, res) => {
      res.redirect(302, federation.authorizationUrl(req.params.provider));
    })
  );

  return router;
}
