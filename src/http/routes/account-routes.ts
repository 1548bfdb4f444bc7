/**
 * Account and subscription routes
 */

import { Router } from 'express';
import type { CoreContext } from '../../context.js';
import { AuthErrors } from '../../utils/errors.js';
import { withAuth } from '../auth-middleware.js';
import { asyncHandler, sendData } from '../responses.js';
import {
  AccountIdParamsSchema,
  EditProfileBodySchema,
  SubscribeBodySchema,
  parseRequest,
} from '../validation.js';

export function createAccountRouter(context: CoreContext): Router {
  const router = Router();
  const { sessions, accounts, subscriptions } = context;

  router.get(
    '/accounts/:id',
    asyncHandler(async (req, res, ctx) => {
      const { id } = parseRequest(AccountIdParamsSchema, req.params, 'path');
      sendData(res, await accounts.getProfile(id, ctx));
    })
  );

  router.put(
    '/accounts/:id',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const { id } = parseRequest(AccountIdParamsSchema, request.params, 'path');
      const changes = parseRequest(EditProfileBodySchema, request.body, 'body');
      sendData(res, await accounts.editProfile(claims, id, changes, ctx));
    })
  );

  router.post(
    '/accounts/:id/lock',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const { id } = parseRequest(AccountIdParamsSchema, request.params, 'path');
      sendData(res, await accounts.lock(claims, id, ctx));
    })
  );

  router.post(
    '/accounts/:id/ban',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const { id } = parseRequest(AccountIdParamsSchema, request.params, 'path');
      sendData(res, await accounts.ban(claims, id, ctx));
    })
  );

  router.post(
    '/subscribe',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const body = parseRequest(SubscribeBodySchema, request.body, 'body');
      if (body.subscriber_id && body.subscriber_id !== claims.subject) {
        throw AuthErrors.ACCOUNT_ID_MISMATCH();
      }
      const result = await subscriptions.subscribe(claims, body.subscribe_to_id, ctx);
      sendData(res, {
        subscriber_id: result.subscriberId,
        subscribe_to_id: result.subscribeToId,
        changed: result.changed,
      }, result.changed ? 201 : 200);
    })
  );

  router.delete(
    '/subscribe',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const body = parseRequest(SubscribeBodySchema, request.body, 'body');
      if (body.subscriber_id && body.subscriber_id !== claims.subject) {
        throw AuthErrors.ACCOUNT_ID_MISMATCH();
      }
      const result = await subscriptions.unsubscribe(claims, body.subscribe_to_id, ctx);
      sendData(res, {
        subscriber_id: result.subscriberId,
        subscribe_to_id: result.subscribeToId,
        changed: result.changed,
      });
    })
  );

  return router;
}
