/**
 * Video routes - metadata only; file upload is not part of this API
 */

import { Router } from 'express';
import type { CoreContext } from '../../context.js';
import { withAuth } from '../auth-middleware.js';
import { asyncHandler, sendData } from '../responses.js';
import type { Video, VideoDetails } from '../../persistence/types.js';
import { PublishVideoBodySchema, VideoIdParamsSchema, parseRequest } from '../validation.js';

function videoBody(video: Video): Record<string, unknown> {
  return {
    id: video.id,
    title: video.title,
    duration: video.duration,
    description: video.description,
    publisher_id: video.publisherId,
    status: video.status,
    created_at: video.createdAt.toISOString(),
    updated_at: video.updatedAt.toISOString(),
  };
}

function videoDetailsBody(video: VideoDetails): Record<string, unknown> {
  return {
    ...videoBody(video),
    total_subscriber: video.totalSubscriber,
    total_view: video.totalView,
    total_like: video.totalLike,
  };
}

export function createVideoRouter(context: CoreContext): Router {
  const router = Router();
  const { sessions, videos } = context;

  router.post(
    '/videos',
    withAuth(sessions, 'access', async ({ request, claims, ctx }, res) => {
      const body = parseRequest(PublishVideoBodySchema, request.body, 'body');
      sendData(res, videoBody(await videos.publish(claims, body, ctx)), 201);
    })
  );

  router.get(
    '/videos/:id',
    asyncHandler(async (req, res, ctx) => {
      const { id } = parseRequest(VideoIdParamsSchema, req.params, 'path');
      sendData(res, videoDetailsBody(await videos.get(id, ctx)));
    })
  );

  return router;
}
