/**
 * Video Service - video metadata publishing and lookup
 */

import type { TokenClaims } from '../core/types.js';
import { withPersistenceErrors } from '../persistence/errors.js';
import type { QueryContext, Video, VideoDetails, VideoRepository } from '../persistence/types.js';
import { CommonErrors } from '../utils/errors.js';

export interface PublishVideoInput {
  title: string;
  duration: number;
  description?: string;
}

export class VideoService {
  constructor(private readonly videos: VideoRepository) {}

  async publish(claims: TokenClaims, input: PublishVideoInput, ctx?: QueryContext): Promise<Video> {
    return withPersistenceErrors(() =>
      this.videos.createVideo(
        {
          title: input.title.trim(),
          duration: input.duration,
          description: input.description?.trim() || null,
          publisherId: claims.subject,
        },
        ctx
      )
    );
  }

  async get(videoId: string, ctx?: QueryContext): Promise<VideoDetails> {
    const video = await withPersistenceErrors(() => this.videos.getVideo(videoId, ctx));
    if (!video) {
      throw CommonErrors.NOT_FOUND('Video');
    }
    return video;
  }
}
