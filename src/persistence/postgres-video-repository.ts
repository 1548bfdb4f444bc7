/**
 * PostgreSQL Video Repository
 */

import { PersistenceError } from './errors.js';
import { isUuid, runQuery, type PgPool } from './postgres.js';
import { VIDEO_STATUSES } from './types.js';
import type {
  NewVideo,
  QueryContext,
  Video,
  VideoDetails,
  VideoRepository,
  VideoStatus,
} from './types.js';

type VideoRow = {
  video_id: string;
  title: string;
  duration: number;
  description: string | null;
  created_at: Date;
  updated_at: Date;
  publisher_id: string;
  status: string;
};

type VideoDetailsRow = VideoRow & {
  // COUNT(*) is bigint; pg returns it as a string
  total_subscriber: string;
  total_view: string;
  total_like: string;
};

const VIDEO_COLUMNS =
  'video_id, title, duration, description, created_at, updated_at, publisher_id, status';

function parseStatus(value: string): VideoStatus {
  const status = VIDEO_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new PersistenceError('unavailable', `Unexpected video status: ${value}`);
  }
  return status;
}

function toVideo(row: VideoRow): Video {
  return {
    id: row.video_id,
    title: row.title,
    duration: row.duration,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    publisherId: row.publisher_id,
    status: parseStatus(row.status),
  };
}

export class PostgresVideoRepository implements VideoRepository {
  constructor(private readonly pool: PgPool) {}

  async createVideo(input: NewVideo, ctx?: QueryContext): Promise<Video> {
    const result = await runQuery<VideoRow>(
      this.pool,
      `INSERT INTO video (title, duration, description, publisher_id)
       VALUES ($1, $2, $3, $4)
       RETURNING ${VIDEO_COLUMNS}`,
      [input.title, input.duration, input.description, input.publisherId],
      ctx
    );
    const row = result.rows[0];
    if (!row) {
      throw new PersistenceError('unavailable', 'Insert returned no row');
    }
    return toVideo(row);
  }

  async getVideo(id: string, ctx?: QueryContext): Promise<VideoDetails | null> {
    if (!isUuid(id)) return null;
    const result = await runQuery<VideoDetailsRow>(
      this.pool,
      `SELECT ${VIDEO_COLUMNS},
         (SELECT COUNT(*) FROM subscribe s WHERE s.subscribe_to_id = v.publisher_id) AS total_subscriber,
         (SELECT COUNT(*) FROM watch_video w WHERE w.video_id = v.video_id) AS total_view,
         (SELECT COUNT(*) FROM like_video l WHERE l.video_id = v.video_id) AS total_like
       FROM video v
       WHERE v.video_id = $1 AND v.status = 'published'`,
      [id],
      ctx
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      ...toVideo(row),
      totalSubscriber: Number(row.total_subscriber),
      totalView: Number(row.total_view),
      totalLike: Number(row.total_like),
    };
  }
}
