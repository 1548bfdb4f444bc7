/**
 * App-level behaviour: health, CORS, 404s and error rendering.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { asyncHandler, errorHandler } from '../../../src/http/responses.js';
import { CommonErrors } from '../../../src/utils/errors.js';
import { createTestConfig } from '../../helpers/fakes.js';
import { createTestApp } from '../../helpers/test-app.js';

describe('createApp', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should report health', async () => {
    const res = await request(createTestApp().app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'healthy', service: 'reelhub-api' });
  });

  it('should answer CORS preflight with the configured origin', async () => {
    const { app } = createTestApp(
      createTestConfig({ server: { publicUrl: 'https://api.example.test', corsOrigin: 'https://web.example.test' } })
    );

    const res = await request(app).options('/auth/login');

    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('https://web.example.test');
    expect(res.headers['access-control-allow-headers']).toBe('Content-Type, Authorization');
  });

  it('should render unknown routes as 404', async () => {
    const res = await request(createTestApp().app).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route GET /nowhere not found' } });
  });

  it('should not expose the framework', async () => {
    const res = await request(createTestApp().app).get('/health');

    expect(res.headers['x-powered-by']).toBeUndefined();
  });
});

describe('errorHandler', () => {
  function appThrowing(error: unknown): express.Application {
    const app = express();
    app.get(
      '/fail',
      asyncHandler(async () => {
        throw error;
      })
    );
    app.use(errorHandler);
    return app;
  }

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should hide unexpected errors behind a 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(appThrowing(new Error('db password is test-password'))).get('/fail');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });

  it('should mark persistence outages as retryable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(appThrowing(CommonErrors.PERSISTENCE_UNAVAILABLE())).get('/fail');

    expect(res.status).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(res.body.error.code).toBe('PERSISTENCE_UNAVAILABLE');
  });

  it('should include details only in development', async () => {
    vi.stubEnv('NODE_ENV', 'development');

    const res = await request(appThrowing(CommonErrors.INVALID_REQUEST('Bad', { field: 'x' }))).get('/fail');

    expect(res.body).toEqual({ error: { code: 'INVALID_REQUEST', message: 'Bad', details: { field: 'x' } } });
  });
});
