/**
 * HTTP application
 *
 * Express app exposing the auth, account and video routes plus the
 * per-account resource directory (avatars and covers).
 */

import express, { type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import type { CoreContext } from '../context.js';
import { errorHandler, notFoundHandler } from './responses.js';
import { createAccountRouter } from './routes/account-routes.js';
import { createAuthRouter } from './routes/auth-routes.js';
import { createVideoRouter } from './routes/video-routes.js';

/**
 * Build the express app.
 *
 * Routes are mounted in order: health, static resources, auth, accounts,
 * videos, then the 404 and error handlers.
 */
export function createApp(context: CoreContext): express.Application {
  const app = express();
  const { server, storage } = context.config;

  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));

  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', server.corsOrigin);
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.header('Access-Control-Expose-Headers', 'WWW-Authenticate, Retry-After');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'reelhub-api',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/resources', express.static(storage.resourcePath, { fallthrough: true, index: false }));

  app.use(createAuthRouter(context));
  app.use(createAccountRouter(context));
  app.use(createVideoRouter(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      resolve(server);
    });
  });
}
