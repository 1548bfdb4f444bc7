export { createApp, startHTTPServer } from './app.js';
export {
  extractBearerToken,
  withAuth,
  type AuthenticatedHandler,
  type AuthenticatedRequest,
} from './auth-middleware.js';
export {
  asyncHandler,
  errorHandler,
  notFoundHandler,
  requestContext,
  sendData,
  type RouteHandler,
} from './responses.js';
export { parseRequest } from './validation.js';
