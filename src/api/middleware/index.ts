/**
 * Request middleware, in the order `createApp` installs it: the request
 * logger first, then CORS. The error handler goes in through `app.onError`.
 *
 * @example
 * ```typescript
 * import { corsMiddleware, errorHandler, loggerMiddleware } from '@/api/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * app.use('*', corsMiddleware());
 * ```
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  errorHandler,
  AppError,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';
