/**
 * API Module - Barrel Export
 *
 * The HTTP API is a Hono application served on Node. It provides REST
 * endpoints for:
 *
 * - Sessions: logging, listing, detail, deletion and statistics
 * - Templates: the drill template catalog
 * - Transfer: CSV/JSON export downloads and CSV import
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({
 *   repository,
 *   exportService: new ExportService(),
 *   importService: new ImportService(repository),
 *   templateService,
 *   practiceLog: new PracticeLogService(templateService, repository),
 *   maxImportBytes: 5 * 1024 * 1024,
 *   allowedOrigins: [],
 *   isProduction: false,
 * });
 * ```
 */

// Server factory and utilities
export { createApp, findAvailablePort, startServer, type StartServerOptions } from './server';

// Middleware
export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
  errorHandler,
  AppError,
  ErrorCodes,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './middleware';

// Route modules
export {
  createApiRouter,
  healthRoutes,
  sessionsRoutes,
  templatesRoutes,
  transferRoutes,
  type ApiInfo,
  type ImportResponse,
} from './routes';

// API types and query schemas
export {
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  type AppDependencies,
  type SessionSummary,
  type DrillDetail,
  sessionListQuerySchema,
  exportQuerySchema,
  statsQuerySchema,
  templateListQuerySchema,
  logSessionBodySchema,
  createTemplateBodySchema,
  updateTemplateBodySchema,
  type LogSessionBody,
  type SessionListQuery,
  type ExportQuery,
} from './types';

// Response utilities
export { success, error, notFound, badRequest, download } from './utils/response';
export { parseJsonBody, type BodyParseResult } from './utils/request';
