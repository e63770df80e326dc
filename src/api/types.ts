/**
 * API Types for the Golf Practice Log
 *
 * Response envelopes shared by every endpoint, the zod schemas that
 * validate query strings and request bodies, and the shapes the session
 * endpoints return.
 *
 * Every response follows one of two shapes:
 *
 * ```json
 * { "success": true, "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "..." } }
 * ```
 */

import { z } from 'zod';
import type { Drill } from '@/core/models';
import type { ExportService } from '@/core/export';
import type { ImportService } from '@/core/import';
import type { PracticeLogService } from '@/core/practice';
import {
  drillCategorySchema,
  scoringTypeSchema,
  type DrillTemplateService,
} from '@/core/templates';
import type { PracticeSessionRepository } from '@/storage';

// ============================================================================
// Success Response Types
// ============================================================================

/**
 * Standard success response wrapper for API endpoints.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  /** The response payload with type T */
  data: T;
}

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * Detailed error information structure.
 */
export interface ApiError {
  /**
   * Machine-readable error code for programmatic handling.
   * Examples: 'VALIDATION_ERROR', 'NOT_FOUND', 'IMPORT_FAILED'
   */
  code: string;

  /** Human-readable error message suitable for display. */
  message: string;

  /**
   * Additional error context (optional).
   * For validation errors, this contains field-level error details.
   */
  details?: unknown;
}

/**
 * Standard error response wrapper for API endpoints.
 *
 * @example
 * ```typescript
 * const response = await fetch('/api/export?format=xml');
 * const body = await response.json();
 *
 * if (!body.success) {
 *   console.error(`Error ${body.error.code}: ${body.error.message}`);
 * }
 * ```
 */
export interface ApiErrorResponse {
  /** Indicates the request failed */
  success: false;
  /** Error information */
  error: ApiError;
}

/**
 * Union type for any API response (success or error).
 */
export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

// ============================================================================
// Validation Detail Types
// ============================================================================

/**
 * A single field-level validation failure.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'range') */
  path: string;
  /** Human-readable description of the validation failure */
  message: string;
}

/**
 * Flattens a ZodError into ValidationErrorDetail entries.
 */
export function toValidationDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// ============================================================================
// Query Schemas (Zod)
// ============================================================================

const dateRangeSchema = z
  .enum(['week', 'month', 'threeMonths', 'sixMonths', 'year', 'all'])
  .default('all');

/**
 * Query string for `GET /api/sessions`.
 *
 * - range: optional date range, defaults to 'all'
 * - limit: optional cap on the number of sessions, 1-500
 */
export const sessionListQuerySchema = z.object({
  range: dateRangeSchema,
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type SessionListQuery = z.infer<typeof sessionListQuerySchema>;

/**
 * Query string for `GET /api/export`.
 *
 * @example
 * ```typescript
 * exportQuerySchema.parse({ format: 'json' });
 * // { format: 'json', range: 'all' }
 * ```
 */
export const exportQuerySchema = z.object({
  format: z.enum(['csv', 'json']).default('csv'),
  range: dateRangeSchema,
});

export type ExportQuery = z.infer<typeof exportQuerySchema>;

/**
 * Query string for `GET /api/sessions/stats`.
 */
export const statsQuerySchema = z.object({
  range: dateRangeSchema,
});

/**
 * Query string for `GET /api/templates`.
 */
export const templateListQuerySchema = z.object({
  category: drillCategorySchema.optional(),
});

// ============================================================================
// Body Schemas (Zod)
// ============================================================================

const drillResultSchema = z.object({
  templateId: z.string().min(1),
  score: z.number().int().min(0).optional(),
  maxScore: z.number().int().positive().optional(),
  isCompleted: z.boolean().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

const conditionsSchema = z
  .object({
    temperature: z.number().nullable(),
    weatherCondition: z.string().nullable(),
    weatherDescription: z.string().nullable(),
    humidity: z.number().min(0).max(100).nullable(),
    feelsLikeTemperature: z.number().nullable(),
    windSpeed: z.number().min(0).nullable(),
    windDirection: z.number().min(0).max(360).nullable(),
    windDirectionText: z.string().nullable(),
    locationName: z.string().nullable(),
    latitude: z.number().min(-90).max(90).nullable(),
    longitude: z.number().min(-180).max(180).nullable(),
    courseName: z.string().nullable(),
    courseType: z.string().nullable(),
    distanceToCourse: z.number().min(0).nullable(),
  })
  .partial();

/**
 * Body of `POST /api/sessions`.
 *
 * @example
 * ```json
 * {
 *   "date": "2024-06-30T08:15:00Z",
 *   "notes": "Windy morning",
 *   "drills": [{ "templateId": "tpl_putting_gate", "score": 8 }],
 *   "conditions": { "windSpeed": 12, "windDirection": 45 }
 * }
 * ```
 */
export const logSessionBodySchema = z.object({
  date: z.coerce.date().optional(),
  notes: z.string().max(2000).nullable().optional(),
  drills: z.array(drillResultSchema).max(100),
  conditions: conditionsSchema.optional(),
});

export type LogSessionBody = z.infer<typeof logSessionBodySchema>;

const templateFields = {
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500),
  category: drillCategorySchema,
  scoringType: scoringTypeSchema,
  defaultMaxScore: z.number().int().min(1).max(100),
};

/**
 * Body of `POST /api/templates`. Only name and category are required.
 */
export const createTemplateBodySchema = z.object({
  ...templateFields,
  description: templateFields.description.default(''),
  scoringType: templateFields.scoringType.default('scored'),
  defaultMaxScore: templateFields.defaultMaxScore.default(5),
});

/**
 * Body of `PATCH /api/templates/:id`; any subset of the template fields.
 */
export const updateTemplateBodySchema = z.object(templateFields).partial();

// ============================================================================
// Session Response Shapes
// ============================================================================

/**
 * One row of the session list.
 */
export interface SessionSummary {
  id: string;
  date: Date;
  notes: string | null;
  totalDrills: number;
  /** Mean drill success as a whole percentage, 0 when there are no drills */
  averageSuccessPercentage: number;
  /** e.g. "72°F, Clear, 8 mph NE", or "No weather data" */
  weatherSummary: string;
  /** Course name, then location name, then "Unknown Location" */
  locationSummary: string;
}

/**
 * A drill as returned by the session detail endpoint, with its
 * precomputed display score ("7/10", "Completed").
 */
export interface DrillDetail extends Drill {
  displayScore: string;
  successPercentage: number;
}

// ============================================================================
// Application Dependencies
// ============================================================================

/**
 * Everything the HTTP layer needs, injected by `createApp`.
 */
export interface AppDependencies {
  repository: PracticeSessionRepository;
  exportService: ExportService;
  importService: ImportService;
  templateService: DrillTemplateService;
  practiceLog: PracticeLogService;
  /** Largest accepted import body in bytes */
  maxImportBytes: number;
  /** Origins allowed by CORS; empty keeps the development defaults */
  allowedOrigins: string[];
  isProduction: boolean;
  /** Current time for range filters and export timestamps */
  clock?: () => Date;
}
