/**
 * Core Domain Models - Barrel Export
 *
 * This module re-exports the practice log domain types and the small pure
 * helpers derived from them.
 *
 * @example
 * ```typescript
 * import { type PracticeSession, type Drill, successRate } from '@/core/models';
 * ```
 */

// Drill types - individual scored or completion drills
export type { DrillCategory, ScoringType, Drill } from './drill';
export {
  DRILL_CATEGORIES,
  CATEGORY_DISPLAY_NAMES,
  categoryFromDisplayName,
  isDrillCategory,
  successRate,
  successPercentage,
  displayScore,
} from './drill';

// Practice session types - outings with drills and conditions
export type { SessionConditions, PracticeSession } from './practice-session';
export {
  emptyConditions,
  totalDrills,
  averageSuccessPercentage,
  hasWeatherData,
  hasWindData,
  hasLocationData,
  weatherSummary,
  locationSummary,
  windDirectionToText,
  courseTypeForName,
} from './practice-session';

// Prefixed UUID generators
export { generateSessionId, generateDrillId, generateTemplateId } from './ids';
