/**
 * Drill Domain Types
 *
 * A Drill is one logged attempt at a named practice exercise within a
 * practice session. Drills are measured in one of two ways:
 *
 * 1. Scored drills record how many attempts were made (`maxScore`) and how
 *    many succeeded (`actualScore`), e.g. "8 of 10 putts holed from 3 feet".
 * 2. Completion drills record only whether the exercise was finished.
 *
 * Exactly one of those measurements is meaningful for a given drill and it is
 * selected by `scoringType`; the other fields stay null.
 */

/**
 * The area of the game a drill trains.
 */
export type DrillCategory = 'putting' | 'chipping' | 'pitching' | 'irons' | 'driver';

/**
 * How a drill is measured.
 *
 * - 'scored': `maxScore`/`actualScore` carry the result
 * - 'completion': `isCompleted` carries the result
 */
export type ScoringType = 'scored' | 'completion';

/**
 * All categories in their canonical display order.
 */
export const DRILL_CATEGORIES: readonly DrillCategory[] = [
  'putting',
  'chipping',
  'pitching',
  'irons',
  'driver',
] as const;

/**
 * Human-readable names, as shown in the app and written to CSV exports.
 */
export const CATEGORY_DISPLAY_NAMES: Record<DrillCategory, string> = {
  putting: 'Putting',
  chipping: 'Chipping',
  pitching: 'Pitching',
  irons: 'Irons',
  driver: 'Driver',
};

// Lowercased display name -> category tag
const CATEGORY_BY_NAME = new Map<string, DrillCategory>(
  DRILL_CATEGORIES.map((category) => [
    CATEGORY_DISPLAY_NAMES[category].toLowerCase(),
    category,
  ])
);

/**
 * Resolves a category from its display name, ignoring case.
 *
 * @returns The category tag, or null when the name matches no category
 *
 * @example
 * ```typescript
 * categoryFromDisplayName('PUTTING'); // 'putting'
 * categoryFromDisplayName('Bunker');  // null
 * ```
 */
export function categoryFromDisplayName(displayName: string): DrillCategory | null {
  return CATEGORY_BY_NAME.get(displayName.toLowerCase()) ?? null;
}

/**
 * Type guard for category tags arriving from untyped sources (DB rows, JSON).
 */
export function isDrillCategory(value: string): value is DrillCategory {
  return DRILL_CATEGORIES.some((category) => category === value);
}

/**
 * Drill represents a single logged drill attempt.
 *
 * @example
 * ```typescript
 * const drill: Drill = {
 *   id: 'drl_001',
 *   name: '10 from 3 feet',
 *   description: 'Make 10 putts from 3 feet',
 *   category: 'putting',
 *   scoringType: 'scored',
 *   maxScore: 10,
 *   actualScore: 8,
 *   isCompleted: null,
 *   notes: null,
 *   completedAt: new Date('2024-01-15T09:45:00'),
 * };
 * ```
 */
export interface Drill {
  /**
   * Unique identifier for the drill.
   * Format: prefixed UUID (e.g., 'drl_abc123')
   */
  id: string;

  /** Name of the drill as chosen from a template or typed by the golfer */
  name: string;

  /** What the drill involves */
  description: string;

  category: DrillCategory;

  scoringType: ScoringType;

  /** Number of attempts (scored drills only) */
  maxScore: number | null;

  /** Number of successful attempts (scored drills only) */
  actualScore: number | null;

  /** Whether the drill was finished (completion drills only) */
  isCompleted: boolean | null;

  notes: string | null;

  /** When the drill was logged */
  completedAt: Date;
}

/**
 * Fraction of the drill that succeeded, in the range [0, 1].
 *
 * Scored drills use actual/max clamped to [0, 1] (0 when max is missing or
 * not positive). Completion drills are 1 when completed and 0 otherwise.
 */
export function successRate(drill: Drill): number {
  if (drill.scoringType === 'scored') {
    const { maxScore, actualScore } = drill;
    if (maxScore === null || actualScore === null || maxScore <= 0) {
      return 0;
    }
    return Math.min(Math.max(actualScore / maxScore, 0), 1);
  }
  return drill.isCompleted === true ? 1 : 0;
}

/**
 * Success rate as a whole percentage (truncated, not rounded).
 */
export function successPercentage(drill: Drill): number {
  return Math.trunc(successRate(drill) * 100);
}

/**
 * Short score label for lists: "8/10", "Completed", "Not Completed".
 */
export function displayScore(drill: Drill): string {
  if (drill.scoringType === 'scored') {
    if (drill.actualScore !== null && drill.maxScore !== null) {
      return `${drill.actualScore}/${drill.maxScore}`;
    }
    return '0/0';
  }
  return drill.isCompleted === true ? 'Completed' : 'Not Completed';
}
