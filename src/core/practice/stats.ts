/**
 * Practice Statistics
 *
 * Totals across a set of sessions and a per-category breakdown. A drill
 * counts as successful when a scored drill reaches 70% of its attempts or
 * a completion drill was completed.
 */

import {
  CATEGORY_DISPLAY_NAMES,
  DRILL_CATEGORIES,
  successRate,
  type Drill,
  type DrillCategory,
  type PracticeSession,
} from '../models';

/** Share of attempts a scored drill needs to count as a success */
export const SUCCESS_THRESHOLD = 0.7;

export interface CategoryStats {
  category: DrillCategory;
  displayName: string;
  drillCount: number;
  successfulDrills: number;
  /** successfulDrills / drillCount as a whole percentage, truncated */
  successPercentage: number;
}

export interface PracticeStats {
  totalSessions: number;
  totalDrills: number;
  /** 0 when there are no sessions */
  averageDrillsPerSession: number;
  /** Categories with at least one drill, most practised first */
  categories: CategoryStats[];
}

export function isSuccessfulDrill(drill: Drill): boolean {
  if (drill.scoringType === 'scored') {
    return successRate(drill) >= SUCCESS_THRESHOLD;
  }
  return drill.isCompleted === true;
}

/**
 * Per-category counts, most drills first. Ties keep the canonical
 * category order.
 */
export function categoryStats(sessions: readonly PracticeSession[]): CategoryStats[] {
  const tallies = new Map<DrillCategory, { drillCount: number; successfulDrills: number }>();

  for (const session of sessions) {
    for (const drill of session.drills) {
      const tally = tallies.get(drill.category) ?? { drillCount: 0, successfulDrills: 0 };
      tally.drillCount += 1;
      if (isSuccessfulDrill(drill)) {
        tally.successfulDrills += 1;
      }
      tallies.set(drill.category, tally);
    }
  }

  const stats: CategoryStats[] = [];
  for (const category of DRILL_CATEGORIES) {
    const tally = tallies.get(category);
    if (tally === undefined) {
      continue;
    }
    stats.push({
      category,
      displayName: CATEGORY_DISPLAY_NAMES[category],
      ...tally,
      successPercentage: Math.trunc((tally.successfulDrills / tally.drillCount) * 100),
    });
  }

  // Stable sort: equal counts stay in category order
  return stats.sort((a, b) => b.drillCount - a.drillCount);
}

export function practiceStats(sessions: readonly PracticeSession[]): PracticeStats {
  const totalDrills = sessions.reduce((sum, session) => sum + session.drills.length, 0);

  return {
    totalSessions: sessions.length,
    totalDrills,
    averageDrillsPerSession: sessions.length === 0 ? 0 : totalDrills / sessions.length,
    categories: categoryStats(sessions),
  };
}
