/**
 * Practice Statistics Tests
 */

import { describe, it, expect } from 'vitest';
import { categoryStats, isSuccessfulDrill, practiceStats } from '../../src/core/practice';
import { buildCompletionDrill, buildScoredDrill, buildSession } from '../helpers';

describe('isSuccessfulDrill', () => {
  it('needs 70% of attempts for a scored drill', () => {
    expect(isSuccessfulDrill(buildScoredDrill({ maxScore: 10, actualScore: 7 }))).toBe(true);
    expect(isSuccessfulDrill(buildScoredDrill({ maxScore: 10, actualScore: 6 }))).toBe(false);
  });

  it('fails a scored drill with no attempts', () => {
    expect(isSuccessfulDrill(buildScoredDrill({ maxScore: 0, actualScore: 0 }))).toBe(false);
  });

  it('follows the outcome of a completion drill', () => {
    expect(isSuccessfulDrill(buildCompletionDrill({ isCompleted: true }))).toBe(true);
    expect(isSuccessfulDrill(buildCompletionDrill({ isCompleted: false }))).toBe(false);
  });
});

describe('categoryStats', () => {
  it('counts drills per category, most practised first', () => {
    const sessions = [
      buildSession({
        drills: [
          buildScoredDrill({ category: 'putting', actualScore: 9 }),
          buildScoredDrill({ category: 'driver', maxScore: 14, actualScore: 5 }),
        ],
      }),
      buildSession({
        drills: [
          buildScoredDrill({ category: 'putting', actualScore: 3 }),
          buildScoredDrill({ category: 'putting', actualScore: 7 }),
          buildCompletionDrill({ category: 'chipping', isCompleted: true }),
        ],
      }),
    ];

    expect(categoryStats(sessions)).toEqual([
      {
        category: 'putting',
        displayName: 'Putting',
        drillCount: 3,
        successfulDrills: 2,
        successPercentage: 66,
      },
      {
        category: 'chipping',
        displayName: 'Chipping',
        drillCount: 1,
        successfulDrills: 1,
        successPercentage: 100,
      },
      {
        category: 'driver',
        displayName: 'Driver',
        drillCount: 1,
        successfulDrills: 0,
        successPercentage: 0,
      },
    ]);
  });

  it('is empty without drills', () => {
    expect(categoryStats([buildSession()])).toEqual([]);
  });
});

describe('practiceStats', () => {
  it('averages drills over sessions', () => {
    const stats = practiceStats([
      buildSession({ drills: [buildScoredDrill(), buildScoredDrill(), buildScoredDrill()] }),
      buildSession({ drills: [] }),
    ]);

    expect(stats.totalSessions).toBe(2);
    expect(stats.totalDrills).toBe(3);
    expect(stats.averageDrillsPerSession).toBe(1.5);
  });

  it('reports zeros for no sessions', () => {
    expect(practiceStats([])).toEqual({
      totalSessions: 0,
      totalDrills: 0,
      averageDrillsPerSession: 0,
      categories: [],
    });
  });
});
