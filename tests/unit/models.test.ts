/**
 * Domain Model Helper Tests
 *
 * Success rates, display strings and condition summaries derived from
 * sessions and drills.
 */

import { describe, it, expect } from 'vitest';
import {
  averageSuccessPercentage,
  categoryFromDisplayName,
  courseTypeForName,
  displayScore,
  hasLocationData,
  hasWeatherData,
  hasWindData,
  isDrillCategory,
  locationSummary,
  successPercentage,
  successRate,
  weatherSummary,
  windDirectionToText,
} from '../../src/core/models';
import { buildCompletionDrill, buildScoredDrill, buildSession } from '../helpers';

describe('drill success', () => {
  it('divides actual by max for scored drills', () => {
    const drill = buildScoredDrill({ maxScore: 4, actualScore: 3 });

    expect(successRate(drill)).toBe(0.75);
    expect(successPercentage(drill)).toBe(75);
  });

  it('clamps scores above the maximum', () => {
    expect(successRate(buildScoredDrill({ maxScore: 10, actualScore: 12 }))).toBe(1);
  });

  it('is zero when the maximum is missing or not positive', () => {
    expect(successRate(buildScoredDrill({ maxScore: 0, actualScore: 0 }))).toBe(0);
    expect(successRate(buildScoredDrill({ maxScore: null, actualScore: 5 }))).toBe(0);
  });

  it('uses the completion flag for completion drills', () => {
    expect(successRate(buildCompletionDrill({ isCompleted: true }))).toBe(1);
    expect(successRate(buildCompletionDrill({ isCompleted: false }))).toBe(0);
  });

  it('truncates the percentage', () => {
    expect(successPercentage(buildScoredDrill({ maxScore: 3, actualScore: 1 }))).toBe(33);
  });
});

describe('displayScore', () => {
  it('shows actual/max for scored drills', () => {
    expect(displayScore(buildScoredDrill({ maxScore: 4, actualScore: 3 }))).toBe('3/4');
    expect(displayScore(buildScoredDrill({ maxScore: 4, actualScore: null }))).toBe('0/0');
  });

  it('shows completion status for completion drills', () => {
    expect(displayScore(buildCompletionDrill({ isCompleted: true }))).toBe('Completed');
    expect(displayScore(buildCompletionDrill({ isCompleted: false }))).toBe('Not Completed');
  });
});

describe('averageSuccessPercentage', () => {
  it('averages drill percentages', () => {
    const session = buildSession({
      drills: [
        buildScoredDrill({ maxScore: 4, actualScore: 3 }),
        buildCompletionDrill({ isCompleted: true }),
        buildScoredDrill({ maxScore: 2, actualScore: 1 }),
      ],
    });

    expect(averageSuccessPercentage(session)).toBe(75);
  });

  it('truncates the mean', () => {
    const session = buildSession({
      drills: [
        buildScoredDrill({ maxScore: 3, actualScore: 1 }),
        buildCompletionDrill({ isCompleted: false }),
      ],
    });

    expect(averageSuccessPercentage(session)).toBe(16);
  });

  it('is zero for a session without drills', () => {
    expect(averageSuccessPercentage(buildSession())).toBe(0);
  });
});

describe('condition summaries', () => {
  it('describes temperature, condition and wind', () => {
    const session = buildSession({
      temperature: 72.4,
      weatherCondition: 'Clear',
      windSpeed: 8.6,
      windDirectionText: 'NE',
    });

    expect(weatherSummary(session)).toBe('72°F, Clear, 9 mph NE');
  });

  it('needs both temperature and condition', () => {
    expect(weatherSummary(buildSession({ temperature: 60 }))).toBe('No weather data');
    expect(weatherSummary(buildSession())).toBe('No weather data');
  });

  it('prefers the course name over the location name', () => {
    expect(
      locationSummary(buildSession({ courseName: 'Pebble Creek', locationName: 'Austin, TX' }))
    ).toBe('Pebble Creek');
    expect(locationSummary(buildSession({ locationName: 'Austin, TX' }))).toBe('Austin, TX');
    expect(locationSummary(buildSession())).toBe('Unknown Location');
  });

  it('reports which condition groups are present', () => {
    const session = buildSession({ windSpeed: 0, latitude: 30.27 });

    expect(hasWeatherData(session)).toBe(false);
    expect(hasWindData(session)).toBe(true);
    expect(hasLocationData(session)).toBe(false);
    expect(hasLocationData(buildSession({ latitude: 30.27, longitude: -97.74 }))).toBe(true);
  });

  it('converts wind bearings to compass points', () => {
    expect(windDirectionToText(0)).toBe('N');
    expect(windDirectionToText(45)).toBe('NE');
    expect(windDirectionToText(180)).toBe('S');
    expect(windDirectionToText(350)).toBe('N');
    expect(windDirectionToText(-45)).toBe('NW');
    expect(windDirectionToText(null)).toBeNull();
  });
});

describe('categories', () => {
  it('resolves display names case-insensitively', () => {
    expect(categoryFromDisplayName('PUTTING')).toBe('putting');
    expect(categoryFromDisplayName('Irons')).toBe('irons');
    expect(categoryFromDisplayName('Bunker')).toBeNull();
  });

  it('recognizes category tags', () => {
    expect(isDrillCategory('driver')).toBe(true);
    expect(isDrillCategory('Driver')).toBe(false);
  });
});

describe('courseTypeForName', () => {
  it('recognises ranges, mini golf and practice facilities', () => {
    expect(courseTypeForName('Eastside Driving Range')).toBe('Driving Range');
    expect(courseTypeForName('Lakeview RANGE')).toBe('Driving Range');
    expect(courseTypeForName('Putt Putt Mini Golf')).toBe('Mini Golf');
    expect(courseTypeForName('Miniature Links')).toBe('Mini Golf');
    expect(courseTypeForName('Northside Practice Center')).toBe('Practice Facility');
  });

  it('falls back to a golf course', () => {
    expect(courseTypeForName('Pebble Creek')).toBe('Golf Course');
  });
});
