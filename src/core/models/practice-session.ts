/**
 * Practice Session Domain Types
 *
 * A PracticeSession is one practice outing: a date, optional notes, the
 * drills logged during it, and an optional snapshot of the conditions
 * (weather, wind, location) captured when the session was saved.
 *
 * The drills array is owned by its session; no drill belongs to two sessions.
 */

import { successPercentage, type Drill } from './drill';

/**
 * Environment captured alongside a session. Every field is optional because
 * location and weather lookups may fail or be declined by the golfer.
 */
export interface SessionConditions {
  /** Temperature in Fahrenheit */
  temperature: number | null;
  /** Short condition label, e.g. "Clear", "Rain" */
  weatherCondition: string | null;
  /** Longer description, e.g. "light rain" */
  weatherDescription: string | null;
  /** Relative humidity percentage */
  humidity: number | null;
  /** Feels-like temperature in Fahrenheit */
  feelsLikeTemperature: number | null;

  /** Wind speed in mph */
  windSpeed: number | null;
  /** Wind direction in degrees (0-360) */
  windDirection: number | null;
  /** Compass label for the wind direction, e.g. "NE" */
  windDirectionText: string | null;

  /** Human-readable place, e.g. "Austin, TX" */
  locationName: string | null;
  latitude: number | null;
  longitude: number | null;
  /** Name of the golf course or facility */
  courseName: string | null;
  /** "Golf Course", "Driving Range", "Practice Facility", ... */
  courseType: string | null;
  /** Distance from the golfer to the course, in miles */
  distanceToCourse: number | null;
}

/**
 * PracticeSession represents a single practice outing with its drills.
 *
 * @example
 * ```typescript
 * const session: PracticeSession = {
 *   id: 'ps_abc123',
 *   date: new Date('2024-01-15T09:30:00'),
 *   notes: 'Morning practice session',
 *   drills: [],
 *   ...emptyConditions(),
 * };
 * ```
 */
export interface PracticeSession extends SessionConditions {
  /**
   * Unique identifier for the session.
   * Format: prefixed UUID (e.g., 'ps_abc123')
   */
  id: string;

  /** When the session took place */
  date: Date;

  notes: string | null;

  /** Drills in the order they were logged */
  drills: Drill[];
}

/**
 * Returns a conditions block with every field unset.
 */
export function emptyConditions(): SessionConditions {
  return {
    temperature: null,
    weatherCondition: null,
    weatherDescription: null,
    humidity: null,
    feelsLikeTemperature: null,
    windSpeed: null,
    windDirection: null,
    windDirectionText: null,
    locationName: null,
    latitude: null,
    longitude: null,
    courseName: null,
    courseType: null,
    distanceToCourse: null,
  };
}

export function totalDrills(session: PracticeSession): number {
  return session.drills.length;
}

/**
 * Integer mean of each drill's success percentage; 0 for an empty session.
 */
export function averageSuccessPercentage(session: PracticeSession): number {
  if (session.drills.length === 0) {
    return 0;
  }
  const total = session.drills.reduce((sum, drill) => sum + successPercentage(drill), 0);
  return Math.trunc(total / session.drills.length);
}

export function hasWeatherData(session: SessionConditions): boolean {
  return session.temperature !== null && session.weatherCondition !== null;
}

export function hasWindData(session: SessionConditions): boolean {
  return session.windSpeed !== null;
}

export function hasLocationData(session: SessionConditions): boolean {
  return session.latitude !== null && session.longitude !== null;
}

/**
 * One-line weather description such as "72°F, Clear, 8 mph NE".
 */
export function weatherSummary(session: SessionConditions): string {
  if (!hasWeatherData(session)) {
    return 'No weather data';
  }

  let summary = `${Math.round(session.temperature ?? 0)}°F`;
  if (session.weatherCondition !== null) {
    summary += `, ${session.weatherCondition}`;
  }
  if (hasWindData(session)) {
    summary += `, ${Math.round(session.windSpeed ?? 0)} mph`;
    if (session.windDirectionText !== null) {
      summary += ` ${session.windDirectionText}`;
    }
  }
  return summary;
}

/**
 * Best available place label: course name, then location name.
 */
export function locationSummary(session: SessionConditions): string {
  return session.courseName ?? session.locationName ?? 'Unknown Location';
}

const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

/**
 * Converts a wind bearing in degrees to a 16-point compass label.
 *
 * @example
 * ```typescript
 * windDirectionToText(45);  // 'NE'
 * windDirectionToText(350); // 'N'
 * windDirectionToText(null); // null
 * ```
 */
export function windDirectionToText(degrees: number | null): string | null {
  if (degrees === null) {
    return null;
  }
  const index = ((Math.round(degrees / 22.5) % 16) + 16) % 16;
  return COMPASS_POINTS[index];
}

/**
 * Facility type guessed from a course or facility name.
 *
 * @example
 * ```typescript
 * courseTypeForName('Eastside Driving Range'); // 'Driving Range'
 * courseTypeForName('Putt Putt Mini Golf');    // 'Mini Golf'
 * courseTypeForName('Pebble Creek');           // 'Golf Course'
 * ```
 */
export function courseTypeForName(name: string): string {
  const lower = name.toLowerCase();
  if (lower.includes('range')) {
    return 'Driving Range';
  }
  if (lower.includes('mini golf') || lower.includes('miniature')) {
    return 'Mini Golf';
  }
  if (lower.includes('practice')) {
    return 'Practice Facility';
  }
  return 'Golf Course';
}
