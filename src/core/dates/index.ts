/**
 * Date Utilities - Barrel Export
 */

export {
  formatMediumDateTime,
  formatFileTimestamp,
  isSameCalendarDay,
  parseFlexibleDate,
} from './date-format';
