/**
 * Services Index
 * Export all service classes and factory functions
 */

export {
  ConflictService,
  getConflictService,
  resetConflictService,
  partitionReports,
} from './conflict-service.js';

export {
  SlotService,
  getSlotService,
  resetSlotService,
  SEARCH_HORIZON_DAYS,
  SEARCH_WINDOWS,
  STEP_MINUTES,
  MAX_SUGGESTIONS,
} from './slot-service.js';

export {
  BookingService,
  getBookingService,
  resetBookingService,
  CANCELLATION_WINDOW_HOURS,
} from './booking-service.js';
export type { BookingServiceOptions } from './booking-service.js';

export {
  TimetableService,
  getTimetableService,
  resetTimetableService,
  SYNC_SUMMARY_PREFIX,
} from './timetable-service.js';
export type { SyncReport, SyncResult } from './timetable-service.js';

export {
  firstOccurrence,
  buildRecurrenceRule,
  parseRecurrenceRule,
  parseWeekday,
} from './recurrence.js';
