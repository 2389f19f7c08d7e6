/**
 * Type exports for the semester scheduler
 */

// Reservation types
export type {
  Partition,
  AudienceTag,
  AudienceFilter,
  DayOfWeek,
  TimeWindow,
  Reservation,
  NewReservation,
  Requester,
} from './reservation.js';

export { ALL_AUDIENCES, SYSTEM_CREATOR } from './reservation.js';

// Scheduling types
export type {
  ClashReport,
  StoreFailureReport,
  ConflictReport,
  Slot,
  BookingRequest,
  BookingOutcome,
} from './scheduling.js';

// Store types
export type {
  StoreType,
  BaseStoreConfig,
  GoogleStoreConfig,
  MemoryStoreConfig,
  StoreConfig,
  IEventStore,
} from './store.js';

// Oracle types
export type {
  TimetableEvent,
  ExtractedTimetable,
  IntentSuggestion,
  IntentResult,
} from './oracle.js';
