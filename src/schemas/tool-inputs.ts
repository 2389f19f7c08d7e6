/**
 * Zod schemas for MCP tool inputs
 */

import { z } from 'zod';
import {
  AudienceInputSchema,
  DateStringSchema,
  DayOfWeekSchema,
  ISODateTimeSchema,
  PartitionSchema,
  RequesterSchema,
} from './common.js';
import { ExtractedTimetableSchema } from './oracle.js';

// ─────────────────────────────────────────────────────────────────────────────
// check_conflicts
// ─────────────────────────────────────────────────────────────────────────────

export const CheckConflictsInputSchema = z.object({
  start: ISODateTimeSchema.describe('Start of the proposed window (ISO 8601)'),
  end: ISODateTimeSchema.describe('End of the proposed window (ISO 8601)'),
  audience: AudienceInputSchema.optional().default('All')
    .describe('"All", a tag such as "Sem 3", or a list of tags'),
});

export type CheckConflictsInput = z.infer<typeof CheckConflictsInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// suggest_slots
// ─────────────────────────────────────────────────────────────────────────────

export const SuggestSlotsInputSchema = z.object({
  start: ISODateTimeSchema.describe('Reference time to search forward from (ISO 8601)'),
  durationMinutes: z.number().int().positive().max(420).optional().default(60)
    .describe('Length of the wanted slot in minutes'),
  audience: AudienceInputSchema.optional().default('All')
    .describe('"All", a tag such as "Sem 3", or a list of tags'),
  allowedWeekdays: z.array(DayOfWeekSchema).optional()
    .describe('Only suggest slots on these weekdays'),
});

export type SuggestSlotsInput = z.infer<typeof SuggestSlotsInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// book_event
// ─────────────────────────────────────────────────────────────────────────────

export const BookEventInputSchema = z.object({
  summary: z.string().min(1).max(500).describe('Event title'),
  start: ISODateTimeSchema.describe('Start time (ISO 8601)'),
  end: ISODateTimeSchema.describe('End time (ISO 8601)'),
  audience: AudienceInputSchema.optional().default('All')
    .describe('Target audience: "All", a tag such as "Sem 3", or a list of tags'),
  branch: z.string().optional().describe('Branch recorded with the booking'),
  allowedWeekdays: z.array(DayOfWeekSchema).optional()
    .describe('Restrict alternative suggestions to these weekdays'),
  requester: RequesterSchema.describe('Who is booking'),
});

export type BookEventInput = z.infer<typeof BookEventInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// cancel_event
// ─────────────────────────────────────────────────────────────────────────────

export const CancelEventInputSchema = z.object({
  eventId: z.string().min(1).describe('ID of the booking to cancel'),
  requester: RequesterSchema.describe('Who is cancelling'),
});

export type CancelEventInput = z.infer<typeof CancelEventInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// get_event
// ─────────────────────────────────────────────────────────────────────────────

export const GetEventInputSchema = z.object({
  eventId: z.string().min(1).describe('Reservation ID'),
  partition: PartitionSchema.optional()
    .describe('Partition to look in (default: both)'),
});

export type GetEventInput = z.infer<typeof GetEventInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// list_events
// ─────────────────────────────────────────────────────────────────────────────

export const ListEventsInputSchema = z.object({
  start: ISODateTimeSchema.describe('Start of time range (ISO 8601)'),
  end: ISODateTimeSchema.describe('End of time range (ISO 8601)'),
  partition: PartitionSchema.or(z.literal('all')).optional().default('all')
    .describe('Which partition to list, or "all"'),
  audience: AudienceInputSchema.optional()
    .describe('Only show recurring entries relevant to this audience'),
});

export type ListEventsInput = z.infer<typeof ListEventsInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// sync_timetable
// ─────────────────────────────────────────────────────────────────────────────

export const SyncTimetableInputSchema = z.object({
  documentPath: z.string().min(1).optional()
    .describe('Path to a timetable PDF on the server; sent to the extraction oracle'),
  timetable: ExtractedTimetableSchema.optional()
    .describe('Already extracted timetable, used instead of a document'),
  semesterStart: DateStringSchema.describe('First day of the semester (YYYY-MM-DD)'),
  semesterEnd: DateStringSchema.describe('Last day of the semester (YYYY-MM-DD)'),
  requester: RequesterSchema.describe('Must be an admin'),
}).refine(
  (input) => input.documentPath !== undefined || input.timetable !== undefined,
  { message: 'Provide either documentPath or timetable' }
);

export type SyncTimetableInput = z.infer<typeof SyncTimetableInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// rollback_sync
// ─────────────────────────────────────────────────────────────────────────────

export const RollbackSyncInputSchema = z.object({
  audienceTag: z.string().min(1).describe('Tag whose synced timetable is removed, e.g. "Sem 3"'),
  requester: RequesterSchema.describe('Must be an admin'),
});

export type RollbackSyncInput = z.infer<typeof RollbackSyncInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// cleanup_past_events
// ─────────────────────────────────────────────────────────────────────────────

export const CleanupPastEventsInputSchema = z.object({});

export type CleanupPastEventsInput = z.infer<typeof CleanupPastEventsInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// interpret_request
// ─────────────────────────────────────────────────────────────────────────────

export const InterpretRequestInputSchema = z.object({
  text: z.string().min(1).max(4000).describe('Natural-language scheduling request'),
  context: z.string().max(4000).optional()
    .describe('Prior availability context, e.g. a conflict report'),
});

export type InterpretRequestInput = z.infer<typeof InterpretRequestInputSchema>;
