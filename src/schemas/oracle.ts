/**
 * Zod schemas for oracle output
 * Oracles return loosely shaped JSON; every field has a documented default.
 */

import { z } from 'zod';

const text = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform(value => value?.trim() || fallback);

// ─────────────────────────────────────────────────────────────────────────────
// Extraction oracle
// ─────────────────────────────────────────────────────────────────────────────

export const TimetableEventSchema = z.object({
  summary: z.string().min(1),
  day: z.string().min(1),
  start_time: z.string(),
  end_time: z.string(),
  description: text(''),
});

export const ExtractedTimetableSchema = z.object({
  metadata: z
    .object({
      semester: text('Unknown Semester'),
      branch: text('Unknown Branch'),
    })
    .nullish()
    .transform(value => value ?? { semester: 'Unknown Semester', branch: 'Unknown Branch' }),
  events: z.array(TimetableEventSchema).nullish().transform(value => value ?? []),
});

// ─────────────────────────────────────────────────────────────────────────────
// Intent oracle
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_DURATION_MINUTES = 60;

export const IntentSuggestionSchema = z.object({
  display: z.string(),
  start_iso: z.string(),
  end_iso: z.string(),
});

const IntentSchema = z.object({
  event_name: text('Event'),
  duration_minutes: z.coerce
    .number()
    .int()
    .positive()
    .nullish()
    .transform(value => value ?? DEFAULT_DURATION_MINUTES),
  target_semesters: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform(value => {
      const tags = (typeof value === 'string' ? [value] : value ?? []).filter(tag => tag.trim() !== '');
      return tags.length > 0 ? tags : ['All'];
    }),
});

export const IntentResultSchema = z.object({
  explanation: text(''),
  intent: IntentSchema.nullish().transform(
    value => value ?? { event_name: 'Event', duration_minutes: DEFAULT_DURATION_MINUTES, target_semesters: ['All'] }
  ),
  suggestions: z.array(IntentSuggestionSchema).nullish().transform(value => value ?? []),
});
