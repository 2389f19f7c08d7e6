/**
 * Common Zod schemas shared across tool definitions
 */

import { z } from 'zod';

/**
 * Storage partition enum
 */
export const PartitionSchema = z.enum(['recurring', 'transient']);

/**
 * Day of week enum
 */
export const DayOfWeekSchema = z.enum([
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]);

/**
 * ISO datetime string (basic validation)
 */
export const ISODateTimeSchema = z.string().refine(
  (val) => !isNaN(Date.parse(val)),
  { message: 'Must be a valid ISO 8601 datetime string' }
);

/**
 * Calendar date, YYYY-MM-DD
 */
export const DateStringSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be in YYYY-MM-DD format');

/**
 * Audience filter: "All", one tag, or several
 */
export const AudienceInputSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Identity of the caller; passed on every request
 */
export const RequesterSchema = z.object({
  id: z.string().min(1).describe('Identity of the caller, e.g. an email address'),
  role: z.enum(['admin', 'member']).optional().default('member'),
});
