/**
 * book_event Tool
 * Check, then commit a one-off booking or return alternatives
 */

import type { BookingOutcome } from '../types/index.js';
import type { BookingService } from '../services/booking-service.js';
import type { BookEventInput } from '../schemas/tool-inputs.js';
import { formatTimeRange } from '../utils/datetime.js';
import { formatSlotLines } from './suggest-slots.js';

/**
 * Execute book_event tool
 */
export async function executeBookEvent(
  input: BookEventInput,
  bookingService: BookingService
): Promise<BookingOutcome> {
  return bookingService.book({
    summary: input.summary,
    window: { start: input.start, end: input.end },
    audience: input.audience,
    requester: input.requester,
    allowedWeekdays: input.allowedWeekdays,
    branch: input.branch,
  });
}

/**
 * Format result for MCP response
 */
export function formatBookEventResult(outcome: BookingOutcome): string {
  const lines: string[] = [];

  switch (outcome.status) {
    case 'committed': {
      const { reservation } = outcome;
      lines.push('✅ **Event booked!**');
      lines.push('');
      lines.push(`**${reservation.summary}**`);
      lines.push(`🕐 ${formatTimeRange(reservation.window.start, reservation.window.end)}`);
      lines.push(`👥 ${reservation.audienceTag}`);
      lines.push(`🆔 \`${reservation.id}\``);
      lines.push('');
      lines.push('It can be cancelled by its creator or an admin within 48 hours.');
      break;
    }

    case 'suggested':
      lines.push(`⚠️ **Not booked: ${outcome.conflicts.length} conflict(s)**`);
      lines.push('');
      for (const conflict of outcome.conflicts) {
        lines.push(`- ${conflict.label}`);
      }
      lines.push('');
      lines.push('💡 **Free alternatives:**');
      lines.push(...formatSlotLines(outcome.suggestions));
      break;

    case 'rejected':
      lines.push(`❌ **Not booked: ${outcome.conflicts.length} conflict(s)**`);
      lines.push('');
      for (const conflict of outcome.conflicts) {
        lines.push(`- ${conflict.label}`);
      }
      lines.push('');
      lines.push('No free alternative was found in the next 8 days.');
      break;

    case 'failed':
      lines.push('⚠️ **Not booked: availability could not be verified**');
      lines.push('');
      lines.push(outcome.failure.label);
      break;
  }

  return lines.join('\n');
}
