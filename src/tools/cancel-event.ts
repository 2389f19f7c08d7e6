/**
 * cancel_event Tool
 */

import type { Reservation } from '../types/index.js';
import type { BookingService } from '../services/booking-service.js';
import type { CancelEventInput } from '../schemas/tool-inputs.js';
import { formatTimeRange } from '../utils/datetime.js';

/**
 * Execute cancel_event tool
 */
export async function executeCancelEvent(
  input: CancelEventInput,
  bookingService: BookingService
): Promise<Reservation> {
  return bookingService.cancel(input.eventId, input.requester);
}

/**
 * Format result for MCP response
 */
export function formatCancelEventResult(reservation: Reservation): string {
  return [
    '🗑️ **Event cancelled**',
    '',
    `**${reservation.summary}** (${formatTimeRange(reservation.window.start, reservation.window.end)})`,
  ].join('\n');
}
