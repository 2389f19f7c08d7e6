/**
 * cleanup_past_events Tool
 */

import type { BookingService } from '../services/booking-service.js';

/**
 * Execute cleanup_past_events tool
 */
export async function executeCleanupPastEvents(bookingService: BookingService): Promise<number> {
  return bookingService.cleanupExpired();
}

/**
 * Format result for MCP response
 */
export function formatCleanupPastEventsResult(deleted: number): string {
  return deleted === 0
    ? 'No past events to clean up.'
    : `🧹 Removed ${deleted} past event(s) from the temporary calendar.`;
}
