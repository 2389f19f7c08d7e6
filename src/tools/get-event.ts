/**
 * get_event Tool
 * Get full details of a reservation
 */

import type { IEventStore, Reservation } from '../types/index.js';
import type { GetEventInput } from '../schemas/tool-inputs.js';
import { formatDayHeading, formatTimeRange, parseDateTime } from '../utils/datetime.js';

/**
 * Execute get_event tool
 */
export async function executeGetEvent(
  input: GetEventInput,
  store: IEventStore
): Promise<Reservation> {
  return store.get(input.eventId, input.partition);
}

/**
 * Format result for MCP response
 */
export function formatGetEventResult(reservation: Reservation): string {
  const lines: string[] = [];

  lines.push(`# ${reservation.summary}`);
  lines.push('');

  lines.push(`📅 **Date:** ${formatDayHeading(parseDateTime(reservation.window.start))}`);
  lines.push(`🕐 **Time:** ${formatTimeRange(reservation.window.start, reservation.window.end)}`);

  if (reservation.recurrenceRule) {
    lines.push(`🔁 **Repeats:** \`${reservation.recurrenceRule}\``);
  }

  lines.push('');
  lines.push(`👥 **Audience:** ${reservation.audienceTag}`);
  if (reservation.branch) {
    lines.push(`🏫 **Branch:** ${reservation.branch}`);
  }
  lines.push(`👤 **Created by:** ${reservation.creator}`);

  lines.push('');
  lines.push('---');
  lines.push(`**Partition:** ${reservation.partition}`);
  lines.push(`**Event ID:** \`${reservation.id}\``);
  if (reservation.seriesId) {
    lines.push(`**Series ID:** \`${reservation.seriesId}\``);
  }

  return lines.join('\n');
}
