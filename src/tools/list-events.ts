/**
 * list_events Tool
 * Reservations in a time range, grouped by day
 */

import type { IEventStore, Partition, Reservation } from '../types/index.js';
import type { ListEventsInput } from '../schemas/tool-inputs.js';
import { isAudienceRelevant, normalizeAudienceFilter } from '../utils/audience.js';
import { formatDayHeading, formatTimeRange, parseDateTime, toDateString, toWindow } from '../utils/datetime.js';
import { validateTimeRange } from '../utils/validation.js';

export interface ListEventsResult {
  reservations: Reservation[];
}

/**
 * Execute list_events tool
 */
export async function executeListEvents(
  input: ListEventsInput,
  store: IEventStore
): Promise<ListEventsResult> {
  const { start, end } = validateTimeRange(input.start, input.end);
  const window = toWindow(start, end);
  const partitions: Partition[] =
    input.partition === 'all' ? ['recurring', 'transient'] : [input.partition];

  const lists = await Promise.all(partitions.map(partition => store.listInRange(partition, window)));
  let reservations = lists.flat();

  if (input.audience !== undefined) {
    const filter = normalizeAudienceFilter(input.audience);
    reservations = reservations.filter(
      reservation =>
        reservation.partition === 'transient' || isAudienceRelevant(filter, reservation.audienceTag)
    );
  }

  reservations.sort(
    (a, b) => parseDateTime(a.window.start).toMillis() - parseDateTime(b.window.start).toMillis()
  );

  return { reservations };
}

/**
 * Format result for MCP response
 */
export function formatListEventsResult(result: ListEventsResult): string {
  if (result.reservations.length === 0) {
    return 'No events found in the specified time range.';
  }

  const lines: string[] = [];
  lines.push(`Found ${result.reservations.length} event(s):\n`);

  // Group events by date
  const byDate = new Map<string, Reservation[]>();
  for (const reservation of result.reservations) {
    const day = toDateString(parseDateTime(reservation.window.start));
    const group = byDate.get(day);
    if (group) {
      group.push(reservation);
    } else {
      byDate.set(day, [reservation]);
    }
  }

  for (const [day, reservations] of byDate) {
    lines.push(`## ${formatDayHeading(parseDateTime(day))}\n`);

    for (const reservation of reservations) {
      const icon = reservation.partition === 'recurring' ? '📚' : '📌';
      lines.push(`${icon} **${reservation.summary}**`);
      lines.push(`   🕐 ${formatTimeRange(reservation.window.start, reservation.window.end)}`);
      lines.push(`   👥 ${reservation.audienceTag}`);
      lines.push(`   🆔 \`${reservation.id}\``);
      lines.push('');
    }
  }

  return lines.join('\n');
}
