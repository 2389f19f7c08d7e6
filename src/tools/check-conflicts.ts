/**
 * check_conflicts Tool
 * Audience-aware conflict check for a proposed window
 */

import type { AudienceFilter, ConflictReport } from '../types/index.js';
import type { BookingService } from '../services/booking-service.js';
import type { CheckConflictsInput } from '../schemas/tool-inputs.js';
import { describeAudience, normalizeAudienceFilter } from '../utils/audience.js';
import { formatTimeRange } from '../utils/datetime.js';

export interface CheckConflictsResult {
  start: string;
  end: string;
  audience: AudienceFilter;
  reports: ConflictReport[];
}

/**
 * Execute check_conflicts tool
 */
export async function executeCheckConflicts(
  input: CheckConflictsInput,
  booking: BookingService
): Promise<CheckConflictsResult> {
  const audience = normalizeAudienceFilter(input.audience);
  const reports = await booking.preview(
    { start: input.start, end: input.end },
    audience
  );
  return { start: input.start, end: input.end, audience, reports };
}

/**
 * Format result for MCP response
 */
export function formatCheckConflictsResult(result: CheckConflictsResult): string {
  const lines: string[] = [];
  const failure = result.reports.find(report => report.kind === 'store-failure');

  if (failure) {
    lines.push('⚠️ **Could not verify availability**');
    lines.push('');
    lines.push(failure.label);
    lines.push('Treat the window as unavailable until the check succeeds.');
    return lines.join('\n');
  }

  const window = formatTimeRange(result.start, result.end);

  if (result.reports.length === 0) {
    lines.push('✅ **No conflicts found!**');
    lines.push('');
    lines.push(`${window} is free for ${describeAudience(result.audience)}.`);
    return lines.join('\n');
  }

  lines.push(`⚠️ **${result.reports.length} Conflict(s) Found** for ${window}`);
  lines.push('');
  for (const report of result.reports) {
    lines.push(`- ${report.label}`);
  }

  return lines.join('\n');
}
