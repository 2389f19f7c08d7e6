/**
 * sync_timetable Tool
 * Extracted timetable -> weekly recurring reservations for one semester
 */

import type { ExtractedTimetable } from '../types/index.js';
import type { ExtractionOracle } from '../oracles/extraction.js';
import type { SyncReport, TimetableService } from '../services/timetable-service.js';
import type { SyncTimetableInput } from '../schemas/tool-inputs.js';
import { adminRequiredError, validationError } from '../utils/error.js';

/**
 * Resolve the timetable: the inline one, or the document run through extraction
 */
export async function loadTimetable(
  input: Pick<SyncTimetableInput, 'documentPath' | 'timetable'>,
  getExtraction: () => ExtractionOracle
): Promise<ExtractedTimetable> {
  if (input.timetable) {
    return input.timetable;
  }
  if (!input.documentPath) {
    throw validationError('Provide either documentPath or timetable');
  }

  return getExtraction().extractFile(input.documentPath);
}

/**
 * Execute sync_timetable tool
 */
export async function executeSyncTimetable(
  input: SyncTimetableInput,
  timetableService: TimetableService,
  getExtraction: () => ExtractionOracle
): Promise<SyncReport> {
  // Refuse before spending an extraction call
  if (input.requester.role !== 'admin') {
    throw adminRequiredError('timetable sync');
  }

  const timetable = await loadTimetable(input, getExtraction);
  return timetableService.sync(timetable, input.semesterStart, input.semesterEnd, input.requester);
}

/**
 * One line per timetable row
 */
export function formatSyncLines(report: SyncReport): string[] {
  return report.results.map(result =>
    result.ok
      ? `✅ ${result.event.summary} (${result.event.day} ${result.event.start_time}-${result.event.end_time})`
      : `❌ ${result.event.summary}: ${result.error}`
  );
}

/**
 * Format result for MCP response
 */
export function formatSyncTimetableResult(report: SyncReport): string {
  const lines: string[] = [];

  lines.push(`📚 **Timetable sync for ${report.audienceTag}** (${report.branch})`);
  lines.push(`Created ${report.created}, failed ${report.failed}`);
  lines.push('');
  lines.push(...formatSyncLines(report));

  if (report.created > 0) {
    lines.push('');
    lines.push(`Undo with rollback_sync for "${report.audienceTag}".`);
  }

  return lines.join('\n');
}
