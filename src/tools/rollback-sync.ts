/**
 * rollback_sync Tool
 */

import type { TimetableService } from '../services/timetable-service.js';
import type { RollbackSyncInput } from '../schemas/tool-inputs.js';
import { normalizeSemesterTag } from '../utils/audience.js';

export interface RollbackSyncResult {
  audienceTag: string;
  deleted: number;
}

/**
 * Execute rollback_sync tool
 */
export async function executeRollbackSync(
  input: RollbackSyncInput,
  timetableService: TimetableService
): Promise<RollbackSyncResult> {
  const deleted = await timetableService.rollback(input.audienceTag, input.requester);
  return { audienceTag: normalizeSemesterTag(input.audienceTag), deleted };
}

/**
 * Format result for MCP response
 */
export function formatRollbackSyncResult(result: RollbackSyncResult): string {
  return result.deleted === 0
    ? `Nothing to roll back for ${result.audienceTag}.`
    : `🗑️ Removed ${result.deleted} recurring event(s) for ${result.audienceTag}.`;
}
