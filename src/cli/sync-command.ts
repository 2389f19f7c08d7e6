/**
 * Batch timetable sync command
 *
 *   semester-scheduler-sync <document> [--start YYYY-MM-DD --end YYYY-MM-DD]
 *
 * Missing dates are prompted for. Returns the process exit code.
 */

import { basename } from 'node:path';
import { parseArgs } from 'node:util';
import type { ExtractedTimetable, Requester } from '../types/index.js';
import type { TimetableService } from '../services/timetable-service.js';
import { formatSyncLines } from '../tools/sync-timetable.js';
import { SchedulerError } from '../utils/error.js';
import { validateDateRange } from '../utils/validation.js';

export const USAGE = 'Usage: semester-scheduler-sync <document> [--start YYYY-MM-DD --end YYYY-MM-DD]';

/**
 * Identity the command syncs as
 */
export const CLI_REQUESTER: Requester = { id: 'cli', role: 'admin' };

export interface SyncCommandDeps {
  timetable: TimetableService;
  extract: (document: Uint8Array, filename: string) => Promise<ExtractedTimetable>;
  readDocument: (path: string) => Promise<Uint8Array>;
  prompt: (question: string) => Promise<string>;
  out: (line: string) => void;
  err: (line: string) => void;
}

function describe(error: unknown): string {
  if (error instanceof SchedulerError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

function parseCommandArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
    },
  });
}

export async function runSyncCommand(argv: string[], deps: SyncCommandDeps): Promise<number> {
  let parsed: ReturnType<typeof parseCommandArgs>;
  try {
    parsed = parseCommandArgs(argv);
  } catch (error) {
    deps.err(describe(error));
    deps.err(USAGE);
    return 2;
  }

  const [documentPath] = parsed.positionals;
  if (!documentPath) {
    deps.err(USAGE);
    return 2;
  }

  let semesterStart: string;
  let semesterEnd: string;
  try {
    semesterStart = (parsed.values.start ?? (await deps.prompt('Semester start date (YYYY-MM-DD): '))).trim();
    semesterEnd = (parsed.values.end ?? (await deps.prompt('Semester end date (YYYY-MM-DD): '))).trim();
    validateDateRange(semesterStart, semesterEnd);
  } catch (error) {
    deps.err(`Invalid date: ${describe(error)}`);
    return 1;
  }

  let extracted: ExtractedTimetable;
  try {
    const document = await deps.readDocument(documentPath);
    deps.out(`Extracting timetable from ${documentPath}...`);
    extracted = await deps.extract(document, basename(documentPath));
  } catch (error) {
    deps.err(`Extraction failed: ${describe(error)}`);
    return 1;
  }

  try {
    const report = await deps.timetable.sync(extracted, semesterStart, semesterEnd, CLI_REQUESTER);
    for (const line of formatSyncLines(report)) {
      deps.out(line);
    }
    deps.out(`Synced ${report.created} of ${report.results.length} event(s) for ${report.audienceTag} (${report.branch})`);
    return report.failed > 0 ? 1 : 0;
  } catch (error) {
    deps.err(`Sync failed: ${describe(error)}`);
    return 1;
  }
}
