import { describe, it, expect, beforeEach, vi } from 'vitest';
import { USAGE, runSyncCommand, type SyncCommandDeps } from '../src/cli/sync-command.js';
import { TimetableService } from '../src/services/timetable-service.js';
import type { ExtractedTimetable } from '../src/types/index.js';
import { ErrorCodes, SchedulerError } from '../src/utils/error.js';
import { silentLogger } from '../src/utils/logger.js';
import { createStore } from './helpers.js';

const extracted: ExtractedTimetable = {
  metadata: { semester: 'Semester III', branch: 'CSE' },
  events: [
    { summary: 'Maths', day: 'Wednesday', start_time: '10:00', end_time: '11:00', description: '' },
  ],
};

describe('runSyncCommand', () => {
  let out: string[];
  let err: string[];
  let deps: SyncCommandDeps;

  beforeEach(async () => {
    out = [];
    err = [];
    deps = {
      timetable: new TimetableService(await createStore(), silentLogger),
      extract: vi.fn(async () => extracted),
      readDocument: vi.fn(async () => new Uint8Array([1, 2, 3])),
      prompt: vi.fn(async () => ''),
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    };
  });

  it('prints usage without a document', async () => {
    expect(await runSyncCommand([], deps)).toBe(2);
    expect(err).toEqual([USAGE]);
  });

  it('syncs with dates from flags', async () => {
    const code = await runSyncCommand(['timetables/sem3.pdf', '--start', '2026-01-05', '--end', '2026-04-10'], deps);

    expect(code).toBe(0);
    expect(deps.prompt).not.toHaveBeenCalled();
    expect(deps.extract).toHaveBeenCalledWith(new Uint8Array([1, 2, 3]), 'sem3.pdf');
    expect(out).toEqual([
      'Extracting timetable from timetables/sem3.pdf...',
      '✅ Maths (Wednesday 10:00-11:00)',
      'Synced 1 of 1 event(s) for Sem 3 (CSE)',
    ]);
  });

  it('prompts for missing dates', async () => {
    const prompt = vi.fn<SyncCommandDeps['prompt']>()
      .mockResolvedValueOnce(' 2026-01-05 ')
      .mockResolvedValueOnce('2026-04-10');

    const code = await runSyncCommand(['sem3.pdf'], { ...deps, prompt });

    expect(code).toBe(0);
    expect(prompt.mock.calls.map(([question]) => question)).toEqual([
      'Semester start date (YYYY-MM-DD): ',
      'Semester end date (YYYY-MM-DD): ',
    ]);
  });

  it('fails on a malformed date without calling extraction', async () => {
    const code = await runSyncCommand(['sem3.pdf', '--start', '05/01/2026', '--end', '2026-04-10'], deps);

    expect(code).toBe(1);
    expect(err).toEqual(['Invalid date: INVALID_DATE: Invalid date/time "05/01/2026". Expected YYYY-MM-DD.']);
    expect(deps.extract).not.toHaveBeenCalled();
  });

  it('fails when extraction fails', async () => {
    const code = await runSyncCommand(['sem3.pdf', '--start', '2026-01-05', '--end', '2026-04-10'], {
      ...deps,
      extract: async () => {
        throw new SchedulerError('No JSON object found in oracle response', ErrorCodes.ORACLE_ERROR);
      },
    });

    expect(code).toBe(1);
    expect(err).toEqual(['Extraction failed: ORACLE_ERROR: No JSON object found in oracle response']);
  });

  it('exits non-zero when any row fails', async () => {
    const code = await runSyncCommand(['sem3.pdf', '--start', '2026-01-05', '--end', '2026-04-10'], {
      ...deps,
      extract: async () => ({
        ...extracted,
        events: [...extracted.events, { summary: 'Lab', day: 'Wednesday', start_time: '25:00', end_time: '26:00', description: '' }],
      }),
    });

    expect(code).toBe(1);
    expect(out[2]).toBe('❌ Lab: Invalid date/time "25:00". Expected HH:MM.');
  });

  it('rejects unknown flags', async () => {
    expect(await runSyncCommand(['sem3.pdf', '--semester', 'x'], deps)).toBe(2);
    expect(err[1]).toBe(USAGE);
  });
});
