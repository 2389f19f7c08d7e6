/**
 * Extraction oracle: timetable document -> structured timetable
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { ExtractedTimetable } from '../types/index.js';
import type { AppConfig } from '../utils/config.js';
import { ErrorCodes, SchedulerError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { validateDocumentSize } from '../utils/validation.js';
import { ExtractedTimetableSchema } from '../schemas/oracle.js';
import { extractJsonObject } from './json.js';
import type { LLM } from './llm.js';

export const EXTRACTION_PROMPT = `Extract the weekly timetable and header metadata from the attached document.
Return JSON in this format ONLY:

{
  "metadata": {
    "semester": "e.g., 4th Semester",
    "branch": "e.g., Information Technology"
  },
  "events": [
    {
      "summary": "Course or activity name",
      "day": "Monday",
      "start_time": "HH:MM",
      "end_time": "HH:MM",
      "description": ""
    }
  ]
}

Use 24-hour HH:MM times. One entry per weekly session.`;

/**
 * Read a timetable document, refusing oversized files before loading them
 */
export async function readTimetableDocument(path: string, maxBytes: number): Promise<Uint8Array> {
  const { size } = await stat(path);
  validateDocumentSize(size, maxBytes);
  return readFile(path);
}

export interface ExtractionOracleOptions {
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class ExtractionOracle {
  private logger: Logger;

  constructor(
    private llm: LLM,
    private config: Pick<AppConfig, 'oracle' | 'request'>,
    private options: ExtractionOracleOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('extraction');
  }

  async extractFile(path: string): Promise<ExtractedTimetable> {
    const document = await readTimetableDocument(path, this.config.oracle.maxDocumentBytes);
    return this.extract(document, basename(path));
  }

  async extract(document: Uint8Array, filename = 'timetable.pdf'): Promise<ExtractedTimetable> {
    validateDocumentSize(document.byteLength, this.config.oracle.maxDocumentBytes);

    const output = await withRetry(
      () =>
        this.llm.text({
          user: EXTRACTION_PROMPT,
          document: { data: document, filename, mimeType: 'application/pdf' },
          timeoutMs: this.config.request.timeout,
        }),
      {
        maxAttempts: this.config.request.maxRetries,
        baseDelayMs: this.config.request.retryDelay,
        sleep: this.options.sleep,
        logger: this.logger,
      }
    );

    const parsed = ExtractedTimetableSchema.safeParse(extractJsonObject(output));
    if (!parsed.success) {
      throw new SchedulerError(
        `Extraction returned an unexpected shape: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        ErrorCodes.ORACLE_ERROR,
        { details: { issues: parsed.error.issues.length } }
      );
    }

    this.logger.info(`Extracted ${parsed.data.events.length} event(s) for ${parsed.data.metadata.semester}`);
    return parsed.data;
  }
}
