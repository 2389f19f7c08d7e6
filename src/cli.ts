#!/usr/bin/env node
/**
 * Batch timetable sync entry point
 */

import { createInterface } from 'node:readline/promises';
import { getConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { createAppContext, disposeAppContext } from './app.js';
import { runSyncCommand } from './cli/sync-command.js';
import { readTimetableDocument } from './oracles/extraction.js';

const logger = createLogger('cli');

async function main(): Promise<number> {
  const config = getConfig();
  const context = await createAppContext(config, logger);
  const rl = createInterface({ input: process.stdin, output: process.stderr });

  try {
    return await runSyncCommand(process.argv.slice(2), {
      timetable: context.timetable,
      extract: (document, filename) => context.getExtraction().extract(document, filename),
      readDocument: (path) => readTimetableDocument(path, config.oracle.maxDocumentBytes),
      prompt: (question) => rl.question(question),
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    });
  } finally {
    rl.close();
    await disposeAppContext();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Fatal error:', error);
    process.exitCode = 1;
  });
