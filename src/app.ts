/**
 * Wiring shared by the MCP server and the sync command
 */

import type { IEventStore } from './types/index.js';
import { getEventStore, resetEventStore } from './store/index.js';
import {
  getBookingService,
  getConflictService,
  getSlotService,
  getTimetableService,
  resetBookingService,
  resetConflictService,
  resetSlotService,
  resetTimetableService,
} from './services/index.js';
import { createOracles } from './oracles/index.js';
import type { ExtractionOracle } from './oracles/extraction.js';
import type { IntentOracle } from './oracles/intent.js';
import type { ToolContext } from './tools/index.js';
import type { AppConfig } from './utils/config.js';
import type { Logger } from './utils/logger.js';

/**
 * Build both oracles on first use, so the server starts without an API key
 */
export function lazyOracles(config: AppConfig): {
  getExtraction: () => ExtractionOracle;
  getIntent: () => IntentOracle;
} {
  let oracles: ReturnType<typeof createOracles> | undefined;
  const load = () => {
    if (!oracles) {
      oracles = createOracles(config);
    }
    return oracles;
  };

  return {
    getExtraction: () => load().extraction,
    getIntent: () => load().intent,
  };
}

/**
 * Services over an already connected store
 */
export function createContext(store: IEventStore, config: AppConfig): ToolContext {
  const conflicts = getConflictService(store);
  const slots = getSlotService(conflicts);

  return {
    store,
    slots,
    booking: getBookingService(store, conflicts, slots),
    timetable: getTimetableService(store),
    ...lazyOracles(config),
  };
}

/**
 * Connect the configured store and build every service on it
 */
export async function createAppContext(config: AppConfig, logger: Logger): Promise<ToolContext> {
  logger.info(`Connecting ${config.store.type} store "${config.store.name}"...`);
  const store = await getEventStore(config.store);
  logger.info(`Store ${store.displayName} connected`);
  return createContext(store, config);
}

/**
 * Drop every service bound to the store, then disconnect it
 */
export async function disposeAppContext(): Promise<void> {
  resetBookingService();
  resetTimetableService();
  resetSlotService();
  resetConflictService();
  await resetEventStore();
}
