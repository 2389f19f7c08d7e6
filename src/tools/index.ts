/**
 * MCP Tool Registry
 * Exports all tool implementations and registration function
 */

// Tool implementations
export * from './check-conflicts.js';
export * from './suggest-slots.js';
export * from './book-event.js';
export * from './cancel-event.js';
export * from './get-event.js';
export * from './list-events.js';
export * from './sync-timetable.js';
export * from './rollback-sync.js';
export * from './cleanup-past-events.js';
export * from './interpret-request.js';

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { IEventStore } from '../types/index.js';
import type { BookingService } from '../services/booking-service.js';
import type { SlotService } from '../services/slot-service.js';
import type { TimetableService } from '../services/timetable-service.js';
import type { ExtractionOracle } from '../oracles/extraction.js';
import type { IntentOracle } from '../oracles/intent.js';
import { SchedulerError, formatErrorForMCP, isFatalError } from '../utils/error.js';
import type { Logger } from '../utils/logger.js';

import {
  BookEventInputSchema,
  CancelEventInputSchema,
  CheckConflictsInputSchema,
  CleanupPastEventsInputSchema,
  GetEventInputSchema,
  InterpretRequestInputSchema,
  ListEventsInputSchema,
  RollbackSyncInputSchema,
  SuggestSlotsInputSchema,
  SyncTimetableInputSchema,
} from '../schemas/tool-inputs.js';

import { executeCheckConflicts, formatCheckConflictsResult } from './check-conflicts.js';
import { executeSuggestSlots, formatSuggestSlotsResult } from './suggest-slots.js';
import { executeBookEvent, formatBookEventResult } from './book-event.js';
import { executeCancelEvent, formatCancelEventResult } from './cancel-event.js';
import { executeGetEvent, formatGetEventResult } from './get-event.js';
import { executeListEvents, formatListEventsResult } from './list-events.js';
import { executeSyncTimetable, formatSyncTimetableResult } from './sync-timetable.js';
import { executeRollbackSync, formatRollbackSyncResult } from './rollback-sync.js';
import { executeCleanupPastEvents, formatCleanupPastEventsResult } from './cleanup-past-events.js';
import { executeInterpretRequest, formatInterpretRequestResult } from './interpret-request.js';

/**
 * MCP tool input schemas must be JSON objects at the top level
 */
function toInputSchema(schema: z.ZodTypeAny) {
  return { ...zodToJsonSchema(schema, { $refStrategy: 'none' }), type: 'object' as const };
}

/**
 * Tool definitions for MCP registration
 */
export const toolDefinitions = [
  {
    name: 'check_conflicts',
    description: 'Check whether a proposed window clashes with classes of the given audience or with any one-off event. Touching windows do not clash. Reports an error instead of "free" when the calendar cannot be read.',
    inputSchema: toInputSchema(CheckConflictsInputSchema),
  },
  {
    name: 'suggest_slots',
    description: 'Suggest up to two conflict-free slots of the requested length between 09:00 and 16:00, searching forward up to 8 days from the reference time in 30-minute steps.',
    inputSchema: toInputSchema(SuggestSlotsInputSchema),
  },
  {
    name: 'book_event',
    description: 'Book a one-off event. The window is re-checked immediately before writing; on a clash nothing is written and free alternatives are returned instead.',
    inputSchema: toInputSchema(BookEventInputSchema),
  },
  {
    name: 'cancel_event',
    description: 'Cancel a one-off event. Only its creator or an admin may cancel, and only within 48 hours of booking.',
    inputSchema: toInputSchema(CancelEventInputSchema),
  },
  {
    name: 'get_event',
    description: 'Get full details of a class or one-off event by ID.',
    inputSchema: toInputSchema(GetEventInputSchema),
  },
  {
    name: 'list_events',
    description: 'List classes and one-off events in a time range, grouped by day. Optionally keep only classes relevant to an audience.',
    inputSchema: toInputSchema(ListEventsInputSchema),
  },
  {
    name: 'sync_timetable',
    description: 'Admin only. Write a semester timetable as weekly repeating classes, from a PDF on the server or an already extracted timetable. Reports the outcome of every row.',
    inputSchema: toInputSchema(SyncTimetableInputSchema),
  },
  {
    name: 'rollback_sync',
    description: 'Admin only. Remove every synced class for a semester tag such as "Sem 3".',
    inputSchema: toInputSchema(RollbackSyncInputSchema),
  },
  {
    name: 'cleanup_past_events',
    description: 'Delete one-off events that have already ended.',
    inputSchema: toInputSchema(CleanupPastEventsInputSchema),
  },
  {
    name: 'interpret_request',
    description: 'Turn a free-text scheduling request into an event name, duration and audience. Its suggested times are unverified; confirm them with check_conflicts.',
    inputSchema: toInputSchema(InterpretRequestInputSchema),
  },
];

/**
 * Tool result returned to the MCP client
 */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<ToolResult>;

/**
 * Services and lazily built oracles the tools run against
 */
export interface ToolContext {
  store: IEventStore;
  slots: SlotService;
  booking: BookingService;
  timetable: TimetableService;
  getExtraction: () => ExtractionOracle;
  getIntent: () => IntentOracle;
}

const text = (value: string): ToolResult => ({ content: [{ type: 'text', text: value }] });

/**
 * Create tool handlers with injected services
 */
export function createToolHandlers(context: ToolContext): Record<string, ToolHandler> {
  return {
    check_conflicts: async (args) => {
      const input = CheckConflictsInputSchema.parse(args);
      return text(formatCheckConflictsResult(await executeCheckConflicts(input, context.booking)));
    },

    suggest_slots: async (args) => {
      const input = SuggestSlotsInputSchema.parse(args);
      return text(formatSuggestSlotsResult(await executeSuggestSlots(input, context.slots)));
    },

    book_event: async (args) => {
      const input = BookEventInputSchema.parse(args);
      return text(formatBookEventResult(await executeBookEvent(input, context.booking)));
    },

    cancel_event: async (args) => {
      const input = CancelEventInputSchema.parse(args);
      return text(formatCancelEventResult(await executeCancelEvent(input, context.booking)));
    },

    get_event: async (args) => {
      const input = GetEventInputSchema.parse(args);
      return text(formatGetEventResult(await executeGetEvent(input, context.store)));
    },

    list_events: async (args) => {
      const input = ListEventsInputSchema.parse(args);
      return text(formatListEventsResult(await executeListEvents(input, context.store)));
    },

    sync_timetable: async (args) => {
      const input = SyncTimetableInputSchema.parse(args);
      const report = await executeSyncTimetable(input, context.timetable, context.getExtraction);
      return text(formatSyncTimetableResult(report));
    },

    rollback_sync: async (args) => {
      const input = RollbackSyncInputSchema.parse(args);
      return text(formatRollbackSyncResult(await executeRollbackSync(input, context.timetable)));
    },

    cleanup_past_events: async (args) => {
      CleanupPastEventsInputSchema.parse(args);
      return text(formatCleanupPastEventsResult(await executeCleanupPastEvents(context.booking)));
    },

    interpret_request: async (args) => {
      const input = InterpretRequestInputSchema.parse(args);
      return text(formatInterpretRequestResult(await executeInterpretRequest(input, context.getIntent)));
    },
  };
}

/**
 * Run a named tool, turning validation and domain errors into error results.
 * Invariant violations are rethrown: the caller must stop the process.
 */
export async function callTool(
  handlers: Record<string, ToolHandler>,
  name: string,
  args: unknown,
  logger: Logger
): Promise<ToolResult> {
  const handler = handlers[name];
  if (!handler) {
    return {
      ...text(`Unknown tool: ${name}. Available tools: ${Object.keys(handlers).join(', ')}`),
      isError: true,
    };
  }

  try {
    return await handler(args ?? {});
  } catch (error) {
    if (isFatalError(error)) throw error;
    logger.error(`Error executing tool ${name}:`, error);

    // Handle Zod validation errors
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      return { ...text(`Validation error: ${issues}`), isError: true };
    }

    if (error instanceof SchedulerError) {
      return { ...text(formatErrorForMCP(error)), isError: true };
    }

    // Handle generic errors
    const message = error instanceof Error ? error.message : 'Unknown error';
    return { ...text(`Error: ${message}`), isError: true };
  }
}
