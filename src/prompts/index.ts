/**
 * MCP Prompts for the scheduler
 * Pre-defined prompt templates for booking and timetable sync
 */

/**
 * Prompt definition type
 */
export interface PromptDefinition {
  name: string;
  description: string;
  arguments?: Array<{
    name: string;
    description: string;
    required?: boolean;
  }>;
}

/**
 * Prompt message type
 */
export interface PromptMessage {
  role: 'user' | 'assistant';
  content: {
    type: 'text';
    text: string;
  };
}

/**
 * Prompt list
 */
export const promptDefinitions: PromptDefinition[] = [
  {
    name: 'plan-event',
    description: 'Plan and book a club or department event without clashing with classes',
    arguments: [
      {
        name: 'request',
        description: 'What to schedule, e.g. "a 2 hour workshop for Sem 3 on Friday"',
        required: true,
      },
      {
        name: 'requester',
        description: 'Identity recorded as the booking creator',
        required: true,
      },
    ],
  },
  {
    name: 'sync-timetable',
    description: 'Load a semester timetable PDF as weekly classes',
    arguments: [
      {
        name: 'document_path',
        description: 'Path to the timetable PDF on the server',
        required: true,
      },
      {
        name: 'semester_start',
        description: 'First day of the semester (YYYY-MM-DD)',
        required: false,
      },
      {
        name: 'semester_end',
        description: 'Last day of the semester (YYYY-MM-DD)',
        required: false,
      },
    ],
  },
];

/**
 * Prompt handler type
 */
export type PromptHandler = (args: Record<string, string | undefined>) => Promise<{
  description?: string;
  messages: PromptMessage[];
}>;

const userMessage = (text: string): PromptMessage => ({
  role: 'user',
  content: { type: 'text', text },
});

/**
 * Create prompt handlers
 */
export function createPromptHandlers(): Record<string, PromptHandler> {
  return {
    'plan-event': async (args) => {
      const request = args.request ?? 'an event';
      const requester = args.requester ?? 'me';

      const promptText = `Help me schedule ${request}.

Please:
1. Use interpret_request to work out the event name, duration and target semesters
2. Use check_conflicts for the window I asked for, with those semesters as the audience
3. If it clashes, use suggest_slots and let me pick one of the alternatives
4. Once I confirm, book it with book_event as "${requester}"

Never treat a time from interpret_request as free until check_conflicts says so.`;

      return {
        description: `Plan an event: ${request}`,
        messages: [userMessage(promptText)],
      };
    },

    'sync-timetable': async (args) => {
      const path = args.document_path ?? 'timetable.pdf';
      const dates = args.semester_start && args.semester_end
        ? `from ${args.semester_start} to ${args.semester_end}`
        : 'for dates I will give you (ask me for the first and last day of the semester)';

      const promptText = `Sync the timetable in ${path} as weekly classes ${dates}.

Please:
1. Call sync_timetable with the document path, the semester dates and an admin requester
2. Report every row that failed and why
3. If the semester tag looks wrong, offer to undo it with rollback_sync`;

      return {
        description: `Sync timetable: ${path}`,
        messages: [userMessage(promptText)],
      };
    },
  };
}
