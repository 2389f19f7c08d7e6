/**
 * Intent oracle: free text -> structured booking request
 */

import type { IntentResult } from '../types/index.js';
import type { AppConfig } from '../utils/config.js';
import { formatSlotDisplay, now, toISOString } from '../utils/datetime.js';
import { ErrorCodes, SchedulerError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { IntentResultSchema } from '../schemas/oracle.js';
import { extractJsonObject } from './json.js';
import type { LLM } from './llm.js';

export const INTENT_SYSTEM_PROMPT = `You are a university event planner.
Turn the user's request into JSON with exactly these keys:
{
  "explanation": "one or two sentences for the user",
  "intent": {
    "event_name": "short title",
    "duration_minutes": 60,
    "target_semesters": ["Sem 3"]
  },
  "suggestions": [
    { "display": "Wednesday, 07 Jan | 10:00 AM", "start_iso": "...", "end_iso": "..." }
  ]
}
Use "All" in target_semesters when no cohort is named. Timestamps are ISO 8601 with offset.
Only suggest times between 09:00 and 16:00 local time.`;

export interface IntentOracleOptions {
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class IntentOracle {
  private logger: Logger;

  constructor(
    private llm: LLM,
    private config: Pick<AppConfig, 'request'>,
    private options: IntentOracleOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('intent');
  }

  async interpret(text: string, context?: string): Promise<IntentResult> {
    const reference = now();
    const user = [
      `Current time: ${toISOString(reference)} (${formatSlotDisplay(reference)})`,
      context ? `Availability context:\n${context}` : undefined,
      `Request:\n${text}`,
    ]
      .filter((part): part is string => part !== undefined)
      .join('\n\n');

    const output = await withRetry(
      () =>
        this.llm.text({
          system: INTENT_SYSTEM_PROMPT,
          user,
          timeoutMs: this.config.request.timeout,
        }),
      {
        maxAttempts: this.config.request.maxRetries,
        baseDelayMs: this.config.request.retryDelay,
        sleep: this.options.sleep,
        logger: this.logger,
      }
    );

    const parsed = IntentResultSchema.safeParse(extractJsonObject(output));
    if (!parsed.success) {
      throw new SchedulerError(
        `Intent oracle returned an unexpected shape: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        ErrorCodes.ORACLE_ERROR
      );
    }

    this.logger.debug(`Interpreted request as "${parsed.data.intent.event_name}"`);
    return parsed.data;
  }
}
