import { ErrorCodes, SchedulerError } from '../utils/error.js';

/**
 * Parse the first JSON object out of model output that may carry markdown
 * fences or prose around it.
 */
export function extractJsonObject(output: string): unknown {
  const start = output.indexOf('{');
  const end = output.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new SchedulerError('No JSON object found in oracle response', ErrorCodes.ORACLE_ERROR, {
      details: { preview: output.slice(0, 200) },
    });
  }

  try {
    return JSON.parse(output.slice(start, end + 1));
  } catch (error) {
    throw new SchedulerError('Oracle response is not valid JSON', ErrorCodes.ORACLE_ERROR, {
      cause: error instanceof Error ? error : undefined,
      details: { preview: output.slice(0, 200) },
    });
  }
}
