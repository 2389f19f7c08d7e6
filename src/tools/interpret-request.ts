/**
 * interpret_request Tool
 * Free-text scheduling request -> structured intent via the intent oracle
 */

import type { IntentResult } from '../types/index.js';
import type { IntentOracle } from '../oracles/intent.js';
import type { InterpretRequestInput } from '../schemas/tool-inputs.js';

/**
 * Execute interpret_request tool
 */
export async function executeInterpretRequest(
  input: InterpretRequestInput,
  getIntent: () => IntentOracle
): Promise<IntentResult> {
  return getIntent().interpret(input.text, input.context);
}

/**
 * Format result for MCP response
 */
export function formatInterpretRequestResult(result: IntentResult): string {
  const lines: string[] = [];

  lines.push(`🤖 ${result.explanation}`);
  lines.push('');
  lines.push(`**Event:** ${result.intent.event_name}`);
  lines.push(`**Duration:** ${result.intent.duration_minutes} minutes`);
  lines.push(`**Audience:** ${result.intent.target_semesters.join(', ')}`);

  if (result.suggestions.length > 0) {
    lines.push('');
    lines.push('**Suggested times:**');
    result.suggestions.forEach((suggestion, index) => {
      lines.push(`${index + 1}. ${suggestion.display}`);
    });
  }

  lines.push('');
  lines.push('_Suggestions are unverified. Run check_conflicts or book_event before relying on them._');

  return lines.join('\n');
}
