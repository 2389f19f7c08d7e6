/**
 * suggest_slots Tool
 * Next conflict-free windows within operating hours
 */

import type { Slot } from '../types/index.js';
import type { SlotService } from '../services/slot-service.js';
import type { SuggestSlotsInput } from '../schemas/tool-inputs.js';
import { describeAudience, normalizeAudienceFilter } from '../utils/audience.js';

export interface SuggestSlotsResult {
  slots: Slot[];
  durationMinutes: number;
  audience: string;
}

/**
 * Execute suggest_slots tool
 */
export async function executeSuggestSlots(
  input: SuggestSlotsInput,
  slotService: SlotService
): Promise<SuggestSlotsResult> {
  const audience = normalizeAudienceFilter(input.audience);
  const slots = await slotService.suggestSlots(
    { start: input.start },
    input.durationMinutes,
    audience,
    input.allowedWeekdays
  );
  return { slots, durationMinutes: input.durationMinutes, audience: describeAudience(audience) };
}

/**
 * Format a slot list as numbered lines
 */
export function formatSlotLines(slots: Slot[]): string[] {
  return slots.map((slot, index) => `${index + 1}. ${slot.display}`);
}

/**
 * Format result for MCP response
 */
export function formatSuggestSlotsResult(result: SuggestSlotsResult): string {
  if (result.slots.length === 0) {
    return `No free ${result.durationMinutes}-minute slot for ${result.audience} in the next 8 days.`;
  }

  const lines: string[] = [];
  lines.push(`💡 **Suggested ${result.durationMinutes}-minute slots** for ${result.audience}:`);
  lines.push('');
  lines.push(...formatSlotLines(result.slots));
  return lines.join('\n');
}
