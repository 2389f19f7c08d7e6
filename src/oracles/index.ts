/**
 * Oracle wiring from configuration
 */

import type { AppConfig } from '../utils/config.js';
import { ExtractionOracle } from './extraction.js';
import { IntentOracle } from './intent.js';
import { createOpenAIClient, makeOpenAiLLM, type LLM } from './llm.js';

export { ExtractionOracle, EXTRACTION_PROMPT } from './extraction.js';
export type { ExtractionOracleOptions } from './extraction.js';
export { IntentOracle, INTENT_SYSTEM_PROMPT } from './intent.js';
export type { IntentOracleOptions } from './intent.js';
export { createOpenAIClient, makeOpenAiLLM, mapOpenAIError } from './llm.js';
export type { LLM, LLMDocument } from './llm.js';
export { extractJsonObject } from './json.js';

/**
 * Build the default LLM from configuration
 */
export function createLLM(config: AppConfig): LLM {
  return makeOpenAiLLM(createOpenAIClient(config.oracle), config.oracle.model);
}

/**
 * Build both oracles from configuration
 */
export function createOracles(config: AppConfig, llm: LLM = createLLM(config)) {
  return {
    extraction: new ExtractionOracle(llm, config),
    intent: new IntentOracle(llm, config),
  };
}
