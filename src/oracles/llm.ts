import OpenAI from 'openai';
import type { OracleConfig } from '../utils/config.js';
import {
  ErrorCodes,
  SchedulerError,
  quotaExceededError,
} from '../utils/error.js';

/**
 * A document attached to a prompt (timetable PDFs)
 */
export interface LLMDocument {
  data: Uint8Array;
  filename: string;
  mimeType: string;
}

export interface LLM {
  text(args: {
    system?: string;
    user: string;
    document?: LLMDocument;
    temperature?: number;
    maxTokens?: number;
    timeoutMs?: number;
  }): Promise<string>;
}

type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;
type Message = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function createOpenAIClient(config: OracleConfig): OpenAI {
  if (!config.apiKey) {
    throw new SchedulerError(
      'OpenAI API key is required. Set OPENAI_API_KEY environment variable.',
      ErrorCodes.CONFIGURATION_ERROR
    );
  }
  // Retries are ours (see withRetry); the SDK's own would multiply them
  return new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
}

const toUserContent = (user: string, document?: LLMDocument): string | ContentPart[] => {
  if (!document) return user;
  const base64 = Buffer.from(document.data).toString('base64');
  return [
    {
      type: 'file',
      file: {
        file_data: `data:${document.mimeType};base64,${base64}`,
        filename: document.filename,
      },
    },
    { type: 'text', text: user },
  ];
};

/**
 * Map SDK failures onto scheduler error codes
 */
export function mapOpenAIError(error: unknown, timeoutMs: number): SchedulerError {
  if (error instanceof SchedulerError) return error;
  if (error instanceof OpenAI.RateLimitError) {
    return quotaExceededError('OpenAI', undefined, error);
  }
  if (error instanceof OpenAI.APIUserAbortError || error instanceof OpenAI.APIConnectionTimeoutError) {
    return new SchedulerError(`Oracle call timed out after ${timeoutMs} ms`, ErrorCodes.TIMEOUT, {
      retryable: true,
      cause: error,
    });
  }
  if (error instanceof OpenAI.AuthenticationError) {
    return new SchedulerError('OpenAI rejected the API key', ErrorCodes.AUTH_FAILED, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SchedulerError(`Oracle call failed: ${message}`, ErrorCodes.ORACLE_ERROR, {
    cause: error instanceof Error ? error : undefined,
  });
}

export function makeOpenAiLLM(client: OpenAI, model: string): LLM {
  return {
    async text({ system, user, document, temperature = 0.1, maxTokens = 4096, timeoutMs = 30_000 }) {
      const ctrl = new AbortController();
      const t = setTimeout(() => ctrl.abort(), timeoutMs);

      const messages: Message[] = [
        ...(system ? [{ role: 'system' as const, content: system }] : []),
        { role: 'user', content: toUserContent(user, document) },
      ];

      try {
        const res = await client.chat.completions.create(
          {
            model,
            messages,
            temperature,
            max_tokens: maxTokens,
            response_format: { type: 'json_object' },
          },
          { signal: ctrl.signal }
        );
        return res.choices[0]?.message?.content ?? '';
      } catch (error) {
        throw mapOpenAIError(error, timeoutMs);
      } finally {
        clearTimeout(t);
      }
    },
  };
}
