// LLM call logger (console only, nothing is persisted)
import { describeError } from '../../lib/errors.js';
import type { LLMCallMetadata, TokenUsage } from './types.js';

/**
 * Log one LLM API call for debugging and cost tracking
 */
export function logLLMCall(metadata: LLMCallMetadata): void {
  const subject = metadata.emailId ? ` email=${metadata.emailId}` : '';
  const tokens = `tokens=${metadata.promptTokens}+${metadata.completionTokens}`;
  const promptChars = metadata.promptChars !== undefined ? ` prompt_chars=${metadata.promptChars}` : '';
  const responseChars = metadata.responseChars !== undefined ? ` response_chars=${metadata.responseChars}` : '';
  const line = `[llm] ${metadata.callType}${subject} model=${metadata.model} ${tokens}${promptChars}${responseChars} latency=${metadata.latencyMs}ms`;

  if (metadata.error) {
    console.warn(`${line} error=${metadata.error}`);
  } else {
    console.debug(line);
  }
}

/**
 * Wrap LLM call with automatic logging
 */
export async function withLogging<T>(
  metadata: Omit<LLMCallMetadata, 'latencyMs' | keyof TokenUsage | 'responseChars' | 'error'>,
  fn: () => Promise<{
    result: T;
    usage: TokenUsage;
    response?: string;
  }>
): Promise<T> {
  const startTime = Date.now();

  try {
    const { result, usage, response } = await fn();

    logLLMCall({
      ...metadata,
      ...usage,
      responseChars: response?.length,
      latencyMs: Date.now() - startTime,
    });

    return result;
  } catch (error) {
    logLLMCall({
      ...metadata,
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      latencyMs: Date.now() - startTime,
      error: describeError(error),
    });

    throw error;
  }
}
