// LLM service types

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionParams {
  model: string;
  /** OpenAI key, ignored for other providers */
  apiKey?: string;
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResult {
  text: string;
  usage: TokenUsage;
}

export type CompletionFn = (params: CompletionParams) => Promise<CompletionResult>;

// LLM call types
export type LLMCallType = 'summarize';

// LLM call metadata for logging
export interface LLMCallMetadata extends TokenUsage {
  emailId?: string;
  callType: LLMCallType;
  model: string;
  promptChars?: number;
  responseChars?: number;
  latencyMs: number;
  error?: string;
}
