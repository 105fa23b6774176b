// LLM client using Vercel AI SDK with multi-provider support
import { anthropic } from '@ai-sdk/anthropic';
import { createOpenAI, openai } from '@ai-sdk/openai';
import { google } from '@ai-sdk/google';
import { generateText, type LanguageModel } from 'ai';
import type { CompletionParams, CompletionResult } from './types.js';

type ProviderName = 'anthropic' | 'openai' | 'google';

// The configured key belongs to OpenAI; other providers read their own env key
type ModelFactory = (model: string, openaiApiKey?: string) => LanguageModel;

// Provider registry
const PROVIDERS: Record<ProviderName, ModelFactory> = {
  // ANTHROPIC_API_KEY
  anthropic: (model) => anthropic(model),
  openai: (model, openaiApiKey) => (openaiApiKey ? createOpenAI({ apiKey: openaiApiKey }) : openai)(model),
  // GOOGLE_GENERATIVE_AI_API_KEY
  google: (model) => google(model),
};

const DEFAULT_PROVIDER: ProviderName = 'openai';

function isProviderName(value: string): value is ProviderName {
  return Object.hasOwn(PROVIDERS, value);
}

/**
 * Parse model string into provider and model name
 * Format: "provider/model-name" (e.g., "openai/gpt-4o-mini"). A bare model
 * name is taken to be an OpenAI model.
 */
export function parseModelString(modelStr: string): {
  provider: ProviderName;
  model: string;
} {
  const parts = modelStr.split('/');

  if (parts.length === 1 && parts[0]) {
    return { provider: DEFAULT_PROVIDER, model: parts[0] };
  }

  const [providerStr, modelName] = parts;
  if (parts.length !== 2 || !providerStr || !modelName) {
    throw new Error(
      `Invalid model format: ${modelStr}. Expected "provider/model-name"`
    );
  }

  if (!isProviderName(providerStr)) {
    throw new Error(
      `Unknown provider: ${providerStr}. Supported: ${Object.keys(PROVIDERS).join(', ')}`
    );
  }

  return { provider: providerStr, model: modelName };
}

/**
 * Get language model instance from model string.
 * The key is only handed to the OpenAI provider.
 */
export function getModel(modelStr: string, openaiApiKey?: string): LanguageModel {
  const { provider, model } = parseModelString(modelStr);
  return PROVIDERS[provider](model, openaiApiKey);
}

/**
 * Generate text completion
 */
export async function generateTextCompletion(params: CompletionParams): Promise<CompletionResult> {
  const modelInstance = getModel(params.model, params.apiKey);

  const result = await generateText({
    model: modelInstance,
    system: params.system,
    prompt: params.prompt,
    temperature: params.temperature ?? 0.3,
    maxTokens: params.maxTokens,
  });

  return {
    text: result.text,
    usage: {
      promptTokens: result.usage.promptTokens,
      completionTokens: result.usage.completionTokens,
      totalTokens: result.usage.totalTokens,
    },
  };
}
