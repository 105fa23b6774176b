// Summarization Engine - turns an email body into a short summary
import { generateTextCompletion } from '../llm/client.js';
import { withLogging } from '../llm/logger.js';
import type { CompletionFn } from '../llm/types.js';
import { buildSummaryPrompt } from '../llm/prompts/summary.js';
import type { EmailSummary, FetchedEmail, ITextSummarizer } from '../../shared/types/api.js';
import { SummarizationError, describeError } from '../../lib/errors.js';

export const DEFAULT_WORD_BUDGET = 150;
export const EMPTY_BODY_SUMMARY = 'No content to summarize.';

export interface SummarizerOptions {
  model: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
  /** Completion backend, the Vercel AI SDK unless replaced */
  complete?: CompletionFn;
}

export class LlmSummarizer implements ITextSummarizer {
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly complete: CompletionFn;

  constructor(options: SummarizerOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.maxTokens = options.maxTokens ?? 300;
    this.temperature = options.temperature ?? 0.5;
    this.complete = options.complete ?? generateTextCompletion;
  }

  /**
   * Summarize one body. Failures are returned as text so the report can
   * still show the message.
   */
  async summarize(text: string, wordBudget = DEFAULT_WORD_BUDGET, emailId?: string): Promise<string> {
    if (!text.trim()) {
      return EMPTY_BODY_SUMMARY;
    }

    try {
      return await this.requestSummary(text, wordBudget, emailId);
    } catch (error) {
      const failure = error instanceof SummarizationError
        ? error
        : new SummarizationError(describeError(error), { cause: error });
      return `Error generating summary: ${failure.message}`;
    }
  }

  /**
   * Summarize several emails one after another, keeping their order
   */
  async batchSummarize(emails: FetchedEmail[], wordBudget = DEFAULT_WORD_BUDGET): Promise<EmailSummary[]> {
    const summaries: EmailSummary[] = [];
    for (const email of emails) {
      summaries.push({
        emailId: email.id,
        subject: email.subject,
        summary: await this.summarize(email.body, wordBudget, email.id),
      });
    }
    return summaries;
  }

  private async requestSummary(text: string, wordBudget: number, emailId?: string): Promise<string> {
    const { system, prompt } = buildSummaryPrompt(text, wordBudget);

    return withLogging(
      {
        emailId,
        callType: 'summarize',
        model: this.model,
        promptChars: prompt.length,
      },
      async () => {
        const { text: response, usage } = await this.complete({
          model: this.model,
          apiKey: this.apiKey,
          system,
          prompt,
          temperature: this.temperature,
          maxTokens: this.maxTokens,
        });

        const summary = response.trim();
        if (!summary) {
          throw new SummarizationError('Model returned an empty summary');
        }

        return { result: summary, usage, response };
      }
    );
  }
}
