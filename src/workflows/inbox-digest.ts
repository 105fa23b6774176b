/**
 * Inbox Digest Workflow
 *
 * List -> fetch -> extract -> summarize, one message at a time in list order.
 * A transport or payload failure on one message becomes a `skipped` outcome;
 * it never stops the batch.
 */

import type {
  DigestReport,
  IMailStore,
  IMessageParser,
  ITextSummarizer,
  MessageOutcome,
} from '../shared/types/api.js';
import { MalformedPayloadError, TransportError, describeError } from '../lib/errors.js';

export interface InboxDigestOptions<TMessage> {
  store: IMailStore<TMessage>;
  parser: IMessageParser<TMessage>;
  summarizer: ITextSummarizer;
  query: string;
  maxEmails: number;
  wordBudget: number;
  /** Called after each message, before the next one is fetched */
  onOutcome?: (outcome: MessageOutcome, index: number, total: number) => void;
  /** Called once the id list is known */
  onListed?: (total: number) => void;
}

function isPerMessageError(error: unknown): error is TransportError | MalformedPayloadError {
  return error instanceof TransportError || error instanceof MalformedPayloadError;
}

export async function runInboxDigest<TMessage>(
  options: InboxDigestOptions<TMessage>
): Promise<DigestReport> {
  const { store, parser, summarizer } = options;

  let ids: string[];
  try {
    ids = await store.listMessageIds(options.query, options.maxEmails);
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    console.warn(`An error occurred while listing messages: ${error.message}`);
    ids = [];
  }

  options.onListed?.(ids.length);

  const outcomes: MessageOutcome[] = [];
  for (const [index, messageId] of ids.entries()) {
    const outcome = await digestMessage(messageId, options.wordBudget, store, parser, summarizer);
    outcomes.push(outcome);
    options.onOutcome?.(outcome, index, ids.length);
  }

  return { listed: ids.length, outcomes };
}

async function digestMessage<TMessage>(
  messageId: string,
  wordBudget: number,
  store: IMailStore<TMessage>,
  parser: IMessageParser<TMessage>,
  summarizer: ITextSummarizer
): Promise<MessageOutcome> {
  try {
    const message = await store.getMessage(messageId);
    const email = parser.parseMessage(message);
    const summary = await summarizer.summarize(email.body, wordBudget, email.id);
    return { status: 'summarized', email, summary };
  } catch (error) {
    if (!isPerMessageError(error)) throw error;
    console.warn(`Skipping message ${messageId}: ${describeError(error)}`);
    return { status: 'skipped', messageId, reason: error.message };
  }
}
