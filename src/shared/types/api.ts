/**
 * Shared API Contracts
 * The digest workflow talks to its collaborators only through these interfaces
 */

// ============================================================================
// MESSAGE MODEL
// ============================================================================

export interface MessageHeader {
  name: string;
  value: string;
}

/**
 * One part of a multipart payload. Only the top level of a multipart message
 * is inspected, so a nested multipart part is `other`.
 */
export type MessagePart =
  | { kind: 'plain'; data?: string }
  | { kind: 'html'; data?: string }
  | { kind: 'other'; mimeType: string; data?: string };

/**
 * Body-bearing portion of a message, `data` being base64url text.
 */
export type RawMessagePayload =
  | { kind: 'simple'; mimeType: string; data?: string }
  | { kind: 'multipart'; mimeType: string; parts: MessagePart[] };

export interface FetchedEmail {
  id: string;
  from: string;
  subject: string;
  date: string;
  body: string;
}

export interface EmailSummary {
  emailId: string;
  subject: string;
  summary: string;
}

// ============================================================================
// MAIL STORE API
// ============================================================================

/**
 * Mailbox access
 * Implementations: src/services/gmail/client.ts
 */
export interface IMailStore<TMessage = unknown> {
  listMessageIds(query: string, maxResults: number): Promise<string[]>;
  getMessage(messageId: string): Promise<TMessage>;
}

/**
 * Turns a provider message into a FetchedEmail
 * Implementations: src/services/gmail/message-parser.ts
 */
export interface IMessageParser<TMessage = unknown> {
  parseMessage(message: TMessage): FetchedEmail;
}

// ============================================================================
// SUMMARIZATION API
// ============================================================================

/**
 * Text summarizer. `summarize` never rejects: failures come back as
 * human-readable placeholder text.
 * Implementations: src/services/summarization/engine.ts
 */
export interface ITextSummarizer {
  summarize(text: string, wordBudget?: number, emailId?: string): Promise<string>;
}

// ============================================================================
// DIGEST REPORT
// ============================================================================

export type MessageOutcome =
  | { status: 'summarized'; email: FetchedEmail; summary: string }
  | { status: 'skipped'; messageId: string; reason: string };

export interface DigestReport {
  listed: number;
  outcomes: MessageOutcome[];
}
