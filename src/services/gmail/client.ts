// Gmail API client wrapper (read-only mailbox access)
import { google, gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { GaxiosError } from 'gaxios';
import type { IMailStore } from '../../shared/types/api.js';
import { TransportError, describeError } from '../../lib/errors.js';

/**
 * Run a Gmail API call, rethrowing any failure as a TransportError.
 * There is no retry: a failed call costs the caller one message.
 */
async function call<T>(description: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new TransportError(
      `Gmail API error while ${description}: ${describeError(error)}`,
      statusOf(error),
      { cause: error }
    );
  }
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof GaxiosError) {
    return error.response?.status;
  }
  // Errors from a different gaxios copy fail the instanceof check
  if (typeof error === 'object' && error !== null && 'response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response) {
      return typeof response.status === 'number' ? response.status : undefined;
    }
  }
  return undefined;
}

/**
 * Gmail API client class
 */
export class GmailClient implements IMailStore<gmail_v1.Schema$Message> {
  private gmail: gmail_v1.Gmail;
  private userId = 'me';

  constructor(auth: OAuth2Client) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  /**
   * List ids of the newest messages matching a Gmail search query
   */
  async listMessageIds(query: string, maxResults: number): Promise<string[]> {
    const response = await call('listing messages', () =>
      this.gmail.users.messages.list({
        userId: this.userId,
        q: query || undefined,
        maxResults,
      })
    );

    const ids: string[] = [];
    for (const message of response.data.messages ?? []) {
      if (message.id) ids.push(message.id);
    }
    return ids;
  }

  /**
   * Get single message by ID, with headers and the full payload tree
   */
  async getMessage(messageId: string): Promise<gmail_v1.Schema$Message> {
    const response = await call(`fetching message ${messageId}`, () =>
      this.gmail.users.messages.get({
        userId: this.userId,
        id: messageId,
        format: 'full',
      })
    );

    return response.data;
  }
}
