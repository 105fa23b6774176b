// Error taxonomy for the digest run
//
// Configuration and authentication errors abort the run. Transport and
// malformed-payload errors only ever cost the single message they occurred on.

export class InboxDigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required setting is missing or unparseable. Raised before any network call.
 */
export class ConfigurationError extends InboxDigestError {}

/**
 * No usable Gmail credential could be produced.
 */
export class AuthenticationError extends InboxDigestError {}

/**
 * A single Gmail API call failed.
 */
export class TransportError extends InboxDigestError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A message payload lacks a field the extractor needs, or carries data that
 * is not valid base64url.
 */
export class MalformedPayloadError extends InboxDigestError {
  constructor(
    message: string,
    public readonly messageId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The text-generation call failed. Never escapes the summarizer.
 */
export class SummarizationError extends InboxDigestError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
