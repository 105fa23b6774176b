// Gmail payload -> tagged payload model
import type { gmail_v1 } from 'googleapis';
import type { MessagePart, RawMessagePayload } from '../../shared/types/api.js';
import { MalformedPayloadError } from '../../lib/errors.js';

/**
 * Convert a Gmail API payload into a RawMessagePayload.
 * A payload with a `parts` array is multipart; anything else is simple.
 */
export function toRawPayload(
  payload: gmail_v1.Schema$MessagePart | undefined | null,
  messageId?: string
): RawMessagePayload {
  if (!payload) {
    throw new MalformedPayloadError('Message has no payload', messageId);
  }

  const mimeType = payload.mimeType ?? '';

  if (payload.parts) {
    return {
      kind: 'multipart',
      mimeType,
      parts: payload.parts.map((part, index) => toMessagePart(part, index, messageId)),
    };
  }

  return { kind: 'simple', mimeType, data: payload.body?.data ?? undefined };
}

function toMessagePart(
  part: gmail_v1.Schema$MessagePart,
  index: number,
  messageId?: string
): MessagePart {
  if (!part.mimeType) {
    throw new MalformedPayloadError(`Part ${index} has no mimeType`, messageId);
  }

  const data = part.body?.data ?? undefined;

  switch (part.mimeType) {
    case 'text/plain':
      return { kind: 'plain', data };
    case 'text/html':
      return { kind: 'html', data };
    default:
      return { kind: 'other', mimeType: part.mimeType, data };
  }
}
