// Gmail message parser implementation
import type { gmail_v1 } from 'googleapis';
import type {
  FetchedEmail,
  IMessageParser,
  MessageHeader,
  RawMessagePayload,
} from '../../shared/types/api.js';
import { MalformedPayloadError } from '../../lib/errors.js';
import { toRawPayload } from './payload.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Gmail message parser implementation
 */
export const messageParser: IMessageParser<gmail_v1.Schema$Message> = {
  parseMessage(message) {
    if (!message.id) {
      throw new MalformedPayloadError('Message has no id');
    }

    const payload = toRawPayload(message.payload, message.id);
    const headers = toHeaders(message.payload?.headers ?? []);

    let body: string;
    try {
      body = extractBody(payload);
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        throw new MalformedPayloadError(error.message, message.id, { cause: error });
      }
      throw error;
    }

    return {
      id: message.id,
      from: getHeader(headers, 'From'),
      subject: getHeader(headers, 'Subject'),
      date: getHeader(headers, 'Date'),
      body,
    } satisfies FetchedEmail;
  },
};

function toHeaders(headers: gmail_v1.Schema$MessagePartHeader[]): MessageHeader[] {
  return headers.map((h) => ({ name: h.name ?? '', value: h.value ?? '' }));
}

/**
 * First header whose name matches case-insensitively, or '' if none does.
 */
export function getHeader(headers: MessageHeader[], name: string): string {
  const wanted = name.toLowerCase();
  const header = headers.find((h) => h.name.toLowerCase() === wanted);
  return header?.value ?? '';
}

/**
 * Decode URL-safe base64 into UTF-8 text.
 * Buffer.from silently skips invalid characters, so the alphabet and length
 * are checked first. Bytes that are not UTF-8 are rejected too.
 */
export function decodeBase64Url(data: string): string {
  const unpadded = data.replace(/=+$/, '');
  if (!BASE64URL_PATTERN.test(data) || unpadded.length % 4 === 1) {
    throw new MalformedPayloadError('Body data is not valid base64url');
  }

  const bytes = Buffer.from(unpadded, 'base64url');
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new MalformedPayloadError('Body data is not valid UTF-8', undefined, { cause: error });
  }
}

/**
 * Extract a plain-text body from a payload.
 *
 * Multipart: the first `text/plain` part with data wins and ends the scan.
 * A `text/html` part is used only while nothing has been found yet, and the
 * scan keeps going after it, so a later plain part still replaces it.
 */
export function extractBody(payload: RawMessagePayload): string {
  let body = '';

  if (payload.kind === 'multipart') {
    for (const part of payload.parts) {
      if (part.kind === 'plain') {
        if (part.data !== undefined) {
          body = decodeBase64Url(part.data);
          break;
        }
      } else if (part.kind === 'html' && !body) {
        if (part.data !== undefined) {
          body = stripHtml(decodeBase64Url(part.data));
        }
      }
    }
  } else if (payload.data !== undefined) {
    body = decodeBase64Url(payload.data);
  }

  return body.trim();
}

/**
 * Heuristic HTML-to-text, not a parser.
 *
 * Drops every `<...>` run (shortest match, within one line), then replaces
 * `&nbsp;`, `&amp;`, `&lt;` and `&gt;` in that order, so `&amp;lt;` ends up
 * as `<`. No other entity is touched. A `>` inside
 * an attribute value ends the tag early, a tag broken across lines is left
 * in place, and script/style contents survive as text.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<.*?>/g, '')
    .replaceAll('&nbsp;', ' ')
    .replaceAll('&amp;', '&')
    .replaceAll('&lt;', '<')
    .replaceAll('&gt;', '>')
    .trim();
}
