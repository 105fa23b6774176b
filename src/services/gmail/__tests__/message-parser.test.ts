/**
 * Message Parser Tests
 */

import { describe, test, expect } from "vitest";
import {
  decodeBase64Url,
  extractBody,
  getHeader,
  messageParser,
  stripHtml,
} from "../message-parser.js";
import { MalformedPayloadError } from "../../../lib/errors.js";
import type { RawMessagePayload } from "../../../shared/types/api.js";

const encode = (text: string) => Buffer.from(text, "utf-8").toString("base64url");

describe("extractBody", () => {
  describe("simple payload", () => {
    test("decodes base64url data and trims it", () => {
      const payload: RawMessagePayload = {
        kind: "simple",
        mimeType: "text/plain",
        data: encode("  Hello world \n"),
      };

      expect(extractBody(payload)).toBe("Hello world");
    });

    test("returns empty string without data", () => {
      expect(extractBody({ kind: "simple", mimeType: "text/plain" })).toBe("");
    });

    test("decodes multi-byte UTF-8", () => {
      const payload: RawMessagePayload = {
        kind: "simple",
        mimeType: "text/plain",
        data: encode("Grüße aus Köln 👋"),
      };

      expect(extractBody(payload)).toBe("Grüße aus Köln 👋");
    });

    test("does not strip markup from a simple body", () => {
      const payload: RawMessagePayload = {
        kind: "simple",
        mimeType: "text/html",
        data: encode("<p>kept</p>"),
      };

      expect(extractBody(payload)).toBe("<p>kept</p>");
    });

    test("rejects data outside the base64url alphabet", () => {
      const payload: RawMessagePayload = { kind: "simple", mimeType: "text/plain", data: "abc$%" };

      expect(() => extractBody(payload)).toThrow(MalformedPayloadError);
    });
  });

  describe("multipart payload", () => {
    test("prefers plain text even when html comes first", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/alternative",
        parts: [
          { kind: "html", data: encode("<p>From HTML</p>") },
          { kind: "plain", data: encode("From plain") },
        ],
      };

      expect(extractBody(payload)).toBe("From plain");
    });

    test("stops at the first plain part with data", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/mixed",
        parts: [
          { kind: "plain", data: encode("first") },
          { kind: "plain", data: encode("second") },
        ],
      };

      expect(extractBody(payload)).toBe("first");
    });

    test("uses a plain part even when it decodes to nothing", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/alternative",
        parts: [
          { kind: "plain", data: "" },
          { kind: "html", data: encode("<b>ignored</b>") },
        ],
      };

      expect(extractBody(payload)).toBe("");
    });

    test("falls back to sanitized html when no plain part has data", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/alternative",
        parts: [
          { kind: "plain" },
          { kind: "html", data: encode("<b>Hi &amp; bye</b>") },
        ],
      };

      expect(extractBody(payload)).toBe("Hi & bye");
    });

    test("keeps the first html body when several html parts follow", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/mixed",
        parts: [
          { kind: "html", data: encode("<p>First</p>") },
          { kind: "html", data: encode("<p>Second</p>") },
        ],
      };

      expect(extractBody(payload)).toBe("First");
    });

    test("ignores parts of other types", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/mixed",
        parts: [
          { kind: "other", mimeType: "application/pdf", data: encode("%PDF-1.4") },
          { kind: "other", mimeType: "multipart/alternative" },
        ],
      };

      expect(extractBody(payload)).toBe("");
    });

    test("returns empty string when no part has data", () => {
      const payload: RawMessagePayload = {
        kind: "multipart",
        mimeType: "multipart/alternative",
        parts: [{ kind: "plain" }, { kind: "html" }],
      };

      expect(extractBody(payload)).toBe("");
    });
  });
});

describe("decodeBase64Url", () => {
  test("accepts padded input", () => {
    expect(decodeBase64Url("SGk=")).toBe("Hi");
  });

  test("accepts url-safe characters", () => {
    // "?>?" is "Pz4/" in the standard alphabet
    expect(decodeBase64Url("Pz4_")).toBe("?>?");
  });

  test("rejects an impossible length", () => {
    expect(() => decodeBase64Url("abcde")).toThrow("Body data is not valid base64url");
  });

  test("rejects standard-alphabet characters", () => {
    expect(() => decodeBase64Url("ab+/")).toThrow(MalformedPayloadError);
  });

  test("rejects bytes that are not UTF-8", () => {
    // 48 ff fe 69
    const data = Buffer.from([0x48, 0xff, 0xfe, 0x69]).toString("base64url");

    expect(() => decodeBase64Url(data)).toThrow(MalformedPayloadError);
    expect(() => decodeBase64Url(data)).toThrow("Body data is not valid UTF-8");
  });
});

describe("stripHtml", () => {
  test("removes tags and decodes nbsp", () => {
    expect(stripHtml("<p>A&nbsp;B</p>")).toBe("A B");
  });

  test("removes each tag separately", () => {
    expect(stripHtml("<b>bold</b> and <i>italic</i>")).toBe("bold and italic");
  });

  test("decodes the four supported entities", () => {
    expect(stripHtml("1 &lt; 2 &amp;&amp; 3 &gt; 2")).toBe("1 < 2 && 3 > 2");
  });

  test("decodes entities one after another in a fixed order", () => {
    expect(stripHtml("&amp;lt;b&amp;gt;")).toBe("<b>");
    expect(stripHtml("&amp;nbsp;")).toBe("&nbsp;");
  });

  test("leaves other entities alone", () => {
    expect(stripHtml("&quot;quoted&quot; &copy;")).toBe("&quot;quoted&quot; &copy;");
  });

  test("keeps text of script elements", () => {
    expect(stripHtml("<script>var a = 1;</script>Text")).toBe("var a = 1;Text");
  });

  test("does not match tags across lines", () => {
    expect(stripHtml("<a\nhref='x'>link</a>")).toBe("<a\nhref='x'>link");
  });

  test("is idempotent on text without angle brackets", () => {
    const inputs = ["plain text", "  padded  ", "Tom &amp; Jerry", "a&nbsp;b"];
    for (const input of inputs) {
      const once = stripHtml(input);
      expect(stripHtml(once)).toBe(once);
    }
  });
});

describe("getHeader", () => {
  test("returns the first case-insensitive match", () => {
    const headers = [
      { name: "subject", value: "X" },
      { name: "Subject", value: "Y" },
    ];

    expect(getHeader(headers, "Subject")).toBe("X");
  });

  test("matches regardless of the requested case", () => {
    expect(getHeader([{ name: "From", value: "a@example.com" }], "FROM")).toBe("a@example.com");
  });

  test("returns empty string when missing", () => {
    expect(getHeader([], "From")).toBe("");
    expect(getHeader([{ name: "To", value: "b@example.com" }], "From")).toBe("");
  });
});

describe("messageParser.parseMessage", () => {
  test("extracts headers and body", () => {
    const email = messageParser.parseMessage({
      id: "msg-1",
      payload: {
        mimeType: "multipart/alternative",
        headers: [
          { name: "From", value: "Alice <alice@example.com>" },
          { name: "Subject", value: "Lunch" },
          { name: "Date", value: "Tue, 7 Jan 2025 12:00:00 +0000" },
        ],
        parts: [
          { mimeType: "text/html", body: { data: encode("<p>Noon?</p>") } },
          { mimeType: "text/plain", body: { data: encode("Noon?\n") } },
        ],
      },
    });

    expect(email).toEqual({
      id: "msg-1",
      from: "Alice <alice@example.com>",
      subject: "Lunch",
      date: "Tue, 7 Jan 2025 12:00:00 +0000",
      body: "Noon?",
    });
  });

  test("returns empty header values when headers are absent", () => {
    const email = messageParser.parseMessage({
      id: "msg-2",
      payload: { mimeType: "text/plain", body: { data: encode("body") } },
    });

    expect(email.from).toBe("");
    expect(email.subject).toBe("");
    expect(email.date).toBe("");
    expect(email.body).toBe("body");
  });

  test("rejects a message without id", () => {
    expect(() => messageParser.parseMessage({ payload: { mimeType: "text/plain" } })).toThrow(
      MalformedPayloadError
    );
  });

  test("tags a decoding failure with the message id", () => {
    try {
      messageParser.parseMessage({
        id: "msg-3",
        payload: { mimeType: "text/plain", body: { data: "not*base64" } },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedPayloadError);
      expect(error).toMatchObject({ messageId: "msg-3" });
    }
  });
});
