/**
 * LLM Prompts Tests
 * Tests the summary prompt builder and body truncation
 */

import { describe, test, expect } from 'vitest';
import {
  buildSummaryPrompt,
  truncateBody,
  MAX_BODY_CHARS,
  SUMMARY_SYSTEM_PROMPT,
} from '../../src/services/llm/prompts/summary.js';

describe('LLM Prompts', () => {
  describe('truncateBody', () => {
    test('leaves a short body untouched', () => {
      expect(truncateBody('short body')).toBe('short body');
    });

    test('leaves a body of exactly the limit untouched', () => {
      const body = 'x'.repeat(MAX_BODY_CHARS);
      expect(truncateBody(body)).toBe(body);
    });

    test('cuts a long body to the limit and appends an ellipsis', () => {
      const body = 'a'.repeat(MAX_BODY_CHARS) + 'b'.repeat(500);
      const truncated = truncateBody(body);

      expect(truncated).toHaveLength(MAX_BODY_CHARS + 3);
      expect(truncated).toBe('a'.repeat(MAX_BODY_CHARS) + '...');
    });

    test('counts characters outside the BMP once', () => {
      expect(truncateBody('\u{1F600}'.repeat(3), 3)).toBe('\u{1F600}'.repeat(3));
      expect(truncateBody('ab\u{1F600}cd', 3)).toBe('ab\u{1F600}...');
    });
  });

  describe('buildSummaryPrompt', () => {
    test('uses the fixed system instruction', () => {
      const { system } = buildSummaryPrompt('Meeting moved to 3pm.', 150);

      expect(system).toBe(SUMMARY_SYSTEM_PROMPT);
      expect(system).toContain('summarizes emails concisely and accurately');
    });

    test('includes word budget and body', () => {
      const { prompt } = buildSummaryPrompt('Meeting moved to 3pm.', 42);

      expect(prompt).toContain('in approximately 42 words or less');
      expect(prompt).toContain('Email content:\nMeeting moved to 3pm.\n\nSummary:');
    });

    test('sends at most 4000 characters of the body', () => {
      const body = 'z'.repeat(5000);
      const { prompt } = buildSummaryPrompt(body, 150);

      expect(prompt).toContain('z'.repeat(4000) + '...');
      expect(prompt).not.toContain('z'.repeat(4001));
    });
  });
});
