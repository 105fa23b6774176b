// Console report rendering
import type { MessageOutcome } from '../shared/types/api.js';

const RULE_WIDTH = 50;
export const HEAVY_RULE = '='.repeat(RULE_WIDTH);
export const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

export const TITLE = 'Inbox Digest';
export const COMPLETE_MESSAGE = '✓ Summarization complete!';
export const NO_EMAILS_MESSAGE = 'No emails found.';
export const INTERRUPTED_MESSAGE = 'Process interrupted by user.';

export function renderBanner(): string[] {
  return [HEAVY_RULE, TITLE, HEAVY_RULE];
}

export function renderStep(step: number, total: number, description: string): string {
  return `[${step}/${total}] ${description}`;
}

/**
 * Lines for one message: header block, summary, closing rule
 */
export function renderOutcome(outcome: MessageOutcome, index: number, total: number): string[] {
  const label = `[Email ${index + 1}/${total}]`;

  if (outcome.status === 'skipped') {
    return [`\n${label} Skipped ${outcome.messageId}: ${outcome.reason}`, HEAVY_RULE];
  }

  const { email, summary } = outcome;
  return [
    `\n${label}`,
    `From: ${email.from}`,
    `Subject: ${email.subject}`,
    `Date: ${email.date}`,
    LIGHT_RULE,
    `Summary:\n${summary}`,
    HEAVY_RULE,
  ];
}

export function renderListed(count: number): string[] {
  if (count === 0) {
    return [`\n${NO_EMAILS_MESSAGE}`];
  }
  return [`\nFound ${count} emails. Generating summaries...\n`, HEAVY_RULE];
}

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
