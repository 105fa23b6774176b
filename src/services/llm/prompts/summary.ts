// Summary prompt builder

export const SUMMARY_SYSTEM_PROMPT =
  'You are a helpful assistant that summarizes emails concisely and accurately.';

/** Longest body sent to the model, in characters */
export const MAX_BODY_CHARS = 4000;
const TRUNCATION_MARKER = '...';

/**
 * Cap a body at MAX_BODY_CHARS code points, marking the cut with an ellipsis
 */
export function truncateBody(body: string, maxChars = MAX_BODY_CHARS): string {
  const chars = Array.from(body);
  if (chars.length <= maxChars) {
    return body;
  }
  return chars.slice(0, maxChars).join('') + TRUNCATION_MARKER;
}

export function buildSummaryPrompt(body: string, wordBudget: number): {
  system: string;
  prompt: string;
} {
  const prompt = `Please summarize the following email in approximately ${wordBudget} words or less.
Focus on the key points, action items, and important information.

Email content:
${truncateBody(body)}

Summary:`;

  return { system: SUMMARY_SYSTEM_PROMPT, prompt };
}
