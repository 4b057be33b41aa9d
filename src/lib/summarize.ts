import type { CompletionClient } from './llm';
import type { ExtractionResult, SummaryResult } from './types';

export const INSUFFICIENT_CONTENT = 'Unable to summarize: Insufficient content.';

const MIN_TEXT_CHARS = 50;
const MAX_PROMPT_TEXT_CHARS = 2000;

export function summaryPrompt(text: string): string {
  return `Summarize the key points of this article in 3-5 concise sentences:\n\n${text.slice(0, MAX_PROMPT_TEXT_CHARS)}`;
}

/** 3–5 sentence summary of `text`. Short input gets the sentinel and no model call. */
export async function summarizeArticle(
  client: CompletionClient,
  text: string,
  maxTokens = 150,
): Promise<SummaryResult> {
  if (text.trim().length < MIN_TEXT_CHARS) return INSUFFICIENT_CONTENT;
  return client.complete({ prompt: summaryPrompt(text), maxTokens, temperature: 0.5 });
}

// Extraction errors are never fed to the model as article content.
export async function summarizeExtraction(
  client: CompletionClient,
  result: ExtractionResult,
  maxTokens = 150,
): Promise<SummaryResult> {
  if (!result.ok) return INSUFFICIENT_CONTENT;
  return summarizeArticle(client, result.text, maxTokens);
}
