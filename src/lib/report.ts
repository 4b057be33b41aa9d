import type { CompletionClient } from './llm';
import type { ArticleRecord, SummaryResult } from './types';

export type ReportPromptTemplate = (digest: string) => string;

export const DEFAULT_REPORT_PROMPT: ReportPromptTemplate = (digest) =>
  'Create a cohesive report (200–300 words) summarizing the key insights and patterns ' +
  `from these article summaries, highlighting the themes they share:\n\n${digest}`;

/** Numbered title / summary / link block for every article, in order. */
export function buildDigest(articles: ArticleRecord[], summaries: SummaryResult[]): string {
  let digest = '';
  articles.forEach((art, i) => {
    if (i >= summaries.length) return;
    digest += `### ${i + 1}. ${art.title}\n`;
    digest += `- **Summary:** ${summaries[i]}\n`;
    digest += `- [Read full article](${art.url})\n\n`;
  });
  return digest;
}

export async function generateReport(
  client: CompletionClient,
  articles: ArticleRecord[],
  summaries: SummaryResult[],
  template: ReportPromptTemplate = DEFAULT_REPORT_PROMPT,
): Promise<string> {
  const prompt = template(buildDigest(articles, summaries));
  return client.complete({ prompt, maxTokens: 400, temperature: 0.7 });
}
