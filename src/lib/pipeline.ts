import type { AppConfig } from './config';
import { createCompletionClient, type CompletionClient } from './llm';
import { fetchRecentArticles } from './news';
import { DEFAULT_REPORT_PROMPT, generateReport, type ReportPromptTemplate } from './report';
import { extractArticleText } from './scrape';
import { summarizeExtraction } from './summarize';
import type { ArticleRecord, ExtractionResult, NewsQuery, NewsReport } from './types';
import { mapWithConcurrency } from './utils';

export const NO_ARTICLES_REPORT = 'No recent articles found for this topic.';

export interface PipelineDeps {
  findArticles: (q: NewsQuery) => Promise<ArticleRecord[]>;
  extractText: (url: string) => Promise<ExtractionResult>;
  client: CompletionClient;
  concurrency?: number;
  reportPrompt?: ReportPromptTemplate;
}

export function createPipelineDeps(config: AppConfig): PipelineDeps {
  return {
    findArticles: (q) => fetchRecentArticles(config.news, q),
    extractText: (url) => extractArticleText(url, { timeoutMs: config.extractTimeoutMs }),
    client: createCompletionClient(config.llm),
    concurrency: config.concurrency,
  };
}

/**
 * Find → (extract → summarize) per article → one synthesized report.
 * Summaries line up one-to-one with `articles`. Search and model failures
 * abort the run; extraction failures become the insufficient-content summary.
 */
export async function getNewsSummary(deps: PipelineDeps, input: NewsQuery): Promise<NewsReport> {
  const started = Date.now();
  const articles = await deps.findArticles(input);
  if (!articles.length) {
    console.log('[pipeline] no articles', { query: input.query });
    return { report: NO_ARTICLES_REPORT, articles: [], summaries: [] };
  }

  const summaries = await mapWithConcurrency(articles, deps.concurrency ?? 1, async (art, index) => {
    const extraction = await deps.extractText(art.url);
    if (!extraction.ok) console.warn('[pipeline] extraction failed', { index, error: extraction.error });
    const summary = await summarizeExtraction(deps.client, extraction);
    console.log('[pipeline] summarized', { index, url: art.url, summaryLen: summary.length });
    return summary;
  });

  const report = await generateReport(deps.client, articles, summaries, deps.reportPrompt ?? DEFAULT_REPORT_PROMPT);
  console.log('[pipeline] report ready', { query: input.query, articles: articles.length, ms: Date.now() - started });
  return { report, articles, summaries };
}
