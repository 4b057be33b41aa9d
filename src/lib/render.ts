import type { NewsReport } from './types';

/** Whole run as one Markdown document: report first, then one section per article. */
export function renderReportMarkdown(query: string, { report, articles, summaries }: NewsReport): string {
  const lines = [`# Report: ${query}`, '', report, ''];
  if (articles.length) {
    lines.push('## Article Summaries', '');
    articles.forEach((art, i) => {
      lines.push(`### ${i + 1}. ${art.title}`, '', summaries[i] ?? '', '', `Source: ${art.url}`, '');
    });
  }
  return lines.join('\n');
}
