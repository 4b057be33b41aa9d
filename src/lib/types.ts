export interface ArticleRecord {
  title: string;
  url: string;
  description: string;
  publishedAt: string; // ISO timestamp as sent by the news API
}

export type ExtractionResult =
  | { ok: true; url: string; text: string }
  | { ok: false; url: string; error: string };

/** A generated summary or the insufficient-content sentinel. */
export type SummaryResult = string;

export interface NewsReport {
  report: string;
  articles: ArticleRecord[];
  summaries: SummaryResult[];
}

export interface NewsQuery {
  query: string;
  count: number;
  lookbackDays: number;
}
