import axios, { type AxiosResponse } from 'axios';
import * as v from 'valibot';
import type { NewsConfig } from './config';
import { NewsApiError } from './errors';
import type { ArticleRecord, NewsQuery } from './types';
import { errorMessage } from './utils';
import { NewsApiErrorBodySchema, NewsApiResponseSchema } from '@/schema/newsApi';
import { MAX_LOOKBACK_DAYS } from '@/schema/validation/reportRequest';

const DAY_MS = 24 * 60 * 60 * 1000;

/** `YYYY-MM-DD` (UTC) of `now` minus `days`, with `days` capped at MAX_LOOKBACK_DAYS. */
export function fromDate(now: Date, days: number): string {
  const span = Math.min(Math.max(days, 0), MAX_LOOKBACK_DAYS);
  return new Date(now.getTime() - span * DAY_MS).toISOString().slice(0, 10);
}

function upstreamMessage(status: number, data: unknown): string {
  const parsed = v.safeParse(NewsApiErrorBodySchema, data);
  const detail = parsed.success ? parsed.output.message : `HTTP ${status}`;
  return `News API error ${status}: ${detail}`;
}

/**
 * Query the news search API for the most recent English articles on `query`.
 * Returns at most `count` records in the API's recency order; results without
 * a URL are dropped. A non-success status, or no reply at all, throws NewsApiError.
 */
export async function fetchRecentArticles(
  config: NewsConfig,
  { query, count, lookbackDays }: NewsQuery,
  now: Date = new Date(),
): Promise<ArticleRecord[]> {
  let res: AxiosResponse<unknown>;
  try {
    res = await axios.get<unknown>(config.url, {
      params: {
        q: query,
        from: fromDate(now, lookbackDays),
        sortBy: 'publishedAt',
        apiKey: config.apiKey,
        pageSize: count,
        language: 'en',
      },
      timeout: config.timeoutMs,
      validateStatus: () => true,
    });
  } catch (e: unknown) {
    // No reply at all: network error or timeout.
    throw new NewsApiError(0, `News API request failed: ${errorMessage(e)}`);
  }

  if (res.status < 200 || res.status >= 300) {
    throw new NewsApiError(res.status, upstreamMessage(res.status, res.data));
  }

  const parsed = v.safeParse(NewsApiResponseSchema, res.data);
  if (!parsed.success) {
    throw new NewsApiError(res.status, 'News API returned an unexpected body');
  }

  const articles: ArticleRecord[] = [];
  for (const item of parsed.output.articles) {
    if (!item.url) continue;
    articles.push({
      title: item.title ?? '',
      url: item.url,
      description: item.description ?? '',
      publishedAt: item.publishedAt ?? '',
    });
  }
  const kept = articles.slice(0, count);
  console.log('[news] fetched', { query, requested: count, received: parsed.output.articles.length, kept: kept.length });
  return kept;
}
