import * as v from 'valibot';

export const ArticleRecordSchema = v.object({
  title: v.string(),
  url: v.string(),
  description: v.string(),
  publishedAt: v.string(),
});

export const NewsReportSchema = v.object({
  report: v.string(),
  articles: v.array(ArticleRecordSchema),
  summaries: v.array(v.string()),
});

export const ErrorResponseSchema = v.object({
  error: v.string(),
  details: v.optional(v.union([v.string(), v.array(v.string())])),
});
