import * as v from 'valibot';

const NewsApiArticleSchema = v.object({
  title: v.nullish(v.string()),
  url: v.nullish(v.string()),
  description: v.nullish(v.string()),
  publishedAt: v.nullish(v.string()),
});

export const NewsApiResponseSchema = v.object({
  status: v.optional(v.string()),
  articles: v.optional(v.array(NewsApiArticleSchema), []),
});

export const NewsApiErrorBodySchema = v.object({
  message: v.string(),
});

export type NewsApiArticle = v.InferOutput<typeof NewsApiArticleSchema>;
