import * as v from 'valibot';

export const MIN_ARTICLES = 2;
export const MAX_ARTICLES = 10;
export const DEFAULT_ARTICLES = 4;
export const MAX_LOOKBACK_DAYS = 3650;

export const reportRequestSchema = v.object({
  query: v.pipe(
    v.string('Please enter a topic first.'),
    v.trim(),
    v.nonEmpty('Please enter a topic first.'),
  ),
  count: v.pipe(
    v.number('Article count must be a number'),
    v.integer('Article count must be a whole number'),
    v.minValue(MIN_ARTICLES, `Article count must be at least ${MIN_ARTICLES}`),
    v.maxValue(MAX_ARTICLES, `Article count must be at most ${MAX_ARTICLES}`),
  ),
  lookbackDays: v.optional(
    v.pipe(
      v.number('Lookback must be a number of days'),
      v.integer('Lookback must be a whole number of days'),
      v.minValue(0, 'Lookback cannot be negative'),
      v.maxValue(MAX_LOOKBACK_DAYS, `Lookback must be at most ${MAX_LOOKBACK_DAYS} days`),
    ),
  ),
});

export type ReportRequest = v.InferOutput<typeof reportRequestSchema>;
