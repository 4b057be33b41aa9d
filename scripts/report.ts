#!/usr/bin/env tsx
/**
 * Headless report runner.
 * Usage: npm run report -- "<topic>" [count] [lookbackDays]
 * Reads the same environment as the web app and prints Markdown to stdout.
 */
import * as v from 'valibot';
import { loadConfig } from '../src/lib/config';
import { createPipelineDeps, getNewsSummary } from '../src/lib/pipeline';
import { renderReportMarkdown } from '../src/lib/render';
import { errorMessage, parseIntOr } from '../src/lib/utils';
import { DEFAULT_ARTICLES, reportRequestSchema } from '../src/schema/validation/reportRequest';

async function main() {
  const [query = '', countArg, daysArg] = process.argv.slice(2);
  const input = v.safeParse(reportRequestSchema, {
    query,
    count: parseIntOr(countArg, DEFAULT_ARTICLES),
    lookbackDays: daysArg === undefined ? undefined : parseIntOr(daysArg, -1),
  });
  if (!input.success) {
    console.error('Invalid arguments:', input.issues.map((i) => i.message).join('; '));
    console.error('Usage: npm run report -- "<topic>" [count 2-10] [lookbackDays]');
    process.exit(1);
  }

  const config = loadConfig();
  const { count } = input.output;
  const lookbackDays = input.output.lookbackDays ?? config.news.lookbackDays;
  const result = await getNewsSummary(createPipelineDeps(config), { query: input.output.query, count, lookbackDays });
  process.stdout.write(renderReportMarkdown(input.output.query, result) + '\n');
}

main().catch((e: unknown) => {
  console.error('Fatal error', errorMessage(e));
  process.exit(1);
});
