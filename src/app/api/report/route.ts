import { NextRequest } from 'next/server';
import * as v from 'valibot';
import { getConfig } from '@/lib/config';
import { CompletionError, ConfigError, NewsApiError } from '@/lib/errors';
import { createPipelineDeps, getNewsSummary } from '@/lib/pipeline';
import { errorMessage } from '@/lib/utils';
import { reportRequestSchema } from '@/schema/validation/reportRequest';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', 'Cache-Control': 'no-store' },
  });
}

export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return json({ error: 'Invalid JSON' }, 400);
  }

  const parsed = v.safeParse(reportRequestSchema, body);
  if (!parsed.success) {
    return json({ error: 'Invalid request', details: parsed.issues.map((i) => i.message) }, 400);
  }

  try {
    const config = getConfig();
    const { query, count } = parsed.output;
    const lookbackDays = parsed.output.lookbackDays ?? config.news.lookbackDays;
    console.log('[report] request', { query, count, lookbackDays });

    const result = await getNewsSummary(createPipelineDeps(config), { query, count, lookbackDays });
    return json(result);
  } catch (e: unknown) {
    console.error('[report] failed', e);
    if (e instanceof NewsApiError) return json({ error: 'News search failed', details: e.message }, 502);
    if (e instanceof CompletionError) return json({ error: 'Model request failed', details: e.message }, 502);
    if (e instanceof ConfigError) return json({ error: 'Server misconfigured', details: e.message }, 500);
    return json({ error: 'Server error', details: errorMessage(e) }, 500);
  }
}
