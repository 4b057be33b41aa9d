"use client";
import { useState, type FormEvent } from 'react';
import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import * as v from 'valibot';
import type { NewsReport } from '@/lib/types';
import { ErrorResponseSchema, NewsReportSchema } from '@/schema/reportResponse';
import {
  DEFAULT_ARTICLES,
  MAX_ARTICLES,
  MIN_ARTICLES,
  reportRequestSchema,
} from '@/schema/validation/reportRequest';

function formatPublished(iso: string): string {
  if (!iso) return '';
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? '' : d.toLocaleDateString(undefined, { year: 'numeric', month: 'short', day: 'numeric' });
}

function describeError(body: unknown, status: number): string {
  const parsed = v.safeParse(ErrorResponseSchema, body);
  if (!parsed.success) return `Request failed (${status})`;
  const { error, details } = parsed.output;
  if (!details) return error;
  return `${error}: ${Array.isArray(details) ? details.join(', ') : details}`;
}

export default function Home() {
  const [query, setQuery] = useState('');
  const [count, setCount] = useState(DEFAULT_ARTICLES);
  const [loading, setLoading] = useState(false);
  const [warning, setWarning] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<NewsReport | null>(null);

  async function generate(e: FormEvent) {
    e.preventDefault();
    if (loading) return;
    setWarning(null);
    setError(null);

    const input = v.safeParse(reportRequestSchema, { query, count });
    if (!input.success) {
      setWarning(input.issues[0].message);
      return;
    }

    setLoading(true);
    try {
      const res = await fetch('/api/report', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(input.output),
      });
      const body: unknown = await res.json();
      if (!res.ok) {
        setResult(null);
        setError(describeError(body, res.status));
        return;
      }
      const report = v.safeParse(NewsReportSchema, body);
      if (!report.success) {
        setResult(null);
        setError('Unexpected response from server.');
        return;
      }
      setResult(report.output);
    } catch (_e: unknown) {
      setError('Server error.');
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="min-h-screen w-full bg-white text-neutral-900">
      <div className="max-w-5xl mx-auto px-6 md:px-12 pt-8 pb-12">
        {/* Header */}
        <header className="mb-6">
          <h1 className="text-4xl font-bold">📖 RapidReads</h1>
          <p className="mt-1 text-lg text-neutral-600">Stay informed with quick summaries and reports from the latest articles.</p>
        </header>
        <hr className="border-neutral-200 mb-6" />

        <form onSubmit={generate} className="space-y-4">
          <div>
            <label htmlFor="topic" className="block text-sm font-medium mb-1">🔍 Enter a topic or keyword:</label>
            <input
              id="topic"
              className="w-full rounded-lg border border-neutral-300 px-3 py-2 focus:outline-none focus:ring-2 focus:ring-emerald-500"
              placeholder="e.g., recent advancements in renewable energy"
              value={query}
              onChange={(e) => setQuery(e.target.value)}
            />
          </div>
          <div>
            <label htmlFor="count" className="block text-sm font-medium mb-1">
              Number of articles to fetch: <span className="font-semibold">{count}</span>
            </label>
            <input
              id="count"
              type="range"
              min={MIN_ARTICLES}
              max={MAX_ARTICLES}
              step={1}
              value={count}
              onChange={(e) => setCount(Number(e.target.value))}
              className="w-full accent-emerald-600"
            />
          </div>
          <button
            type="submit"
            disabled={loading}
            className="rounded-lg bg-emerald-600 hover:bg-emerald-500 text-white px-4 py-2 font-medium disabled:opacity-50"
          >
            🚀 Generate Report
          </button>
        </form>

        {warning && (
          <div role="status" className="mt-4 rounded-lg border border-amber-300 bg-amber-50 px-3 py-2 text-amber-900">⚠️ {warning}</div>
        )}
        {error && (
          <div role="alert" className="mt-4 rounded-lg border border-red-300 bg-red-50 px-3 py-2 text-red-900">{error}</div>
        )}
        {loading && (
          <div className="mt-6 text-sm text-neutral-600 flex items-center gap-2">
            <span className="inline-block w-2 h-2 rounded-full bg-emerald-500 animate-pulse" />
            <span>Fetching and processing articles...</span>
          </div>
        )}

        {result && !loading && (
          <>
            <section className="mt-8">
              <h3 className="text-2xl font-semibold mb-3">📝 Summary Report</h3>
              <div className="rounded-xl border border-neutral-200 bg-neutral-50 p-5 prose prose-sm max-w-none">
                <ReactMarkdown remarkPlugins={[remarkGfm]}>{result.report}</ReactMarkdown>
              </div>
            </section>

            {result.articles.length > 0 && (
              <section className="mt-8">
                <hr className="border-neutral-200 mb-6" />
                <h3 className="text-2xl font-semibold mb-3">📑 Article Summaries</h3>
                {result.articles.map((art, i) => {
                  const published = formatPublished(art.publishedAt);
                  return (
                    <article key={`${i}-${art.url}`} className="mb-5 rounded-2xl border border-neutral-200 p-5 shadow-sm transition hover:-translate-y-1 hover:shadow-md">
                      <h4 className="text-lg font-semibold mb-1">{i + 1}. {art.title}</h4>
                      {published && <div className="text-xs text-neutral-500 mb-2">{published}</div>}
                      <p className="mb-3 text-[15px] leading-relaxed">{result.summaries[i]}</p>
                      <a
                        href={art.url}
                        target="_blank"
                        rel="noopener noreferrer"
                        className="inline-block rounded-lg bg-emerald-600 hover:bg-emerald-500 text-white text-sm font-medium px-3 py-2"
                      >
                        Read More 👉
                      </a>
                    </article>
                  );
                })}
              </section>
            )}
          </>
        )}
      </div>
    </div>
  );
}
