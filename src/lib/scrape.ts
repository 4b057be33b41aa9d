import { parse, HTMLElement } from 'node-html-parser';
import type { ExtractionResult } from './types';
import { errorMessage } from './utils';

export interface ExtractOptions {
  timeoutMs?: number;
}

// Limits / tuning
const MAX_MAIN_TEXT_CHARS = 20_000;
const DEFAULT_TIMEOUT_MS = 15_000;

const MAIN_SELECTORS = [
  'article',
  'main',
  '[role="main"]',
  '[itemprop="articleBody"]',
  '#content',
  '#main-content',
  '.post-content',
  '.entry-content',
  '.article-body',
];

const NOISE_SELECTORS = 'script,style,noscript,nav,header,footer,aside,form';

class ExtractTimeoutError extends Error {}

interface FetchedPage {
  ok: boolean;
  status: number;
  html: string;
}

// The deadline covers the whole exchange, body included.
async function fetchPageWithTimeout(url: string, init: RequestInit, ms: number): Promise<FetchedPage> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExtractTimeoutError(`timed out after ${ms}ms`));
      controller.abort();
    }, ms);
  });
  const read = async (): Promise<FetchedPage> => {
    const res = await fetch(url, { ...init, signal: controller.signal });
    return { ok: res.ok, status: res.status, html: res.ok ? await res.text() : '' };
  };
  try {
    return await Promise.race([read(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// Expects page chrome to be stripped already, so a container holding only
// noise does not win over the body.
function pickMainContainer(root: HTMLElement): HTMLElement {
  for (const sel of MAIN_SELECTORS) {
    const found = root.querySelector(sel);
    if (found && found.textContent.trim()) return found;
  }
  return root.querySelector('body') ?? root;
}

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/** Plain text of the main content of an HTML page, paragraphs separated by a blank line. */
export function htmlToText(html: string): string {
  const root = parse(html);
  root.querySelectorAll(NOISE_SELECTORS).forEach((n) => n.remove());
  const main = pickMainContainer(root);

  const paragraphs = main
    .querySelectorAll('p')
    .map((p) => collapse(p.textContent))
    .filter(Boolean);
  const text = paragraphs.length ? paragraphs.join('\n\n') : collapse(main.textContent);
  return text.slice(0, MAX_MAIN_TEXT_CHARS);
}

function failure(url: string, cause: string): ExtractionResult {
  return { ok: false, url, error: `Error extracting ${url}: ${cause}` };
}

/**
 * Download `url` and pull out the article text. Never throws: network, HTTP,
 * parse and timeout problems come back as the failure variant.
 */
export async function extractArticleText(url: string, opts?: ExtractOptions): Promise<ExtractionResult> {
  const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  try {
    const page = await fetchPageWithTimeout(url, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
    }, timeoutMs);
    if (!page.ok) return failure(url, `HTTP ${page.status}`);

    const text = htmlToText(page.html);
    if (!text) return failure(url, 'no article text found');
    console.log('[scrape] extracted', { url, textLen: text.length });
    return { ok: true, url, text };
  } catch (e: unknown) {
    const result = failure(url, errorMessage(e));
    console.warn('[scrape] failed', { url, error: errorMessage(e) });
    return result;
  }
}

/** Text view of an extraction: the article text, or the `Error extracting ...` message. */
export function extractionText(result: ExtractionResult): string {
  return result.ok ? result.text : result.error;
}
