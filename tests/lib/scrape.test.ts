import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { delay, http, HttpResponse } from 'msw';
import { extractArticleText, extractionText, htmlToText } from '@/lib/scrape';
import { resetMswHandlers, server, startMswServer, stopMswServer } from '../mocks/server';

const ARTICLE_HTML = `<html><head><title>Solar</title><script>var tracking = 1;</script></head>
<body>
  <nav><p>Home | World | Science</p></nav>
  <article>
    <h1>Solar output hits record</h1>
    <p>Solar farms   produced more power this spring
       than ever before.</p>
    <p>Grid operators expect the trend to continue.</p>
    <aside><p>Related: wind power</p></aside>
  </article>
  <footer><p>Copyright</p></footer>
</body></html>`;

const ARTICLE_TEXT =
  'Solar farms produced more power this spring than ever before.\n\nGrid operators expect the trend to continue.';

beforeAll(() => {
  startMswServer();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});
afterEach(() => resetMswHandlers());
afterAll(() => {
  stopMswServer();
  vi.restoreAllMocks();
});

describe('htmlToText', () => {
  it('keeps the paragraphs of the main container and drops page chrome', () => {
    expect(htmlToText(ARTICLE_HTML)).toBe(ARTICLE_TEXT);
  });

  it('falls back to the collapsed container text when there are no paragraphs', () => {
    expect(htmlToText('<html><body><main><div>Just   a line\n of text</div></main></body></html>')).toBe(
      'Just a line of text',
    );
  });

  it('skips a container that holds nothing but page chrome', () => {
    const html = `<html><body>
      <article><aside><p>Related: wind power</p></aside></article>
      <div><p>Battery prices fell again this quarter.</p></div>
    </body></html>`;
    expect(htmlToText(html)).toBe('Battery prices fell again this quarter.');
  });

  it('returns an empty string for an empty page', () => {
    expect(htmlToText('<html><body></body></html>')).toBe('');
  });
});

describe('extractArticleText', () => {
  it('returns the article text on success', async () => {
    server.use(http.get('https://pages.test/solar', () => HttpResponse.html(ARTICLE_HTML)));

    expect(await extractArticleText('https://pages.test/solar')).toEqual({
      ok: true,
      url: 'https://pages.test/solar',
      text: ARTICLE_TEXT,
    });
  });

  it('reports a non-success status as a failure', async () => {
    server.use(http.get('https://pages.test/missing', () => new HttpResponse('nope', { status: 404 })));

    expect(await extractArticleText('https://pages.test/missing')).toEqual({
      ok: false,
      url: 'https://pages.test/missing',
      error: 'Error extracting https://pages.test/missing: HTTP 404',
    });
  });

  it('reports a page without text as a failure', async () => {
    server.use(http.get('https://pages.test/blank', () => HttpResponse.html('<html><body></body></html>')));

    const result = await extractArticleText('https://pages.test/blank');
    expect(extractionText(result)).toBe('Error extracting https://pages.test/blank: no article text found');
  });

  it('does not throw on a network error', async () => {
    server.use(http.get('https://pages.test/down', () => HttpResponse.error()));

    const result = await extractArticleText('https://pages.test/down');
    expect(result.ok).toBe(false);
    expect(extractionText(result).startsWith('Error extracting https://pages.test/down: ')).toBe(true);
  });

  it('times out when the page never answers', async () => {
    server.use(
      http.get('https://pages.test/stuck', async () => {
        await delay(1000);
        return HttpResponse.html(ARTICLE_HTML);
      }),
    );

    expect(await extractArticleText('https://pages.test/stuck', { timeoutMs: 100 })).toEqual({
      ok: false,
      url: 'https://pages.test/stuck',
      error: 'Error extracting https://pages.test/stuck: timed out after 100ms',
    });
  });

  it('times out when the body stalls after the headers arrive', async () => {
    const encoder = new TextEncoder();
    let chunks = 0;
    const body = new ReadableStream<Uint8Array>({
      async pull(controller) {
        if (chunks++ === 0) {
          controller.enqueue(encoder.encode('<html><body><article><p>Solar farms'));
          return;
        }
        await new Promise((res) => setTimeout(res, 1000));
        controller.enqueue(encoder.encode(' produced more power.</p></article></body></html>'));
        controller.close();
      },
    });
    server.use(
      http.get('https://pages.test/slow', () => new HttpResponse(body, { headers: { 'Content-Type': 'text/html' } })),
    );

    const started = Date.now();
    const result = await extractArticleText('https://pages.test/slow', { timeoutMs: 100 });

    expect(result).toEqual({
      ok: false,
      url: 'https://pages.test/slow',
      error: 'Error extracting https://pages.test/slow: timed out after 100ms',
    });
    expect(Date.now() - started).toBeLessThan(900);
  });
});
