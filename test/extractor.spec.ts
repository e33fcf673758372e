import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ContentExtractor, stripBoilerplate, validateArticleUrl, validateBaseUrl } from '@/lib/content/extractor';
import { ExtractionError, NetworkError } from '@/lib/errors';

const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

const LONG_BODY = `# Article\n\n${'Lorem ipsum dolor sit amet. '.repeat(12)}`;

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return undefined;
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}

describe('ContentExtractor', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the reader output for the semantic selector', async () => {
    fetchMock.mockResolvedValue(new Response(LONG_BODY, { status: 200 }));
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0 });

    expect(await extractor.extract('https://blog.test/post')).toBe(LONG_BODY);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://r.jina.ai/https://blog.test/post');
    expect(headerOf(init, 'X-Target-Selector')).toContain('article');
  });

  it('falls through the selector chain when results are too short', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('tiny', { status: 200 }))
      .mockResolvedValueOnce(new Response('', { status: 422 }))
      .mockResolvedValueOnce(new Response('whole page', { status: 200 }));
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0 });

    expect(await extractor.extract('https://blog.test/post')).toBe('whole page');
    expect(fetchMock.mock.calls.map(([, init]) => headerOf(init, 'X-Target-Selector'))).toEqual([
      'article, .entry-content, .post-content, .article-content, .post-body, main .content, main',
      '.container',
      undefined,
    ]);
  });

  it('remembers which selector worked for a domain', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('tiny', { status: 200 }))
      .mockResolvedValueOnce(new Response(LONG_BODY, { status: 200 }))
      .mockResolvedValueOnce(new Response(LONG_BODY, { status: 200 }));
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0 });

    await extractor.extract('https://blog.test/one');
    await extractor.extract('https://blog.test/two');

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(headerOf(fetchMock.mock.calls[2][1], 'X-Target-Selector')).toBe('.container');
  });

  it('sends the API key only to the official host', async () => {
    fetchMock.mockImplementation(async () => new Response(LONG_BODY, { status: 200 }));

    await new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: 'test-secret' }).extract('https://blog.test/a');
    expect(headerOf(fetchMock.mock.calls[0][1], 'Authorization')).toBe('Bearer test-secret');

    await new ContentExtractor({ baseUrl: 'http://localhost:8080', apiKey: 'test-secret' }).extract('https://blog.test/a');
    expect(fetchMock.mock.calls[1][0]).toBe('http://localhost:8080/https://blog.test/a');
    expect(headerOf(fetchMock.mock.calls[1][1], 'Authorization')).toBeUndefined();
  });

  it('retries server errors and gives up after three retries', async () => {
    fetchMock.mockImplementation(async () => new Response('down', { status: 503 }));
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0 });

    const error = await extractor.extract('https://blog.test/post').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error instanceof ExtractionError && error.status).toBe(503);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('does not retry a 404', async () => {
    fetchMock.mockImplementation(async () => new Response('missing', { status: 404 }));
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0 });

    await expect(extractor.extract('https://blog.test/post')).rejects.toThrow('HTTP error: status 404');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports a timeout as a network timeout', async () => {
    fetchMock.mockImplementation(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const extractor = new ContentExtractor({ baseUrl: 'https://r.jina.ai', apiKey: '', retryBaseDelayMs: 0, maxRetries: 0 });

    const error = await extractor.extract('https://blog.test/post').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error instanceof NetworkError && error.code).toBe('timeout');
  });
});

describe('URL checks', () => {
  it('refuses private and malformed article URLs', () => {
    expect(() => validateArticleUrl('not a url')).toThrow(ExtractionError);
    expect(() => validateArticleUrl('ftp://blog.test/file')).toThrow(ExtractionError);
    expect(() => validateArticleUrl('http://localhost/admin')).toThrow(ExtractionError);
    expect(() => validateArticleUrl('http://192.168.1.1/')).toThrow(ExtractionError);
    expect(() => validateArticleUrl('http://10.0.0.1/')).toThrow(ExtractionError);
    expect(validateArticleUrl('https://blog.test/post').hostname).toBe('blog.test');
  });

  it('requires https for the reader base unless it is loopback', () => {
    expect(validateBaseUrl('https://r.jina.ai/')).toBe('https://r.jina.ai');
    expect(validateBaseUrl('http://127.0.0.1:3000')).toBe('http://127.0.0.1:3000');
    expect(() => validateBaseUrl('http://reader.example.com')).toThrow(ExtractionError);
  });
});

describe('stripBoilerplate', () => {
  it('removes navigation and comment scaffolding', () => {
    const input = [
      '[Skip to content](#main)',
      'Menu',
      'Real paragraph.',
      'Loading Comments...',
      'Write a Comment...',
      'Email (Required) Name (Required)',
      '%d',
      'Proudly powered by WordPress',
      'Last line.',
    ].join('\n');
    expect(stripBoilerplate(input)).toBe('Real paragraph.\nLast line.');
  });

  it('drops runs of three or more archive links but keeps shorter ones', () => {
    const input = [
      'Intro',
      '*   [March 2024](https://blog.test/2024/03)',
      '*   [February 2024](https://blog.test/2024/02)',
      '*   [January 2024](https://blog.test/2024/01)',
      'Middle',
      '*   [May 2023](https://blog.test/2023/05)',
      'End',
    ].join('\n');
    expect(stripBoilerplate(input)).toBe('Intro\nMiddle\n*   [May 2023](https://blog.test/2023/05)\nEnd');
  });
});
