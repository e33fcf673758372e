import { config } from '../config';
import { ExtractionError, NetworkError, type AppError } from '../errors';
import { sleep } from '../feeds/utils';
import { fetchText } from '../http';
import { log } from '../log';

// Semantic containers used by common blog platforms
const TARGET_SELECTORS = 'article, .entry-content, .post-content, .article-content, .post-body, main .content, main';
const FALLBACK_SELECTOR = '.container';

// Shorter results (metadata lines only) count as a selector miss
const MIN_CONTENT_LENGTH = 200;

const OFFICIAL_HOSTS = ['https://r.jina.ai/', 'https://api.jina.ai/'];

const SELECTOR_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000;
const SELECTOR_CACHE_MAX = 1000;

type SelectorStrategy = 'semantic' | 'fallback' | 'none';

const STRATEGY_SELECTOR: Record<SelectorStrategy, string | null> = {
  semantic: TARGET_SELECTORS,
  fallback: FALLBACK_SELECTOR,
  none: null,
};

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];
const ARCHIVE_LINK = new RegExp(`^\\*.*\\[(?:${MONTHS.join('|')}) \\d{4}`);

export interface ExtractorOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxBytes?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

function isPrivateHost(hostname: string): boolean {
  const host = hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (host === 'localhost' || host.endsWith('.localhost') || host === '::1' || host === '0.0.0.0') return true;
  const octets = host.split('.').map(part => Number(part));
  if (octets.length !== 4 || octets.some(n => !Number.isInteger(n))) return false;
  const [a, b] = octets;
  return a === 10
    || a === 127
    || (a === 169 && b === 254)
    || (a === 172 && b >= 16 && b <= 31)
    || (a === 192 && b === 168);
}

/**
 * Reject article URLs that are not public http(s) pages; the extraction
 * service would otherwise be asked to fetch internal addresses.
 */
export function validateArticleUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ExtractionError(`Invalid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ExtractionError(`Invalid URL: ${raw}`);
  }
  if (isPrivateHost(url.hostname)) {
    throw new ExtractionError(`Refusing to extract private address: ${url.hostname}`);
  }
  return url;
}

/**
 * The base URL must be https, except plain http on a loopback host (local
 * test servers).
 */
export function validateBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ExtractionError('Insecure base URL: HTTPS required (except localhost)');
  }
  if (url.protocol === 'https:') return raw.replace(/\/+$/, '');
  const host = url.hostname.replace(/^\[|\]$/g, '');
  const loopback = host === 'localhost' || host === '::1' || host.startsWith('127.');
  if (url.protocol === 'http:' && loopback) return raw.replace(/\/+$/, '');
  throw new ExtractionError('Insecure base URL: HTTPS required (except localhost)');
}

function isArchiveLink(line: string): boolean {
  return ARCHIVE_LINK.test(line.trim());
}

function isCruft(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('[Skip to content]')
    || trimmed === 'Loading Comments...'
    || trimmed === 'Write a Comment...'
    || trimmed.startsWith('Email (Required)')
    || trimmed === '%d'
    || trimmed.includes('Proudly powered by WordPress')
    || trimmed === 'Menu';
}

/**
 * Remove navigation and comment-form remnants the reader service leaves in,
 * plus runs of three or more monthly archive links.
 */
export function stripBoilerplate(content: string): string {
  const lines = content.split('\n').filter(line => !isCruft(line));
  const result: string[] = [];
  let runStart = -1;

  const closeRun = () => {
    if (runStart >= 0 && result.length - runStart >= 3) result.length = runStart;
    runStart = -1;
  };

  for (const line of lines) {
    if (isArchiveLink(line)) {
      if (runStart < 0) runStart = result.length;
      result.push(line);
    } else {
      closeRun();
      result.push(line);
    }
  }
  closeRun();

  return result.join('\n');
}

function isRetryable(error: AppError): boolean {
  if (error instanceof NetworkError) return error.code !== 'too_large';
  if (error instanceof ExtractionError) return error.status !== null && error.status >= 500;
  return false;
}

function isSelectorRejection(error: unknown): boolean {
  return error instanceof ExtractionError && error.status === 422;
}

/**
 * Client for the Jina reader (`<base>/<article url>`), which returns an
 * article as markdown. Tries semantic CSS selectors first, then a generic
 * container, then the whole page, remembering per domain which one worked.
 */
export class ContentExtractor {
  private readonly baseUrl: string;
  private readonly selectorCache = new Map<string, { strategy: SelectorStrategy; at: number }>();

  constructor(private readonly options: ExtractorOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.jinaBaseUrl;
  }

  async extract(articleUrl: string): Promise<string> {
    const target = validateArticleUrl(articleUrl);
    const base = validateBaseUrl(this.baseUrl);
    const readerUrl = `${base}/${target.toString()}`;
    const domain = target.hostname;

    const cached = this.cachedStrategy(domain);
    if (cached) {
      const content = await this.tryStrategy(readerUrl, cached);
      if (content !== null) return stripBoilerplate(content);
      log.debug('extract', `Cached selector strategy failed for ${domain}`, { strategy: cached });
    }

    for (const strategy of ['semantic', 'fallback'] as const) {
      const content = await this.tryStrategy(readerUrl, strategy);
      if (content !== null) {
        this.remember(domain, strategy);
        return stripBoilerplate(content);
      }
    }

    const content = await this.fetchWithRetry(readerUrl, null);
    this.remember(domain, 'none');
    return stripBoilerplate(content);
  }

  // null means the selector missed (too little content, or rejected with 422)
  private async tryStrategy(readerUrl: string, strategy: SelectorStrategy): Promise<string | null> {
    const selector = STRATEGY_SELECTOR[strategy];
    try {
      const content = await this.fetchWithRetry(readerUrl, selector);
      if (selector === null || content.length >= MIN_CONTENT_LENGTH) return content;
      log.debug('extract', `Selector "${strategy}" returned ${content.length} chars`);
      return null;
    } catch (error) {
      if (selector !== null && isSelectorRejection(error)) return null;
      throw error;
    }
  }

  private async fetchWithRetry(readerUrl: string, selector: string | null): Promise<string> {
    const maxRetries = this.options.maxRetries ?? config.maxRetries;
    const baseDelay = this.options.retryBaseDelayMs ?? config.retryBaseDelayMs;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.fetchOnce(readerUrl, selector);
      } catch (error) {
        if (!(error instanceof NetworkError || error instanceof ExtractionError)) throw error;
        if (!isRetryable(error) || attempt >= maxRetries) throw error;
        const delayMs = baseDelay * 2 ** attempt;
        log.debug('extract', `Retrying reader fetch: ${error.message}`, { attempt: attempt + 1, delayMs });
        await sleep(delayMs);
      }
    }
  }

  private async fetchOnce(readerUrl: string, selector: string | null): Promise<string> {
    const headers: Record<string, string> = { 'User-Agent': config.userAgent };
    if (selector) headers['X-Target-Selector'] = selector;

    const apiKey = this.options.apiKey ?? config.jinaApiKey;
    if (apiKey) {
      if (OFFICIAL_HOSTS.some(host => readerUrl.startsWith(host))) {
        headers['Authorization'] = `Bearer ${apiKey}`;
      } else {
        log.debug('extract', 'Not sending API key to a custom reader base URL');
      }
    }

    const res = await fetchText(readerUrl, {
      headers,
      timeoutMs: this.options.timeoutMs ?? config.extractTimeoutMs,
      maxBytes: this.options.maxBytes ?? config.maxContentBytes,
    });
    if (!res.ok) {
      throw new ExtractionError(`HTTP error: status ${res.status}`, res.status);
    }
    return res.body;
  }

  private cachedStrategy(domain: string): SelectorStrategy | null {
    const entry = this.selectorCache.get(domain);
    if (!entry) return null;
    if (Date.now() - entry.at > SELECTOR_CACHE_TTL_MS) {
      this.selectorCache.delete(domain);
      return null;
    }
    return entry.strategy;
  }

  private remember(domain: string, strategy: SelectorStrategy): void {
    this.selectorCache.delete(domain);
    this.selectorCache.set(domain, { strategy, at: Date.now() });
    if (this.selectorCache.size > SELECTOR_CACHE_MAX) {
      const oldest = this.selectorCache.keys().next();
      if (!oldest.done) this.selectorCache.delete(oldest.value);
    }
  }
}
