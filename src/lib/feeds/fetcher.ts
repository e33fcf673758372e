import { config } from '../config';
import { NetworkError } from '../errors';
import { fetchText } from '../http';
import { log } from '../log';
import { sleep } from './utils';

export interface FetchFeedOptions {
  timeoutMs?: number;
  maxBytes?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  onRetry?: (attempt: number, status: number, delayMs: number) => void;
}

/**
 * Download a feed document. 429 and 5xx responses are retried with
 * exponential backoff (1x, 2x, 4x the base delay); any other non-2xx fails
 * immediately.
 */
export async function fetchFeedDocument(url: string, options: FetchFeedOptions = {}): Promise<string> {
  const maxRetries = options.maxRetries ?? config.maxRetries;
  const baseDelay = options.retryBaseDelayMs ?? config.retryBaseDelayMs;

  for (let attempt = 0; ; attempt++) {
    const res = await fetchText(url, {
      headers: {
        'User-Agent': config.userAgent,
        'Accept': 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      },
      timeoutMs: options.timeoutMs ?? config.feedTimeoutMs,
      maxBytes: options.maxBytes ?? config.maxFeedBytes,
    });

    if (res.ok) return res.body;

    const retryable = res.status === 429 || res.status >= 500;
    if (!retryable || attempt >= maxRetries) {
      if (res.status === 429) {
        throw new NetworkError(`Rate limited after ${maxRetries} retries`, 'rate_limited', 429);
      }
      throw new NetworkError(`HTTP error: status ${res.status}`, 'http', res.status);
    }

    const delayMs = baseDelay * 2 ** attempt;
    log.debug('fetch', `Retrying ${url} after status ${res.status}`, { attempt: attempt + 1, delayMs });
    options.onRetry?.(attempt + 1, res.status, delayMs);
    await sleep(delayMs);
  }
}
