import type { Article } from '@/types';
import type { AppError } from '../errors';

// Per-article extraction lifecycle, held in memory only
export type ContentState =
  | { status: 'idle' }
  | { status: 'loading'; generation: number }
  | { status: 'loaded'; content: string }
  | { status: 'failed'; error: AppError; fallback: string | null };

export const IDLE: ContentState = { status: 'idle' };

/**
 * Initial state for an article: stored extracted content counts as loaded.
 */
export function initialContentState(article: Article): ContentState {
  return article.content ? { status: 'loaded', content: article.content } : IDLE;
}

/**
 * Decide whether opening (or retrying) an article starts an extraction.
 * Returns the new loading state, or null when nothing should be spawned:
 * a load is already in flight, or content is loaded and the caller did not
 * force a reload.
 */
export function beginLoad(current: ContentState, generation: number, force = false): ContentState | null {
  switch (current.status) {
    case 'loading':
      return null;
    case 'loaded':
      return force ? { status: 'loading', generation } : null;
    case 'idle':
    case 'failed':
      return { status: 'loading', generation };
  }
}

/**
 * Apply an extraction result. A result from an older generation than the
 * load in flight is dropped (returns null).
 */
export function completeLoad(
  current: ContentState,
  generation: number,
  outcome: { ok: true; content: string } | { ok: false; error: AppError },
  summary: string | null
): ContentState | null {
  if (current.status === 'loading' && current.generation !== generation) return null;
  if (current.status === 'loaded' && !outcome.ok) return null;

  if (outcome.ok) return { status: 'loaded', content: outcome.content };
  return { status: 'failed', error: outcome.error, fallback: summary };
}

// Body to show in the reader for the given state
export function displayBody(state: ContentState, article: Article): string {
  switch (state.status) {
    case 'loaded':
      return state.content;
    case 'failed':
      return state.fallback ?? article.summary ?? '';
    case 'loading':
    case 'idle':
      return article.summary ?? '';
  }
}

export function isLoading(state: ContentState | undefined): boolean {
  return state?.status === 'loading';
}
