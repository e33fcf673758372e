import { NetworkError, categorizeNetworkError } from './errors';

/**
 * fetch with a hard deadline covering both the response and the body.
 * Hangs and transport failures surface as NetworkError, never as a raw
 * TypeError or AbortError.
 */
export async function fetchText(
  url: string,
  init: { headers?: Record<string, string>; timeoutMs: number; maxBytes: number }
): Promise<{ status: number; ok: boolean; body: string }> {
  const signal = AbortSignal.timeout(init.timeoutMs);

  let res: Response;
  try {
    res = await fetch(url, { headers: init.headers, signal, redirect: 'follow' });
  } catch (error) {
    throw categorizeNetworkError(error);
  }

  const declared = parseInt(res.headers.get('content-length') || '', 10);
  if (Number.isFinite(declared) && declared > init.maxBytes) {
    throw new NetworkError(`Response too large (exceeds ${init.maxBytes} bytes)`, 'too_large', res.status);
  }

  let body: string;
  try {
    body = await res.text();
  } catch (error) {
    throw categorizeNetworkError(error);
  }

  if (Buffer.byteLength(body) > init.maxBytes) {
    throw new NetworkError(`Response too large (exceeds ${init.maxBytes} bytes)`, 'too_large', res.status);
  }

  return { status: res.status, ok: res.ok, body };
}
