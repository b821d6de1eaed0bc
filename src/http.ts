export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Abort the request after this many ms (default: 30000). */
  timeoutMs?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Transport-level failure: DNS, connection reset, timeout, unparseable body. */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

export function parseRetryAfterMs(v: string | null, now = Date.now()): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - now);
  return undefined;
}

function isAbort(e: unknown) {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError');
}

/**
 * One JSON request, no retries. Pacing and retry live in the executor
 * (see retry.ts) so every outbound call shares one policy.
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T> {
  const finalUrl = withQuery(url, opts.query);
  const timeoutMs = opts.timeoutMs ?? 30_000;

  let res: Response;
  try {
    res = await fetcher(finalUrl, {
      method: opts.method ?? 'GET',
      headers: {
        accept: 'application/json',
        ...(opts.body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...(opts.headers ?? {}),
      },
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    if (isAbort(e)) {
      throw new NetworkError(`Timed out after ${timeoutMs}ms for ${finalUrl}`, finalUrl, true, { cause: e });
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new NetworkError(`Request failed for ${finalUrl}: ${msg}`, finalUrl, false, { cause: e });
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => undefined);
    const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
    throw new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt, retryAfterMs);
  }

  if (res.status === 204) return undefined as T;

  const text = await res.text();
  if (!text) return undefined as T;
  try {
    return JSON.parse(text) as T;
  } catch (e) {
    throw new NetworkError(`Invalid JSON from ${finalUrl}`, finalUrl, false, { cause: e });
  }
}
