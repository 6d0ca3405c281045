export type HttpRequestError = Error & {
  status?: number;
  isTimeout?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

const asHttpError = (err: unknown): HttpRequestError | undefined => (err instanceof Error ? err : undefined);

export const toSafeUrl = (raw: string): string => {
  const url = new URL(raw);
  return `${url.origin}${url.pathname}${url.search}`;
};

/**
 * Retry policy shared by the HTTP adapters: timeouts, 429 and 5xx are retried,
 * other 4xx are final. A 429 may carry the server's Retry-After delay.
 */
export const shouldRetryHttpError = (err: unknown) => {
  const httpError = asHttpError(err);
  if (httpError?.isTimeout) return true;

  const status = httpError?.status;
  if (status === 429) {
    return { retry: true, delayMs: httpError?.retryDelayMs };
  }
  if (typeof status === "number" && status >= 400 && status < 500) return false;
  if (typeof status === "number" && status >= 500) return true;
  if (typeof status === "number") return false;
  return true;
};

export const fetchWithTimeout = async (
  url: string,
  timeoutMs: number,
  label: string,
  init: { headers?: Record<string, string> } = {}
): Promise<Response> => {
  const safeRequestUrl = toSafeUrl(url);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  let res: Response;
  try {
    res = await fetch(url, { headers: init.headers, signal: controller.signal });
  } catch (err) {
    if (controller.signal.aborted) {
      const timeoutError: HttpRequestError = new Error(`${label} request timeout after ${timeoutMs}ms`);
      timeoutError.isTimeout = true;
      timeoutError.requestUrl = safeRequestUrl;
      throw timeoutError;
    }
    throw err;
  } finally {
    clearTimeout(timeout);
  }

  if (!res.ok) {
    await res.text().catch(() => "");
    const err: HttpRequestError = new Error(`${label} request failed: ${res.status}`);
    err.status = res.status;
    err.requestUrl = safeRequestUrl;
    if (res.status === 429) {
      const retryAfter = res.headers.get("retry-after");
      if (retryAfter && /^\d+$/.test(retryAfter)) {
        err.retryDelayMs = Number(retryAfter) * 1000;
      }
    }
    throw err;
  }

  return res;
};

export const logHttpAttempt = (event: "http.retry" | "http.give_up", fallbackUrl: string) =>
  ({ attempt, maxAttempts, error }: { attempt: number; maxAttempts: number; error: unknown }) => {
    const httpError = asHttpError(error);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event,
      status: httpError?.status ?? null,
      url: httpError?.requestUrl ?? fallbackUrl,
      attempt,
      maxAttempts
    }));
  };
