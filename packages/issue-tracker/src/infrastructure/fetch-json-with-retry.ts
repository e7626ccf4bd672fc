import { setTimeout as sleep } from "node:timers/promises";

export type FetchRetryOptions = {
  retries: number;
  baseDelayMs: number;
};

export type JsonRequest = {
  url: string;
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: unknown;
};

export type FetchJsonResult =
  | { ok: true; payload: unknown }
  | { ok: false; status: number | null; reason: string };

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

const parseRetryAfterMs = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }

  const seconds = Number.parseInt(value, 10);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
};

const shouldRetryStatus = (status: number): boolean => status === 429 || status >= 500;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown network error";

export const fetchJsonWithRetry = async (
  request: JsonRequest,
  options: FetchRetryOptions,
  fetchImpl: FetchFunction = fetch,
): Promise<FetchJsonResult> => {
  const init: RequestInit = {
    method: request.method,
    headers: request.headers,
    ...(request.body === undefined ? {} : { body: JSON.stringify(request.body) }),
  };

  let failure: FetchJsonResult = { ok: false, status: null, reason: "no attempt made" };
  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    let retryAfterMs: number | null = null;
    try {
      const response = await fetchImpl(request.url, init);
      if (response.ok) {
        const payload: unknown = await response.json();
        return { ok: true, payload };
      }

      failure = { ok: false, status: response.status, reason: `HTTP ${response.status}` };
      if (!shouldRetryStatus(response.status)) {
        return failure;
      }

      retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
    } catch (error) {
      failure = { ok: false, status: null, reason: describeError(error) };
    }

    if (attempt === options.retries) {
      return failure;
    }

    await sleep(retryAfterMs ?? options.baseDelayMs * 2 ** attempt);
  }

  return failure;
};
