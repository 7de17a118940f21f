import { retry } from "../../shared/retry/retry";
import { logWarn } from "../../shared/logging/log";

export class HttpRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }) {
    super(args.message);
    this.name = "HttpRequestError";
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type HttpRetryOptions = {
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export const defaultHttpRetryOptions: HttpRetryOptions = {
  retries: 3,
  minDelayMs: 250,
  maxDelayMs: 5000
};

export const isRetryableHttpError = (err: unknown): boolean | { retry: boolean; delayMs?: number } => {
  if (!(err instanceof HttpRequestError)) return true;
  if (err.isTimeout) return true;

  const status = err.status;
  if (status === 429) {
    return { retry: true, delayMs: err.retryDelayMs };
  }
  if (typeof status === "number" && status >= 400 && status < 500) return false;
  if (typeof status === "number" && status >= 500) return true;
  if (typeof status === "number") return false;
  return true;
};

const parseRetryAfterMs = (header: string | null): number | undefined =>
  header && /^\d+$/.test(header) ? Number(header) * 1000 : undefined;

/**
 * JSON-over-HTTP POST with a per-request timeout and bounded retries on timeouts,
 * 5xx and 429. Logs carry only status, origin+path and attempt counters.
 */
export class HttpJsonClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30_000,
    private readonly retryOptions: HttpRetryOptions = defaultHttpRetryOptions
  ) {}

  buildUrl(pathSegments: string[]): URL {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${base}/${pathSegments.map(encodeURIComponent).join("/")}`;
    return url;
  }

  async postJson(pathSegments: string[], body: unknown, opts: { signal?: AbortSignal } = {}): Promise<unknown> {
    const url = this.buildUrl(pathSegments);
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    const parentSignal = opts.signal;

    const doFetch = async (): Promise<unknown> => {
      parentSignal?.throwIfAborted();

      const controller = new AbortController();
      const onParentAbort = () => controller.abort(parentSignal?.reason);
      parentSignal?.addEventListener("abort", onParentAbort, { once: true });
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method: "POST",
          headers: { "content-type": "application/json", accept: "application/json" },
          body: JSON.stringify(body),
          signal: controller.signal
        });
      } catch (err) {
        if (parentSignal?.aborted) throw parentSignal.reason;
        if (controller.signal.aborted) {
          throw new HttpRequestError({
            message: `HTTP request timeout after ${this.timeoutMs}ms`,
            requestUrl: safeRequestUrl,
            isTimeout: true
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
        parentSignal?.removeEventListener("abort", onParentAbort);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new HttpRequestError({
          message: `HTTP request failed: ${res.status}`,
          requestUrl: safeRequestUrl,
          status: res.status,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
        });
      }

      const text = await res.text();
      if (text.trim() === "") return null;
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        throw new HttpRequestError({
          message: "HTTP response is not valid JSON",
          requestUrl: safeRequestUrl,
          status: res.status
        });
      }
    };

    const describe = (error: unknown) => ({
      status: error instanceof HttpRequestError ? error.status ?? null : null,
      url: error instanceof HttpRequestError ? error.requestUrl : safeRequestUrl
    });

    return retry(doFetch, {
      ...this.retryOptions,
      signal: parentSignal,
      onRetry: ({ attempt, maxAttempts, error }) => {
        logWarn({ event: "http.retry", ...describe(error), attempt, maxAttempts });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        logWarn({ event: "http.give_up", ...describe(error), attempt, maxAttempts });
      },
      shouldRetry: isRetryableHttpError
    });
  }
}
