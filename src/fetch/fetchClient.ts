import { Dispatcher, fetch as undiciFetch } from "undici";
import { errorMessage, TransportError } from "../core/errors";
import { sleep } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { decodeBody } from "./decode";
import { RetryPolicy } from "./retryPolicy";

export type HttpMethod = "GET" | "POST";

export interface HttpResponseLike {
  status: number;
  url?: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
  redirect: "follow";
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface FetchRequestOptions {
  method?: HttpMethod;
  form?: Record<string, string | number>;
  accept?: string;
}

export interface FetchedDocument {
  url: string;
  statusCode: number;
  text: string;
  encoding: string;
}

export interface FetchClientOptions {
  userAgent: string;
  acceptLanguage?: string;
  referer?: string;
  timeoutMs: number;
  retry: RetryPolicy;
  fallbackBaseUrl?: string;
  dispatcher?: Dispatcher;
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  logger: Logger;
  metrics?: MetricsRegistry;
}

const DEFAULT_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

function defaultFetch(url: string, init: FetchInit): Promise<HttpResponseLike> {
  return undiciFetch(url, init);
}

function encodeForm(form: Record<string, string | number>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    params.append(key, String(value));
  }
  return params.toString();
}

function withQuery(url: string, form: Record<string, string | number>): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(form)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * One HTTP client per worker. Every call shares the same retry policy, and a
 * body is always handed back as decoded text, whatever the server declared.
 */
export class FetchClient {
  private readonly options: FetchClientOptions;
  private readonly fetchFn: FetchLike;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(options: FetchClientOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  async fetchDocument(url: string, request: FetchRequestOptions = {}): Promise<FetchedDocument> {
    try {
      return await this.fetchWithRetry(url, request);
    } catch (error) {
      const fallbackUrl = this.fallbackUrlFor(url);
      if (!(error instanceof TransportError) || !error.retryable || !fallbackUrl) {
        throw error;
      }
      this.options.logger.warn("fetch_fallback_origin", { url, fallbackUrl, error: error.message });
      return this.fetchWithRetry(fallbackUrl, request);
    }
  }

  private async fetchWithRetry(url: string, request: FetchRequestOptions): Promise<FetchedDocument> {
    const { retry, logger, metrics } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      let failure: TransportError;
      try {
        return await this.fetchOnce(url, request);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        failure = error;
      }

      if (!failure.retryable || attempt >= retry.maxAttempts) {
        throw failure;
      }

      const delayMs = retry.delayFor(attempt);
      metrics?.incrementCounter("fetch_retries", 1);
      logger.warn("fetch_retry", { url, attempt, status: failure.status, delayMs, error: failure.message });
      await this.sleepFn(delayMs);
    }
  }

  private async fetchOnce(url: string, request: FetchRequestOptions): Promise<FetchedDocument> {
    const method = request.method ?? "GET";
    const headers: Record<string, string> = {
      "user-agent": this.options.userAgent,
      accept: request.accept ?? DEFAULT_ACCEPT,
    };
    if (this.options.acceptLanguage) {
      headers["accept-language"] = this.options.acceptLanguage;
    }
    if (this.options.referer) {
      headers.referer = this.options.referer;
    }

    let target = url;
    let body: string | undefined;
    if (request.form && method === "POST") {
      body = encodeForm(request.form);
      headers["content-type"] = "application/x-www-form-urlencoded; charset=UTF-8";
    } else if (request.form) {
      target = withQuery(url, request.form);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let response: HttpResponseLike;
    let bytes: Uint8Array;
    try {
      response = await this.fetchFn(target, {
        method,
        headers,
        body,
        signal: controller.signal,
        dispatcher: this.options.dispatcher,
        redirect: "follow",
      });
      if (response.status < 200 || response.status >= 300) {
        throw new TransportError(`HTTP ${response.status} while fetching ${target}`, {
          url: target,
          status: response.status,
          retryable: this.options.retry.isRetriableStatus(response.status),
        });
      }
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = controller.signal.aborted ? `timed out after ${this.options.timeoutMs}ms` : errorMessage(error);
      throw new TransportError(`request to ${target} failed: ${reason}`, { url: target, retryable: true, cause: error });
    } finally {
      clearTimeout(timeout);
    }

    const decoded = decodeBody(bytes, response.headers.get("content-type"), target);
    return {
      url: response.url || target,
      statusCode: response.status,
      text: decoded.text,
      encoding: decoded.encoding,
    };
  }

  private fallbackUrlFor(url: string): string | undefined {
    if (!this.options.fallbackBaseUrl) {
      return undefined;
    }
    const target = new URL(url);
    const fallback = new URL(this.options.fallbackBaseUrl);
    if (target.origin === fallback.origin) {
      return undefined;
    }
    target.protocol = fallback.protocol;
    target.host = fallback.host;
    return target.toString();
  }
}
