import { fetch as undiciFetch } from "undici";
import { Snapshot } from "../aggregate";
import { RetryConfig } from "../config";
import { errorMessage, TransportError } from "../core/errors";
import { sleep } from "../core/fetch";
import { createRetryPolicy, RetryPolicy } from "../fetch/retryPolicy";
import { Logger } from "../observability";
import { BaseSink } from "./baseSink";

interface SinkResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type SinkFetchLike = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<SinkResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  retry?: RetryConfig;
  logger?: Logger;
  fetchFn?: SinkFetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  timeoutMs?: number;
}

const DEFAULT_SINK_RETRY: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 4_000,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
};

/** Idempotency key: a re-sent snapshot for the same run must not be stored twice. */
export function snapshotKey(snapshot: Snapshot): string {
  return `snapshot:${snapshot.meta.latestRound}:${snapshot.meta.generatedAt}`;
}

/**
 * POSTs each snapshot as one JSON document. Statuses in the retry policy and
 * network errors are retried with backoff; anything else fails at once.
 */
export class HttpSink extends BaseSink {
  readonly name = "http";
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly policy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly fetchFn: SinkFetchLike;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly timeoutMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.policy = createRetryPolicy(options.retry ?? DEFAULT_SINK_RETRY);
    this.logger = options.logger;
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
    this.sleepFn = options.sleepFn ?? sleep;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async publishSnapshot(snapshot: Snapshot): Promise<void> {
    const endpoint = this.ensureConfigured("httpEndpoint", this.endpoint);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": snapshotKey(snapshot),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const body = JSON.stringify(snapshot);

    for (let attempt = 1; ; attempt += 1) {
      let failure: TransportError;
      try {
        await this.post(endpoint, headers, body);
        return;
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        failure = error;
      }

      if (!failure.retryable || attempt >= this.policy.maxAttempts) {
        throw failure;
      }
      const delayMs = this.policy.delayFor(attempt);
      this.logger?.warn("snapshot_publish_retry", { url: endpoint, attempt, status: failure.status, delayMs });
      await this.sleepFn(delayMs);
    }
  }

  private async post(url: string, headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let response: SinkResponseLike;
    try {
      response = await this.fetchFn(url, { method: "POST", headers, body, signal: controller.signal });
    } catch (error) {
      throw new TransportError(`snapshot POST failed: ${errorMessage(error)}`, { url, retryable: true, cause: error });
    } finally {
      clearTimeout(timeout);
    }

    if (response.ok) {
      return;
    }
    const detail = await response.text();
    throw new TransportError(`snapshot rejected with HTTP ${response.status}: ${detail}`, {
      url,
      status: response.status,
      retryable: this.policy.isRetriableStatus(response.status),
    });
  }
}
