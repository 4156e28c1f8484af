import { AppConfig } from "../config";
import { getFetchDispatcher } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { FetchClient, FetchLike } from "./fetchClient";
import { createRetryPolicy } from "./retryPolicy";

export interface FetchClientFactoryDeps {
  config: AppConfig;
  logger: Logger;
  metrics?: MetricsRegistry;
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
}

export type FetchClientFactory = () => FetchClient;

export function createFetchClientFactory(deps: FetchClientFactoryDeps): FetchClientFactory {
  const { config } = deps;
  const retry = createRetryPolicy(config.retry);
  return () =>
    new FetchClient({
      userAgent: config.userAgent,
      acceptLanguage: config.acceptLanguage,
      referer: `${config.baseUrl.replace(/\/+$/, "")}/`,
      timeoutMs: config.requestTimeoutMs,
      retry,
      fallbackBaseUrl: config.fallbackBaseUrl,
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      fetchFn: deps.fetchFn,
      sleepFn: deps.sleepFn,
      logger: deps.logger,
      metrics: deps.metrics,
    });
}
