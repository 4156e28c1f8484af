export type RoundStrategy = "probe" | "date" | "probe_with_date_fallback";

export type OnlineMatchField = "location" | "label" | "either";

export type SinkType = "local_json" | "http";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryableStatuses: number[];
}

export interface RoundConfig {
  strategy: RoundStrategy;
  /** Latest round seen by a previous run, if the caller kept one. */
  hint?: number;
  anchorRound: number;
  /** Calendar date (YYYY-MM-DD) of the anchor round's draw, in the source's local time. */
  anchorDate: string;
  /** 0 = Sunday ... 6 = Saturday */
  drawWeekday: number;
  publishHour: number;
  utcOffsetMinutes: number;
  probeCeiling: number;
  deviationAlarmRounds: number;
  usePageHint: boolean;
}

export interface TierLimits {
  pageCeiling: number;
  recordCeiling: number;
}

export interface OnlineChannelConfig {
  keywords: string[];
  matchField: OnlineMatchField;
}

export interface SinkConfig {
  type: SinkType;
  snapshotPath: string;
  httpEndpoint?: string;
  httpToken?: string;
}

export interface AppConfig {
  baseUrl: string;
  fallbackBaseUrl?: string;
  userAgent: string;
  acceptLanguage: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  retry: RetryConfig;
  window: number;
  concurrency: number;
  pageDelayMs: number;
  runBudgetMs: number;
  tiers: Record<string, TierLimits>;
  rounds: RoundConfig;
  onlineChannel: OnlineChannelConfig;
  sink: SinkConfig;
}
