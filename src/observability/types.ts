export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  round?: number;
  tier?: number;
  page?: number;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "probes_sent"
  | "pages_fetched"
  | "fetch_retries"
  | "rows_parsed"
  | "rows_rejected"
  | "records_emitted"
  | "records_duplicate"
  | "units_failed";

export type MetricTimerName = "page_fetch_ms" | "probe_ms" | "unit_ms";
