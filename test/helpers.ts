import { DEFAULT_CONFIG, AppConfig } from "../src/config";
import { createRetryPolicy, FetchClient, FetchInit, FetchLike, HttpResponseLike } from "../src/fetch";
import { createSilentLogger, Logger, LogLevel, MetricsRegistry } from "../src/observability";

export const TEST_BASE_URL = "https://lotto.test";

export function bytesResponse(bytes: Uint8Array, status = 200, contentType: string | null = "text/html; charset=UTF-8"): HttpResponseLike {
  return {
    status,
    headers: { get: (name) => (name.toLowerCase() === "content-type" ? contentType : null) },
    arrayBuffer: async () => {
      const copy = new ArrayBuffer(bytes.length);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
  };
}

export function textResponse(body: string, status = 200, contentType: string | null = "text/html; charset=UTF-8"): HttpResponseLike {
  return bytesResponse(new TextEncoder().encode(body), status, contentType);
}

export interface RecordedRequest {
  url: string;
  init: FetchInit;
}

/** Fetch stand-in that answers from a handler and keeps every request it saw. */
export function scriptedFetch(handler: (url: string, init: FetchInit) => HttpResponseLike | Promise<HttpResponseLike>): {
  fetchFn: FetchLike;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    requests.push({ url, init });
    return handler(url, init);
  };
  return { fetchFn, requests };
}

export function formOf(init: FetchInit): URLSearchParams {
  return new URLSearchParams(init.body ?? "");
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

export interface TestClientOverrides {
  fallbackBaseUrl?: string;
  maxAttempts?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export function testClient(fetchFn: FetchLike, overrides: TestClientOverrides = {}): FetchClient {
  return new FetchClient({
    userAgent: "test-agent",
    timeoutMs: 1_000,
    retry: createRetryPolicy({
      maxAttempts: overrides.maxAttempts ?? 3,
      baseDelayMs: 100,
      maxDelayMs: 1_000,
      retryableStatuses: [408, 429, 500, 502, 503, 504],
    }),
    fallbackBaseUrl: overrides.fallbackBaseUrl,
    fetchFn,
    sleepFn: noSleep,
    logger: overrides.logger ?? createSilentLogger("test"),
    metrics: overrides.metrics,
  });
}

export interface CapturedLine {
  level: LogLevel;
  entry: Record<string, unknown>;
}

export function capturingLogger(component = "test"): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger(
    { component, runId: "test-run" },
    {
      minLevel: "debug",
      writer: (level, line) => {
        const entry: Record<string, unknown> = JSON.parse(line);
        lines.push({ level, entry });
      },
    },
  );
  return { logger, lines };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: TEST_BASE_URL,
    fallbackBaseUrl: undefined,
    pageDelayMs: 0,
    ...overrides,
  };
}

export type StoreRow = [label: string, location: string];
export type FirstPrizeRow = [label: string, classification: string, location: string];

function cellsHtml(cells: string[]): string {
  return `<tr>${cells.map((cell) => `<td>${cell}</td>`).join("")}</tr>`;
}

export function firstPrizeSection(rows: FirstPrizeRow[]): string {
  const body = rows.map(([label, method, location], index) => cellsHtml([String(index + 1), label, method, location, "보기"]));
  return `
    <h4 class="tit">1등 배출점</h4>
    <table class="tbl_data">
      <thead><tr><th>번호</th><th>상호명</th><th>구분</th><th>소재지</th><th>위치보기</th></tr></thead>
      <tbody>${body.join("")}</tbody>
    </table>`;
}

export function secondPrizeSection(rows: StoreRow[], firstNumber = 1): string {
  const body = rows.map(([label, location], index) => cellsHtml([String(firstNumber + index), label, location, "보기"]));
  return `
    <h4 class="tit">2등 배출점</h4>
    <table class="tbl_data">
      <thead><tr><th>번호</th><th>상호명</th><th>소재지</th><th>위치보기</th></tr></thead>
      <tbody>${body.join("")}</tbody>
    </table>`;
}

export function pager(current: number, last: number): string {
  const links: string[] = [];
  for (let page = 1; page <= last; page += 1) {
    links.push(page === current ? `<strong>${page}</strong>` : `<a href="#" onclick="selfSubmit(${page})">${page}</a>`);
  }
  return `<div class="paginate_common">${links.join("")}</div>`;
}

export function storePage(...sections: string[]): string {
  return `<!DOCTYPE html><html><head><meta charset="UTF-8"><title>당첨 판매점</title></head><body><div id="article">${sections.join(
    "",
  )}</div></body></html>`;
}

export function secondPrizeRows(count: number, prefix = "가게"): StoreRow[] {
  return Array.from({ length: count }, (_, index): StoreRow => [`${prefix}${index + 1}`, `서울 중구 명동${index + 1}길 ${index + 1}`]);
}
