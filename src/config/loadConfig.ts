import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { configOverridesSchema, ConfigOverrides } from "./schema";
import { AppConfig, RoundStrategy, SinkType, TierLimits } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://dhlottery.co.kr",
  fallbackBaseUrl: "https://www.dhlottery.co.kr",
  userAgent: "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  acceptLanguage: "ko-KR,ko;q=0.9,en-US;q=0.7,en;q=0.6",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
    retryableStatuses: [408, 429, 500, 502, 503, 504],
  },
  window: 10,
  concurrency: 2,
  pageDelayMs: 250,
  runBudgetMs: 15 * 60 * 1000,
  tiers: {
    "1": { pageCeiling: 1, recordCeiling: 200 },
    "2": { pageCeiling: 30, recordCeiling: 3_000 },
  },
  rounds: {
    strategy: "probe_with_date_fallback",
    anchorRound: 1152,
    anchorDate: "2024-12-28",
    drawWeekday: 6,
    publishHour: 21,
    utcOffsetMinutes: 9 * 60,
    probeCeiling: 10_000,
    deviationAlarmRounds: 1,
    usePageHint: true,
  },
  onlineChannel: {
    keywords: ["동행복권", "dhlottery", "인터넷", "온라인"],
    matchField: "either",
  },
  sink: {
    type: "local_json",
    snapshotPath: "data/winner_stores.json",
  },
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  return parseConfigOverrides(json ?? {}, absolutePath);
}

export function parseConfigOverrides(value: unknown, source = "config"): ConfigOverrides {
  const parsed = configOverridesSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toRoundStrategy(value: string | undefined, fallback: RoundStrategy): RoundStrategy {
  if (value === "probe" || value === "date" || value === "probe_with_date_fallback") {
    return value;
  }
  return fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.toLowerCase();
  if (normalized === "local_json" || normalized === "http") {
    return normalized;
  }
  return fallback;
}

function mergeTiers(
  base: Record<string, TierLimits>,
  overrides: ConfigOverrides["tiers"],
): Record<string, TierLimits> {
  const merged: Record<string, TierLimits> = { ...base };
  for (const [tier, limits] of Object.entries(overrides ?? {})) {
    const current = merged[tier] ?? { pageCeiling: 1, recordCeiling: 1_000 };
    merged[tier] = {
      pageCeiling: limits.pageCeiling ?? current.pageCeiling,
      recordCeiling: limits.recordCeiling ?? current.recordCeiling,
    };
  }
  return merged;
}

function applyTierEnv(tiers: Record<string, TierLimits>, env: NodeJS.ProcessEnv): Record<string, TierLimits> {
  const result: Record<string, TierLimits> = {};
  for (const [tier, limits] of Object.entries(tiers)) {
    result[tier] = {
      // single-page tiers stay single-page; MAX_PAGES only moves the ceiling of paginated ones
      pageCeiling: limits.pageCeiling > 1 ? toInt(env.MAX_PAGES, limits.pageCeiling) : limits.pageCeiling,
      recordCeiling: toInt(env.MAX_RECORDS, limits.recordCeiling),
    };
  }
  return result;
}

export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    ...overrides,
    retry: { ...base.retry, ...(overrides.retry ?? {}) },
    tiers: mergeTiers(base.tiers, overrides.tiers),
    rounds: { ...base.rounds, ...(overrides.rounds ?? {}) },
    onlineChannel: { ...base.onlineChannel, ...(overrides.onlineChannel ?? {}) },
    sink: { ...base.sink, ...(overrides.sink ?? {}) },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    fallbackBaseUrl: env.FALLBACK_BASE_URL ?? merged.fallbackBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    retry: {
      ...merged.retry,
      maxAttempts: Math.max(1, toInt(env.MAX_ATTEMPTS, merged.retry.maxAttempts)),
    },
    window: Math.max(1, toInt(env.WINDOW, merged.window)),
    concurrency: Math.max(1, toInt(env.CONCURRENCY, merged.concurrency)),
    pageDelayMs: Math.max(0, toInt(env.PAGE_DELAY_MS, merged.pageDelayMs)),
    runBudgetMs: toInt(env.RUN_BUDGET_MS, merged.runBudgetMs),
    tiers: applyTierEnv(merged.tiers, env),
    rounds: {
      ...merged.rounds,
      strategy: toRoundStrategy(env.ROUND_STRATEGY, merged.rounds.strategy),
      hint: toOptionalInt(env.ROUND_HINT, merged.rounds.hint),
    },
    sink: {
      ...merged.sink,
      type: toSinkType(env.SINK_TYPE, merged.sink.type),
      snapshotPath: env.SNAPSHOT_PATH ?? merged.sink.snapshotPath,
      httpEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.sink.httpEndpoint,
      httpToken: env.HTTP_SINK_TOKEN ?? merged.sink.httpToken,
    },
  };
}

export { DEFAULT_CONFIG };
