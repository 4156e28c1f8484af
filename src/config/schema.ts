import { z } from "zod";

const positiveInt = z.number().int().positive();

const tierLimitsSchema = z
  .object({
    pageCeiling: positiveInt,
    recordCeiling: positiveInt,
  })
  .partial();

export const configOverridesSchema = z
  .object({
    baseUrl: z.string().url(),
    fallbackBaseUrl: z.string().url(),
    userAgent: z.string().min(1),
    acceptLanguage: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: positiveInt,
    retry: z
      .object({
        maxAttempts: positiveInt,
        baseDelayMs: z.number().int().nonnegative(),
        maxDelayMs: z.number().int().nonnegative(),
        retryableStatuses: z.array(z.number().int().min(100).max(599)),
      })
      .partial(),
    window: positiveInt,
    concurrency: positiveInt,
    pageDelayMs: z.number().int().nonnegative(),
    runBudgetMs: positiveInt,
    tiers: z.record(z.string().regex(/^\d+$/), tierLimitsSchema),
    rounds: z
      .object({
        strategy: z.enum(["probe", "date", "probe_with_date_fallback"]),
        hint: positiveInt,
        anchorRound: positiveInt,
        anchorDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
        drawWeekday: z.number().int().min(0).max(6),
        publishHour: z.number().int().min(0).max(23),
        utcOffsetMinutes: z.number().int().min(-720).max(840),
        probeCeiling: positiveInt,
        deviationAlarmRounds: z.number().int().nonnegative(),
        usePageHint: z.boolean(),
      })
      .partial(),
    onlineChannel: z
      .object({
        keywords: z.array(z.string().min(1)),
        matchField: z.enum(["location", "label", "either"]),
      })
      .partial(),
    sink: z
      .object({
        type: z.enum(["local_json", "http"]),
        snapshotPath: z.string().min(1),
        httpEndpoint: z.string().url(),
        httpToken: z.string(),
      })
      .partial(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;
