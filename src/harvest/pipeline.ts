import { buildSnapshot, GuardTrip, RegionAggregator, Snapshot } from "../aggregate";
import { AppConfig, TierLimits } from "../config";
import { createFetchClientFactory, FetchClientFactory, FetchLike } from "../fetch";
import { SectionLocator } from "../locate";
import { createOnlinePredicate, RegionResolver, RowNormalizer } from "../normalize";
import { Logger, MetricsRegistry } from "../observability";
import { createRoundResolver, RoundResolution } from "../rounds";
import { createStorePageRequestBuilder } from "../source/endpoints";
import { SectionHarvest, UnitFailure } from "../types";
import { toUnitFailure, unitId } from "./failures";
import { PaginatedHarvester } from "./paginatedHarvester";

export interface HarvestRunDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => Date;
  locator?: SectionLocator;
}

export interface HarvestRunResult {
  resolution: RoundResolution;
  snapshot: Snapshot;
  sections: SectionHarvest[];
}

interface HarvestUnit {
  round: number;
  tier: number;
  limits: TierLimits;
}

interface UnitResult {
  section?: SectionHarvest;
  failures: UnitFailure[];
  guard?: GuardTrip;
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number, slot: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async (_, slot) => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current, slot);
    }
  });
  await Promise.all(slots);
}

export function windowRounds(latestRound: number, window: number): number[] {
  const rounds: number[] = [];
  for (let round = latestRound; round >= 1 && rounds.length < window; round -= 1) {
    rounds.push(round);
  }
  return rounds;
}

export function planUnits(latestRound: number, config: AppConfig, locator: SectionLocator, logger: Logger): HarvestUnit[] {
  const tiers: Array<[number, TierLimits]> = [];
  for (const [key, limits] of Object.entries(config.tiers)) {
    const tier = Number.parseInt(key, 10);
    if (!locator.profileFor(tier)) {
      logger.warn("tier_profile_missing", { tier });
      continue;
    }
    tiers.push([tier, limits]);
  }
  tiers.sort(([a], [b]) => a - b);

  return windowRounds(latestRound, config.window).flatMap((round) =>
    tiers.map(([tier, limits]) => ({ round, tier, limits })),
  );
}

export async function resolveLatestRound(
  deps: HarvestRunDeps,
  clientFactory: FetchClientFactory = createFetchClientFactory(deps),
): Promise<RoundResolution> {
  const resolver = createRoundResolver({
    config: deps.config,
    client: clientFactory(),
    logger: deps.logger.child("rounds"),
    metrics: deps.metrics,
    now: deps.now,
  });
  return resolver.resolve();
}

/**
 * Resolves the newest round, then harvests every (round, tier) in the window
 * on a bounded pool. Each slot owns a client and an aggregator; the slot
 * aggregators are merged once every unit has finished. A failing unit is
 * recorded and skipped; only round resolution can fail the run.
 */
export async function runHarvest(deps: HarvestRunDeps): Promise<HarvestRunResult> {
  const { config, logger, metrics } = deps;
  const now = deps.now ?? (() => new Date());
  const clientFactory = createFetchClientFactory({ ...deps, logger: logger.child("fetch") });
  const locator = deps.locator ?? new SectionLocator({ logger: logger.child("locate") });
  const normalizer = new RowNormalizer(new RegionResolver(createOnlinePredicate(config.onlineChannel)));
  const requestFor = createStorePageRequestBuilder(config.baseUrl);

  const resolution = await resolveLatestRound(deps, clientFactory);
  const units = planUnits(resolution.round, config, locator, logger);
  const deadline = now().getTime() + config.runBudgetMs;
  logger.info("harvest_start", {
    round: resolution.round,
    window: config.window,
    units: units.length,
    concurrency: config.concurrency,
  });

  const slotCount = Math.max(1, Math.min(config.concurrency, units.length));
  const harvesters = Array.from(
    { length: slotCount },
    () =>
      new PaginatedHarvester({
        client: clientFactory(),
        requestFor,
        locator,
        normalizer,
        pageDelayMs: config.pageDelayMs,
        logger: logger.child("harvest"),
        metrics,
        sleepFn: deps.sleepFn,
        now: () => now().getTime(),
      }),
  );
  const slotAggregators = harvesters.map(() => new RegionAggregator());
  const results: UnitResult[] = units.map(() => ({ failures: [] }));

  await processWithConcurrency(units, slotCount, async (unit, index, slot) => {
    const stopTimer = metrics.startTimer("unit_ms");
    const id = unitId(unit.round, unit.tier);
    try {
      const section = await harvesters[slot].harvestSection({ ...unit, deadline });
      slotAggregators[slot].foldAll(section.records);
      results[index] = {
        section,
        failures: section.failures,
        guard: section.guard ? { unit: id, guard: section.guard.guard, limit: section.guard.limit } : undefined,
      };
      if (section.stopReason === "fetch_failed") {
        metrics.incrementCounter("units_failed", 1);
      }
    } catch (error) {
      metrics.incrementCounter("units_failed", 1);
      const failure = toUnitFailure(id, error);
      logger.error("unit_failed", { round: unit.round, tier: unit.tier, error: failure.reason });
      results[index] = { failures: [failure] };
    } finally {
      stopTimer();
    }
  });

  const aggregator = new RegionAggregator();
  for (const slotAggregator of slotAggregators) {
    aggregator.merge(slotAggregator);
  }

  const sections: SectionHarvest[] = [];
  const failures: UnitFailure[] = [];
  const guards: GuardTrip[] = [];
  for (const result of results) {
    if (result.section) {
      sections.push(result.section);
    }
    failures.push(...result.failures);
    if (result.guard) {
      guards.push(result.guard);
    }
  }

  const snapshot = buildSnapshot({
    aggregator,
    latestRound: resolution.round,
    roundSource: resolution.source,
    roundDeviation: resolution.deviation,
    window: config.window,
    processedUnits: sections.length,
    failures,
    guards,
    generatedAt: now(),
  });

  logger.info("harvest_complete", {
    round: resolution.round,
    processedUnits: sections.length,
    records: aggregator.size,
    failures: snapshot.meta.failures.length,
    guards: guards.length,
  });
  return { resolution, snapshot, sections };
}
