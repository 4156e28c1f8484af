import { TierLimits } from "../config";
import { DecodeError, ExhaustionGuardTripped, StructureNotFoundError, TransportError } from "../core/errors";
import { sleep } from "../core/fetch";
import { FetchClient } from "../fetch";
import { hasNextPage, parsePageDocument, SectionLocator } from "../locate";
import { dedupKey, RowNormalizer } from "../normalize";
import { Logger, MetricsRegistry } from "../observability";
import { PageRequestBuilder } from "../source/endpoints";
import { SectionHarvest, StopReason, StructuredRecord, UnitFailure } from "../types";
import { toUnitFailure, unitId } from "./failures";

export interface PaginatedHarvesterDeps {
  client: FetchClient;
  requestFor: PageRequestBuilder;
  locator: SectionLocator;
  normalizer: RowNormalizer;
  pageDelayMs: number;
  logger: Logger;
  metrics?: MetricsRegistry;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface SectionRequest {
  round: number;
  tier: number;
  limits: TierLimits;
  /** Epoch millis after which no further page is fetched. */
  deadline?: number;
}

type PageOutcome = { stop: StopReason } | { stop?: undefined };

/**
 * Walks the pages of one (round, tier) listing. Pages are fetched strictly
 * one after another since each stop decision depends on what the previous
 * page held.
 */
export class PaginatedHarvester {
  private readonly deps: PaginatedHarvesterDeps;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(deps: PaginatedHarvesterDeps) {
    this.deps = deps;
    this.sleepFn = deps.sleepFn ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  async harvestSection(request: SectionRequest): Promise<SectionHarvest> {
    const { round, tier, limits, deadline } = request;
    const { client, requestFor, locator, normalizer, logger, metrics } = this.deps;
    const profile = locator.profileFor(tier);
    const seen = new Set<string>();
    const records: StructuredRecord[] = [];
    const failures: UnitFailure[] = [];
    let guard: ExhaustionGuardTripped | undefined;
    let pagesFetched = 0;
    let stopReason: StopReason;

    for (let page = 1; ; page += 1) {
      if (page > 1 && this.deps.pageDelayMs > 0) {
        await this.sleepFn(this.deps.pageDelayMs);
      }

      if (deadline !== undefined && this.now() >= deadline) {
        failures.push({
          unit: unitId(round, tier, page),
          kind: "budget_exhausted",
          reason: `run budget exhausted before page ${page}`,
        });
        stopReason = "budget_exhausted";
        break;
      }

      const pageRequest = requestFor(round, tier, page);
      const stopTimer = metrics?.startTimer("page_fetch_ms");
      let html: string;
      try {
        html = (await client.fetchDocument(pageRequest.url, pageRequest)).text;
      } catch (error) {
        if (!(error instanceof TransportError || error instanceof DecodeError)) {
          throw error;
        }
        logger.warn("page_fetch_failed", { round, tier, page, url: pageRequest.url, error: error.message });
        failures.push(toUnitFailure(unitId(round, tier, page), error));
        stopReason = "fetch_failed";
        break;
      } finally {
        stopTimer?.();
      }
      pagesFetched += 1;
      metrics?.incrementCounter("pages_fetched", 1);

      const document = parsePageDocument(html);
      const selection = locator.locate(document, tier);
      if (!selection) {
        if (page === 1) {
          const error = new StructureNotFoundError(`no table found for tier ${tier} in round ${round}`);
          failures.push(toUnitFailure(unitId(round, tier, page), error));
          logger.warn("section_not_found", { round, tier, page });
        }
        stopReason = "not_found";
        break;
      }

      const section = locator.extractRows(selection);
      const candidates: StructuredRecord[] = [];
      for (const row of section.rows) {
        metrics?.incrementCounter("rows_parsed", 1);
        const outcome = normalizer.normalize(row, {
          round,
          tier,
          minCells: profile?.minCells ?? 1,
          layout: section.layout,
        });
        if (outcome.kind === "rejected") {
          metrics?.incrementCounter("rows_rejected", 1);
          logger.debug("row_rejected", { round, tier, page, reason: outcome.reason });
          continue;
        }
        candidates.push(outcome.record);
      }

      const outcome = this.acceptPage(candidates, seen, records, limits, page);
      if (outcome.stop === "record_ceiling") {
        guard = new ExhaustionGuardTripped("record_ceiling", limits.recordCeiling);
        logger.warn("harvest_max_records_reached", { round, tier, page, limit: limits.recordCeiling });
      }
      if (outcome.stop === "page_ceiling" && limits.pageCeiling > 1) {
        guard = new ExhaustionGuardTripped("page_ceiling", limits.pageCeiling);
        logger.warn("harvest_max_pages_reached", { round, tier, page, limit: limits.pageCeiling });
      }
      if (outcome.stop) {
        stopReason = outcome.stop;
        break;
      }
      if (hasNextPage(document.$, page) === false) {
        stopReason = "last_page";
        break;
      }
    }

    logger.info("section_harvested", { round, tier, pagesFetched, records: records.length, stopReason });
    return { round, tier, records, pagesFetched, stopReason, failures, guard };
  }

  private acceptPage(
    candidates: StructuredRecord[],
    seen: Set<string>,
    records: StructuredRecord[],
    limits: TierLimits,
    page: number,
  ): PageOutcome {
    const { metrics } = this.deps;
    if (candidates.length === 0) {
      return { stop: "empty_page" };
    }

    let fresh = 0;
    for (const record of candidates) {
      if (records.length >= limits.recordCeiling) {
        break;
      }
      const key = dedupKey(record);
      if (seen.has(key)) {
        metrics?.incrementCounter("records_duplicate", 1);
        continue;
      }
      seen.add(key);
      records.push(record);
      fresh += 1;
      metrics?.incrementCounter("records_emitted", 1);
    }

    if (fresh === 0 && records.length < limits.recordCeiling) {
      return { stop: "repeated_page" };
    }
    if (records.length >= limits.recordCeiling) {
      return { stop: "record_ceiling" };
    }
    if (page >= limits.pageCeiling) {
      return { stop: "page_ceiling" };
    }
    return {};
  }
}
