import { RoundSource } from "../rounds/types";
import { StructuredRecord, UnitFailure } from "../types";
import { RegionAggregator } from "./regionAggregator";
import { GuardTrip, Snapshot } from "./types";

export interface SnapshotInput {
  aggregator: RegionAggregator;
  latestRound: number;
  roundSource: RoundSource;
  roundDeviation?: number;
  window: number;
  processedUnits: number;
  failures: UnitFailure[];
  guards: GuardTrip[];
  generatedAt?: Date;
}

function byRoundDesc(a: StructuredRecord, b: StructuredRecord): number {
  return b.round - a.round || a.tier - b.tier;
}

/**
 * A tier whose every record landed in UNCLASSIFIED almost always means the
 * address column moved, not that every store lost its address.
 */
export function detectSuspectedStructureChanges(aggregator: RegionAggregator): UnitFailure[] {
  const suspects: UnitFailure[] = [];
  for (const round of aggregator.roundsSeen()) {
    const { tiers } = aggregator.summarizeRound(round);
    for (const [tier, summary] of Object.entries(tiers)) {
      if (summary.total > 0 && summary.unclassified === summary.total) {
        suspects.push({
          unit: `${round}:${tier}`,
          kind: "suspected_structure_change",
          reason: `all ${summary.total} records unclassified`,
        });
      }
    }
  }
  return suspects;
}

export function buildSnapshot(input: SnapshotInput): Snapshot {
  const { aggregator } = input;
  const records = aggregator.records();

  const byRound: Record<string, StructuredRecord[]> = {};
  for (const round of aggregator.roundsSeen()) {
    byRound[String(round)] = records.filter((record) => record.round === round).sort(byRoundDesc);
  }

  const byRegion: Record<string, StructuredRecord[]> = {};
  for (const record of records) {
    (byRegion[record.regionCode] ??= []).push(record);
  }
  for (const entries of Object.values(byRegion)) {
    entries.sort(byRoundDesc);
  }

  return {
    meta: {
      latestRound: input.latestRound,
      roundSource: input.roundSource,
      ...(input.roundDeviation === undefined ? {} : { roundDeviation: input.roundDeviation }),
      window: input.window,
      generatedAt: (input.generatedAt ?? new Date()).toISOString(),
      processedUnits: input.processedUnits,
      failures: [...input.failures, ...detectSuspectedStructureChanges(aggregator)],
      guards: input.guards,
    },
    byRound,
    byRegion,
    summary: aggregator.summarize(),
  };
}
