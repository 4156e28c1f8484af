import { dedupKey } from "../normalize";
import { ONLINE_REGION, StructuredRecord, UNCLASSIFIED_REGION } from "../types";
import { AggregateSummary, RoundSummary, TierSummary } from "./types";

function emptyTier(): TierSummary {
  return { total: 0, online: 0, offline: 0, unclassified: 0, byRegion: {} };
}

function countInto(summary: TierSummary, record: StructuredRecord): void {
  summary.total += 1;
  if (record.regionCode === ONLINE_REGION) {
    summary.online += 1;
    return;
  }
  summary.offline += 1;
  if (record.regionCode === UNCLASSIFIED_REGION) {
    summary.unclassified += 1;
    return;
  }
  summary.byRegion[record.regionCode] = (summary.byRegion[record.regionCode] ?? 0) + 1;
}

function copyTier(summary: TierSummary): TierSummary {
  return { ...summary, byRegion: { ...summary.byRegion } };
}

/**
 * Folds records into per-round and per-tier buckets as they arrive. A dedup
 * key is counted once per aggregator; workers each own one and the results
 * are merged by a single writer afterwards.
 */
export class RegionAggregator {
  private readonly seen = new Set<string>();
  private readonly folded: StructuredRecord[] = [];
  private readonly rounds = new Map<number, Map<number, TierSummary>>();
  private readonly tiers = new Map<number, TierSummary>();

  get size(): number {
    return this.folded.length;
  }

  fold(record: StructuredRecord): boolean {
    const key = dedupKey(record);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    this.folded.push(record);

    let roundTiers = this.rounds.get(record.round);
    if (!roundTiers) {
      roundTiers = new Map();
      this.rounds.set(record.round, roundTiers);
    }
    let roundTier = roundTiers.get(record.tier);
    if (!roundTier) {
      roundTier = emptyTier();
      roundTiers.set(record.tier, roundTier);
    }
    countInto(roundTier, record);

    let tierTotal = this.tiers.get(record.tier);
    if (!tierTotal) {
      tierTotal = emptyTier();
      this.tiers.set(record.tier, tierTotal);
    }
    countInto(tierTotal, record);
    return true;
  }

  /** Returns how many of the records were new. */
  foldAll(records: Iterable<StructuredRecord>): number {
    let added = 0;
    for (const record of records) {
      if (this.fold(record)) {
        added += 1;
      }
    }
    return added;
  }

  merge(other: RegionAggregator): number {
    return this.foldAll(other.records());
  }

  records(): StructuredRecord[] {
    return [...this.folded];
  }

  roundsSeen(): number[] {
    return [...this.rounds.keys()].sort((a, b) => b - a);
  }

  summarizeRound(round: number): RoundSummary {
    const tiers: Record<string, TierSummary> = {};
    const roundTiers = this.rounds.get(round);
    if (roundTiers) {
      for (const tier of [...roundTiers.keys()].sort((a, b) => a - b)) {
        const summary = roundTiers.get(tier);
        if (summary) {
          tiers[String(tier)] = copyTier(summary);
        }
      }
    }
    return { round, tiers };
  }

  summarize(): AggregateSummary {
    const rounds: Record<string, RoundSummary> = {};
    for (const round of this.roundsSeen()) {
      rounds[String(round)] = this.summarizeRound(round);
    }
    const tiers: Record<string, TierSummary> = {};
    for (const [tier, summary] of [...this.tiers.entries()].sort(([a], [b]) => a - b)) {
      tiers[String(tier)] = copyTier(summary);
    }
    return { rounds, tiers };
  }
}
