import { RoundSource } from "../rounds/types";
import { StructuredRecord, UnitFailure } from "../types";

export interface TierSummary {
  total: number;
  online: number;
  /** Everything not sold through the online channel, classified or not. */
  offline: number;
  unclassified: number;
  /** Counts per administrative region; ONLINE and UNCLASSIFIED are kept out. */
  byRegion: Record<string, number>;
}

export interface RoundSummary {
  round: number;
  tiers: Record<string, TierSummary>;
}

export interface AggregateSummary {
  rounds: Record<string, RoundSummary>;
  /** Tier totals across every round folded so far. */
  tiers: Record<string, TierSummary>;
}

export interface GuardTrip {
  unit: string;
  guard: string;
  limit: number;
}

export interface SnapshotMeta {
  latestRound: number;
  roundSource: RoundSource;
  /** Probe result minus the date estimate, when both were available. */
  roundDeviation?: number;
  window: number;
  generatedAt: string;
  processedUnits: number;
  failures: UnitFailure[];
  guards: GuardTrip[];
}

export interface Snapshot {
  meta: SnapshotMeta;
  byRound: Record<string, StructuredRecord[]>;
  byRegion: Record<string, StructuredRecord[]>;
  summary: AggregateSummary;
}
