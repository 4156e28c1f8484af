import { ExhaustionGuardTripped } from "../core/errors";

export const ONLINE_REGION = "ONLINE";
export const UNCLASSIFIED_REGION = "UNCLASSIFIED";

export interface StructuredRecord {
  readonly round: number;
  readonly tier: number;
  /** Store name as listed. */
  readonly label: string;
  /** Ticket type column (auto / manual / semi-auto) where the tier lists one. */
  readonly classification: string;
  readonly locationText: string;
  readonly regionCode: string;
  readonly subRegionCode: string;
}

export type StopReason =
  | "not_found"
  | "empty_page"
  | "repeated_page"
  | "record_ceiling"
  | "page_ceiling"
  | "last_page"
  | "budget_exhausted"
  | "fetch_failed";

export type FailureKind =
  | "transport"
  | "decode"
  | "structure_not_found"
  | "exhaustion_guard"
  | "suspected_structure_change"
  | "budget_exhausted"
  | "unexpected";

export interface UnitFailure {
  /** `round:tier` or `round:tier:page`. */
  unit: string;
  kind: FailureKind;
  reason: string;
}

export interface SectionHarvest {
  round: number;
  tier: number;
  records: StructuredRecord[];
  pagesFetched: number;
  stopReason: StopReason;
  failures: UnitFailure[];
  /** Set when a safety ceiling, not the source, ended the walk. */
  guard?: ExhaustionGuardTripped;
}
