import { ADDRESS_KEYWORDS, collapseWhitespace, compactToken, containsAny, NAME_KEYWORDS, NO_RESULT_PHRASES } from "../locate/keywords";
import { ColumnLayout, RawRow } from "../locate/types";
import { StructuredRecord } from "../types";
import { RegionResolver } from "./regions";

export type RejectReason = "header" | "no_results" | "too_few_cells" | "empty_label";

export type NormalizeOutcome =
  | { kind: "record"; record: StructuredRecord }
  | { kind: "rejected"; reason: RejectReason };

export interface RowContext {
  round: number;
  tier: number;
  minCells: number;
  layout: ColumnLayout;
}

export function isHeaderSignature(joined: string): boolean {
  return containsAny(joined, NAME_KEYWORDS) && containsAny(joined, ADDRESS_KEYWORDS);
}

export function isNoResultRow(joined: string): boolean {
  const compact = compactToken(joined);
  return NO_RESULT_PHRASES.some((phrase) => compact.includes(phrase));
}

function cellAt(row: RawRow, index: number | undefined): string | undefined {
  if (index === undefined || index < 0 || index >= row.length) {
    return undefined;
  }
  return collapseWhitespace(row[index]);
}

function longestCell(row: RawRow): string {
  return row.reduce((longest, cell) => (cell.length > longest.length ? cell : longest), "");
}

/** Identity used to spot a record already seen on an earlier page of the same section. */
export function dedupKey(record: Pick<StructuredRecord, "round" | "tier" | "label" | "locationText">): string {
  return [record.round, record.tier, collapseWhitespace(record.label), collapseWhitespace(record.locationText)].join("|");
}

export class RowNormalizer {
  private readonly regions: RegionResolver;

  constructor(regions: RegionResolver) {
    this.regions = regions;
  }

  normalize(row: RawRow, context: RowContext): NormalizeOutcome {
    const joined = collapseWhitespace(row.join(" "));
    if (isHeaderSignature(joined)) {
      return { kind: "rejected", reason: "header" };
    }
    if (isNoResultRow(joined)) {
      return { kind: "rejected", reason: "no_results" };
    }
    if (row.length < context.minCells) {
      return { kind: "rejected", reason: "too_few_cells" };
    }

    const { layout } = context;
    const label = cellAt(row, layout.label) ?? "";
    if (!label) {
      return { kind: "rejected", reason: "empty_label" };
    }
    const locationText = cellAt(row, layout.location) || collapseWhitespace(longestCell(row));
    const classification = cellAt(row, layout.classification) ?? "";
    const { regionCode, subRegionCode } = this.regions.resolve(locationText, label);

    const record: StructuredRecord = Object.freeze({
      round: context.round,
      tier: context.tier,
      label,
      classification,
      locationText,
      regionCode,
      subRegionCode,
    });
    return { kind: "record", record };
  }
}
