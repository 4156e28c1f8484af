import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export type RawRow = string[];

export interface ColumnLayout {
  label?: number;
  classification?: number;
  location?: number;
}

export interface TableRow {
  element: Element;
  kind: "header" | "data";
  cells: string[];
  text: string;
}

export interface CandidateTable {
  /** Position among the page's tables, in document order. */
  index: number;
  element: Element;
  /** Document-order position of the table element among all elements. */
  order: number;
  headerTokens: string[];
  columnCount: number;
  dataRowCount: number;
  score: number;
  rows: TableRow[];
}

export interface TierProfile {
  tier: number;
  labelPatterns: RegExp[];
  /** Whether the tier's table carries a classification column. */
  hasClassification: boolean;
  columnRange: [min: number, max: number];
  minCells: number;
  defaultLayout: ColumnLayout;
}

export interface TableSelection {
  tier: number;
  strategy: string;
  table: CandidateTable;
  /** First row of `table.rows` that belongs to this tier. */
  startRow: number;
  /** Set when the tier's rows share a physical table with another tier's. */
  stacked: boolean;
}

export interface PageDocument {
  $: CheerioAPI;
  tables: CandidateTable[];
  orderOf(element: Element): number;
}

export interface SectionRows {
  selection: TableSelection;
  layout: ColumnLayout;
  rows: RawRow[];
}

export interface SectionStrategy {
  readonly name: string;
  /** `rivals` are the other tiers' profiles; their labels bound this tier's section. */
  select(
    document: PageDocument,
    profile: TierProfile,
    claimed: ReadonlySet<number>,
    rivals: readonly TierProfile[],
  ): TableSelection | undefined;
}
