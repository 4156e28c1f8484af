import type { Element } from "domhandler";
import { ADDRESS_KEYWORDS, CLASSIFICATION_KEYWORDS, collapseWhitespace, containsAny } from "./keywords";
import { matchesLabel } from "./tiers";
import { CandidateTable, PageDocument, SectionStrategy, TableSelection, TierProfile } from "./types";

const MAX_LABEL_LENGTH = 40;
const MAX_TABLES_AFTER_LABEL = 6;
const IGNORED_LABEL_HOSTS = "script, style, option, title, a, button";

function hasAddressHeader(table: CandidateTable): boolean {
  return table.headerTokens.some((token) => containsAny(token, ADDRESS_KEYWORDS));
}

function hasClassificationHeader(table: CandidateTable): boolean {
  return table.headerTokens.some((token) => containsAny(token, CLASSIFICATION_KEYWORDS));
}

/** Structural signature check: column-count class plus presence of the tier's distinguishing column. */
export function matchesTierShape(table: CandidateTable, profile: TierProfile): boolean {
  const [min, max] = profile.columnRange;
  if (table.columnCount < min || table.columnCount > max) {
    return false;
  }
  if (table.headerTokens.length === 0) {
    return table.dataRowCount > 0;
  }
  return hasAddressHeader(table) && hasClassificationHeader(table) === profile.hasClassification;
}

/**
 * Deepest short elements whose text names the tier. A wrapper whose child
 * already matches is skipped so one visible label counts once.
 */
export function findLabelElements(document: PageDocument, profile: TierProfile): Element[] {
  const { $ } = document;
  const labels: Element[] = [];
  $("body *").each((_, element) => {
    const node = $(element);
    if (node.is(IGNORED_LABEL_HOSTS) || node.closest(IGNORED_LABEL_HOSTS).length > 0) {
      return;
    }
    const text = collapseWhitespace(node.text());
    if (text.length === 0 || text.length > MAX_LABEL_LENGTH || !matchesLabel(text, profile)) {
      return;
    }
    const childMatches = node
      .children()
      .toArray()
      .some((child) => matchesLabel(collapseWhitespace($(child).text()), profile));
    if (!childMatches) {
      labels.push(element);
    }
  });
  return labels;
}

function rowsAfter(table: CandidateTable, startRow: number): number {
  return table.rows.slice(startRow).filter((row) => row.kind === "data").length;
}

export class LabelAnchoredStrategy implements SectionStrategy {
  readonly name = "label";

  select(
    document: PageDocument,
    profile: TierProfile,
    claimed: ReadonlySet<number>,
    rivals: readonly TierProfile[],
  ): TableSelection | undefined {
    const rivalLabelOrders = rivals
      .flatMap((rival) => findLabelElements(document, rival))
      .map((element) => document.orderOf(element));
    const selections: TableSelection[] = [];
    for (const label of findLabelElements(document, profile)) {
      const selection = this.selectionForLabel(document, profile, label, claimed, rivalLabelOrders);
      if (selection && !selections.some((existing) => existing.table.index === selection.table.index)) {
        selections.push(selection);
      }
    }

    if (selections.length === 0) {
      return undefined;
    }

    selections.sort(
      (a, b) => rowsAfter(b.table, b.startRow) - rowsAfter(a.table, a.startRow) || a.table.index - b.table.index,
    );
    return selections[0];
  }

  private selectionForLabel(
    document: PageDocument,
    profile: TierProfile,
    label: Element,
    claimed: ReadonlySet<number>,
    rivalLabelOrders: readonly number[],
  ): TableSelection | undefined {
    const { $ } = document;
    const hostElement = $(label).closest("table").get(0);
    // a table that wraps other tables is page layout, not a listing
    const isListing = hostElement !== undefined && $(hostElement).find("table").length === 0;
    const host = isListing ? document.tables.find((table) => table.element === hostElement) : undefined;

    if (host) {
      // label sits inside a table: either its caption/header, or a divider row of a stacked table
      const labelRow = $(label).closest("tr").get(0);
      const rowIndex = labelRow ? host.rows.findIndex((row) => row.element === labelRow) : -1;
      const startRow = rowIndex >= 0 ? rowIndex + 1 : 0;
      if (rowsAfter(host, startRow) > 0) {
        return { tier: profile.tier, strategy: this.name, table: host, startRow, stacked: rowIndex > 0 };
      }
    }

    // the section ends where the next tier's label starts
    const labelOrder = document.orderOf(label);
    const boundary = Math.min(...rivalLabelOrders.filter((order) => order > labelOrder), Number.POSITIVE_INFINITY);
    const following = document.tables
      .filter((table) => table.order > labelOrder && table.order < boundary && !claimed.has(table.index))
      .slice(0, MAX_TABLES_AFTER_LABEL);
    const table =
      following.find((candidate) => matchesTierShape(candidate, profile)) ?? following.find(hasAddressHeader);
    if (!table) {
      return undefined;
    }
    return { tier: profile.tier, strategy: this.name, table, startRow: 0, stacked: false };
  }
}

export class ScoreAnchoredStrategy implements SectionStrategy {
  readonly name = "score";

  select(document: PageDocument, profile: TierProfile, claimed: ReadonlySet<number>): TableSelection | undefined {
    const ranked = document.tables
      .filter((table) => !claimed.has(table.index) && matchesTierShape(table, profile))
      .sort((a, b) => b.score - a.score || a.index - b.index);
    const best = ranked[0];
    if (!best) {
      return undefined;
    }
    return { tier: profile.tier, strategy: this.name, table: best, startRow: 0, stacked: false };
  }
}

export const DEFAULT_STRATEGIES: SectionStrategy[] = [new LabelAnchoredStrategy(), new ScoreAnchoredStrategy()];
