import { Logger } from "../observability";
import { ADDRESS_KEYWORDS, CLASSIFICATION_KEYWORDS, indexOfKeyword, NAME_KEYWORDS } from "./keywords";
import { DEFAULT_STRATEGIES } from "./strategies";
import { DEFAULT_TIER_PROFILES, findProfile } from "./tiers";
import { ColumnLayout, PageDocument, SectionRows, SectionStrategy, TableSelection, TierProfile } from "./types";

export interface SectionLocatorOptions {
  profiles?: TierProfile[];
  strategies?: SectionStrategy[];
  logger?: Logger;
}

export function layoutFromHeader(tokens: readonly string[]): ColumnLayout | undefined {
  const label = indexOfKeyword(tokens, NAME_KEYWORDS);
  const location = indexOfKeyword(tokens, ADDRESS_KEYWORDS);
  if (label === undefined && location === undefined) {
    return undefined;
  }
  return { label, location, classification: indexOfKeyword(tokens, CLASSIFICATION_KEYWORDS) };
}

/**
 * Resolves each tier to at most one table per page. Strategies run in order
 * and every tier is tried by a strategy before the next strategy starts, so a
 * later, looser strategy never takes a table an earlier one already gave to
 * another tier.
 */
export class SectionLocator {
  private readonly profiles: TierProfile[];
  private readonly strategies: SectionStrategy[];
  private readonly logger?: Logger;

  constructor(options: SectionLocatorOptions = {}) {
    this.profiles = [...(options.profiles ?? DEFAULT_TIER_PROFILES)].sort((a, b) => a.tier - b.tier);
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.logger = options.logger;
  }

  get tierProfiles(): readonly TierProfile[] {
    return this.profiles;
  }

  profileFor(tier: number): TierProfile | undefined {
    return findProfile(this.profiles, tier);
  }

  locateAll(document: PageDocument): Map<number, TableSelection> {
    const selections = new Map<number, TableSelection>();
    const claimed = new Set<number>();

    for (const strategy of this.strategies) {
      for (const profile of this.profiles) {
        if (selections.has(profile.tier)) {
          continue;
        }
        const rivals = this.profiles.filter((other) => other.tier !== profile.tier);
        const selection = strategy.select(document, profile, claimed, rivals);
        if (!selection) {
          continue;
        }
        selections.set(profile.tier, selection);
        if (!selection.stacked) {
          claimed.add(selection.table.index);
        }
      }
    }

    return selections;
  }

  locate(document: PageDocument, tier: number): TableSelection | undefined {
    const selection = this.locateAll(document).get(tier);
    if (!selection) {
      this.logger?.debug("section_not_found", { tier, tables: document.tables.length });
    }
    return selection;
  }

  /**
   * Emits the tier's rows from the selected table. Header rows refresh the
   * column layout; a row carrying another tier's label ends the section.
   */
  extractRows(selection: TableSelection): SectionRows {
    const profile = this.profileFor(selection.tier);
    const otherProfiles = this.profiles.filter((candidate) => candidate.tier !== selection.tier);
    const { table, startRow } = selection;

    let layout: ColumnLayout | undefined = startRow === 0 ? layoutFromHeader(table.headerTokens) : undefined;
    const rows: string[][] = [];

    for (const row of table.rows.slice(startRow)) {
      const isDivider = row.cells.length <= 2 || row.kind === "header";
      if (isDivider && otherProfiles.some((other) => other.labelPatterns.some((pattern) => pattern.test(row.text)))) {
        break;
      }
      if (row.kind === "header") {
        layout = layoutFromHeader(row.cells) ?? layout;
        continue;
      }
      rows.push(row.cells);
    }

    return {
      selection,
      layout: layout ?? profile?.defaultLayout ?? {},
      rows,
    };
  }
}
