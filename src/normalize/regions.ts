import { OnlineChannelConfig } from "../config";
import { compactToken } from "../locate/keywords";
import { ONLINE_REGION, UNCLASSIFIED_REGION } from "../types";
import defaultAliases from "./regionAliases.json";

export type RegionAliasTable = Record<string, readonly string[]>;

export interface RegionResolution {
  regionCode: string;
  subRegionCode: string;
}

/** Decides whether a listing is the online sales channel rather than a physical store. */
export type OnlinePredicate = (label: string, locationText: string) => boolean;

export function createOnlinePredicate(config: OnlineChannelConfig): OnlinePredicate {
  const keywords = config.keywords.map(compactToken).filter((keyword) => keyword.length > 0);
  const hit = (value: string) => {
    const compact = compactToken(value);
    return keywords.some((keyword) => compact.includes(keyword));
  };

  switch (config.matchField) {
    case "location":
      return (_label, location) => hit(location);
    case "label":
      return (label) => hit(label);
    case "either":
      return (label, location) => hit(label) || hit(location);
  }
}

const MIN_PREFIX_ALIAS_LENGTH = 3;

export class RegionResolver {
  private readonly byAlias = new Map<string, string>();
  /** Long-form aliases, longest first, for addresses that glue region and district together. */
  private readonly prefixAliases: string[];
  private readonly isOnline: OnlinePredicate;

  constructor(isOnline: OnlinePredicate, aliases: RegionAliasTable = defaultAliases) {
    this.isOnline = isOnline;
    for (const [code, names] of Object.entries(aliases)) {
      for (const name of names) {
        this.byAlias.set(name.toLowerCase(), code);
      }
    }
    this.prefixAliases = [...this.byAlias.keys()]
      .filter((alias) => alias.length >= MIN_PREFIX_ALIAS_LENGTH)
      .sort((a, b) => b.length - a.length);
  }

  codeFor(token: string): string | undefined {
    return this.byAlias.get(token.toLowerCase());
  }

  resolve(locationText: string, label = ""): RegionResolution {
    if (this.isOnline(label, locationText)) {
      return { regionCode: ONLINE_REGION, subRegionCode: "" };
    }

    const tokens = locationText.split(/\s+/).filter((token) => token.length > 0);
    if (tokens.length === 0) {
      return { regionCode: UNCLASSIFIED_REGION, subRegionCode: "" };
    }

    const leading = this.codeFor(tokens[0]);
    if (leading) {
      return { regionCode: leading, subRegionCode: tokens[1] ?? "" };
    }

    const lowerLead = tokens[0].toLowerCase();
    const prefix = this.prefixAliases.find((alias) => lowerLead.startsWith(alias));
    if (prefix) {
      const remainder = tokens[0].slice(prefix.length);
      return { regionCode: this.byAlias.get(prefix) ?? UNCLASSIFIED_REGION, subRegionCode: remainder || (tokens[1] ?? "") };
    }

    for (let index = 1; index < tokens.length; index += 1) {
      const code = this.codeFor(tokens[index]);
      if (code) {
        return { regionCode: code, subRegionCode: tokens[index + 1] ?? "" };
      }
    }

    return { regionCode: UNCLASSIFIED_REGION, subRegionCode: "" };
  }
}
