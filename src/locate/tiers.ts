import { TierProfile } from "./types";

export const FIRST_PRIZE_PROFILE: TierProfile = {
  tier: 1,
  labelPatterns: [/(^|[^0-9])1\s*등\s*배출점/, /(^|[^0-9])1\s*등\s*당첨\s*판매점/, /first[-\s]prize\s+(stores|outlets)/i],
  hasClassification: true,
  columnRange: [4, 6],
  minCells: 4,
  // 번호 | 상호명 | 구분 | 소재지 | 위치보기
  defaultLayout: { label: 1, classification: 2, location: 3 },
};

export const SECOND_PRIZE_PROFILE: TierProfile = {
  tier: 2,
  labelPatterns: [/(^|[^0-9])2\s*등\s*배출점/, /(^|[^0-9])2\s*등\s*당첨\s*판매점/, /second[-\s]prize\s+(stores|outlets)/i],
  hasClassification: false,
  columnRange: [3, 5],
  minCells: 3,
  // 번호 | 상호명 | 소재지 | 위치보기
  defaultLayout: { label: 1, location: 2 },
};

export const DEFAULT_TIER_PROFILES: TierProfile[] = [FIRST_PRIZE_PROFILE, SECOND_PRIZE_PROFILE];

export function findProfile(profiles: readonly TierProfile[], tier: number): TierProfile | undefined {
  return profiles.find((profile) => profile.tier === tier);
}

export function matchesLabel(text: string, profile: TierProfile): boolean {
  return profile.labelPatterns.some((pattern) => pattern.test(text));
}
