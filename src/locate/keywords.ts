export const NAME_KEYWORDS = ["상호", "판매점", "store", "name"];
export const ADDRESS_KEYWORDS = ["소재지", "주소", "address", "location"];
export const CLASSIFICATION_KEYWORDS = ["구분", "method"];

export const NO_RESULT_PHRASES = [
  "조회결과가없습니다",
  "조회된결과가없습니다",
  "데이터가없습니다",
  "당첨판매점이없습니다",
  "배출점이없습니다",
  "noresults",
  "nodata",
];

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Lowercased with all whitespace removed, for keyword matching. */
export function compactToken(value: string): string {
  return value.replace(/\s+/g, "").toLowerCase();
}

export function containsAny(value: string, keywords: readonly string[]): boolean {
  const compact = compactToken(value);
  return keywords.some((keyword) => compact.includes(compactToken(keyword)));
}

export function indexOfKeyword(tokens: readonly string[], keywords: readonly string[]): number | undefined {
  const index = tokens.findIndex((token) => containsAny(token, keywords));
  return index >= 0 ? index : undefined;
}
