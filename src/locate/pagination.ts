import type { CheerioAPI } from "cheerio";

const PAGER_SELECTOR = ".paginate_common, .pagination, .paging, .pager, [class*='paginate'], [class*='paging']";

const PAGE_REFERENCE_PATTERNS = [/selfSubmit\(\s*(\d+)\s*\)/, /nowPage=(\d+)/, /page[=/](\d+)/i];

function pageNumbersIn(value: string | undefined): number[] {
  if (!value) {
    return [];
  }
  const numbers: number[] = [];
  for (const pattern of PAGE_REFERENCE_PATTERNS) {
    const match = value.match(pattern);
    if (match) {
      numbers.push(Number.parseInt(match[1], 10));
    }
  }
  return numbers;
}

/**
 * Whether the page's pager offers anything past `currentPage`.
 * `undefined` when the page has no pager to read.
 */
export function hasNextPage($: CheerioAPI, currentPage: number): boolean | undefined {
  const pager = $(PAGER_SELECTOR).first();
  if (pager.length === 0) {
    return undefined;
  }

  const referenced: number[] = [];
  pager.find("a, button, strong, span").each((_, element) => {
    const node = $(element);
    const text = node.text().trim();
    if (/^\d+$/.test(text)) {
      referenced.push(Number.parseInt(text, 10));
    }
    referenced.push(...pageNumbersIn(node.attr("onclick")), ...pageNumbersIn(node.attr("href")));
  });

  if (referenced.length === 0) {
    return undefined;
  }
  return referenced.some((page) => page > currentPage);
}
