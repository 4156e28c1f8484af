import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { ADDRESS_KEYWORDS, collapseWhitespace, containsAny, NAME_KEYWORDS } from "./keywords";
import { CandidateTable, PageDocument, TableRow } from "./types";

function readRows($: CheerioAPI, table: Element): TableRow[] {
  const rows: TableRow[] = [];
  $(table)
    .find("tr")
    .each((_, tr) => {
      // rows of nested tables belong to those tables
      if ($(tr).closest("table").get(0) !== table) {
        return;
      }
      const cellElements = $(tr).children("th, td");
      if (cellElements.length === 0) {
        return;
      }
      const cells = cellElements.toArray().map((cell) => collapseWhitespace($(cell).text()));
      const hasData = $(tr).children("td").length > 0 && $(tr).closest("thead").length === 0;
      rows.push({ element: tr, kind: hasData ? "data" : "header", cells, text: cells.join(" ") });
    });
  return rows;
}

export function scoreTable(headerTokens: readonly string[], dataRowCount: number): number {
  let score = 0;
  if (headerTokens.some((token) => containsAny(token, NAME_KEYWORDS))) {
    score += 3;
  }
  if (headerTokens.some((token) => containsAny(token, ADDRESS_KEYWORDS))) {
    score += 3;
  }
  score += Math.min(dataRowCount, 20) / 10;
  return score;
}

function describeTable($: CheerioAPI, element: Element, index: number, order: number): CandidateTable {
  const rows = readRows($, element);
  const headers = rows.filter((row) => row.kind === "header");
  const header =
    headers.find((row) => row.cells.some((cell) => containsAny(cell, NAME_KEYWORDS) || containsAny(cell, ADDRESS_KEYWORDS))) ??
    headers[0];
  const headerTokens = header ? header.cells : [];
  const dataRows = rows.filter((row) => row.kind === "data");
  const widest = dataRows.reduce((max, row) => Math.max(max, row.cells.length), 0);

  return {
    index,
    element,
    order,
    headerTokens,
    columnCount: widest > 0 ? widest : headerTokens.length,
    dataRowCount: dataRows.length,
    score: scoreTable(headerTokens, dataRows.length),
    rows,
  };
}

/** Parses one fetched page and enumerates every table on it. */
export function parsePageDocument(html: string): PageDocument {
  const $ = load(html);
  const order = new Map<AnyNode, number>();
  $("*").each((position, element) => {
    order.set(element, position);
  });

  const orderOf = (element: Element): number => order.get(element) ?? -1;
  const tables = $("table")
    .toArray()
    .map((element, index) => describeTable($, element, index, orderOf(element)));

  return { $, tables, orderOf };
}
