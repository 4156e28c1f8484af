import { load } from "cheerio";
import { errorMessage, HarvestError } from "../core/errors";
import { FetchClient } from "../fetch";
import { Logger } from "../observability";
import { latestResultPageUrl } from "../source/endpoints";

const TEXT_PATTERNS = [
  /lottoDrwNo\s*=\s*["']?(\d+)/,
  /id=["']lottoDrwNo["'][^>]*value=["'](\d+)["']/,
  /(\d+)\s*회\s*당첨결과/,
];

function toRound(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/** Reads the newest round number off the latest-results page, if it shows one. */
export function scanLatestRoundFromHtml(html: string): number | undefined {
  const $ = load(html);
  const marker = $("#lottoDrwNo").first();
  if (marker.length > 0) {
    const fromMarker = toRound(marker.attr("value")) ?? toRound(marker.text());
    if (fromMarker !== undefined) {
      return fromMarker;
    }
  }

  for (const pattern of TEXT_PATTERNS) {
    const match = html.match(pattern);
    const round = toRound(match?.[1]);
    if (round !== undefined) {
      return round;
    }
  }

  const option = toRound($("select#dwrNoList option[selected], select#dwrNoList option").first().attr("value"));
  return option;
}

export async function fetchLatestRoundHint(client: FetchClient, baseUrl: string, logger: Logger): Promise<number | undefined> {
  const url = latestResultPageUrl(baseUrl);
  try {
    const document = await client.fetchDocument(url);
    const round = scanLatestRoundFromHtml(document.text);
    if (round === undefined) {
      logger.warn("round_page_hint_missing", { url });
    }
    return round;
  } catch (error) {
    if (!(error instanceof HarvestError)) {
      throw error;
    }
    logger.warn("round_page_hint_failed", { url, kind: error.kind, error: errorMessage(error) });
    return undefined;
  }
}
