import { FetchRequestOptions } from "../fetch";

export interface PageRequest extends FetchRequestOptions {
  url: string;
}

export type PageRequestBuilder = (round: number, tier: number, page: number) => PageRequest;

const LOTTO_645_GAME_NO = "5133";

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function drawProbeUrl(baseUrl: string, round: number): string {
  return `${trimBase(baseUrl)}/common.do?method=getLottoNumber&drwNo=${round}`;
}

export function latestResultPageUrl(baseUrl: string): string {
  return `${trimBase(baseUrl)}/gameResult.do?method=byWin`;
}

/**
 * The winning-store listing is a form post; `nowPage` selects the page and
 * `rankNo` the prize tier. Tier 1 ignores paging upstream.
 */
export function createStorePageRequestBuilder(baseUrl: string): PageRequestBuilder {
  const url = `${trimBase(baseUrl)}/store.do?method=topStore&pageGubun=L645`;
  return (round, tier, page) => ({
    url,
    method: "POST",
    form: {
      method: "topStore",
      nowPage: page,
      rankNo: tier,
      gameNo: LOTTO_645_GAME_NO,
      hdrwComb: 1,
      drwNo: round,
    },
  });
}
