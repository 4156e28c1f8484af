import { describe, expect, it, vi } from "vitest";
import { FetchLike } from "../../src/fetch";
import { PaginatedHarvester } from "../../src/harvest";
import { SectionLocator } from "../../src/locate";
import { createOnlinePredicate, dedupKey, RegionResolver, RowNormalizer } from "../../src/normalize";
import { MetricsRegistry } from "../../src/observability";
import { createStorePageRequestBuilder } from "../../src/source/endpoints";
import {
  capturingLogger,
  firstPrizeSection,
  formOf,
  pager,
  scriptedFetch,
  secondPrizeRows,
  secondPrizeSection,
  storePage,
  testClient,
  textResponse,
  TEST_BASE_URL,
} from "../helpers";

const normalizer = new RowNormalizer(
  new RegionResolver(createOnlinePredicate({ keywords: ["동행복권", "인터넷"], matchField: "either" })),
);

function harvester(fetchFn: FetchLike, overrides: { now?: () => number; pageDelayMs?: number; sleepFn?: (ms: number) => Promise<void> } = {}) {
  const { logger, lines } = capturingLogger();
  const metrics = new MetricsRegistry();
  const instance = new PaginatedHarvester({
    client: testClient(fetchFn),
    requestFor: createStorePageRequestBuilder(TEST_BASE_URL),
    locator: new SectionLocator(),
    normalizer,
    pageDelayMs: overrides.pageDelayMs ?? 0,
    logger,
    metrics,
    sleepFn: overrides.sleepFn,
    now: overrides.now,
  });
  return { instance, lines, metrics };
}

function pageNumber(init: Parameters<FetchLike>[1]): number {
  return Number.parseInt(formOf(init).get("nowPage") ?? "0", 10);
}

const paginated = { pageCeiling: 30, recordCeiling: 3_000 };

describe("PaginatedHarvester", () => {
  it("stops on a repeated page instead of counting it twice", async () => {
    const page = storePage(secondPrizeSection(secondPrizeRows(15)));
    const { fetchFn, requests } = scriptedFetch(() => textResponse(page));
    const sleepFn = vi.fn(async (_ms: number) => undefined);
    const { instance, metrics } = harvester(fetchFn, { pageDelayMs: 250, sleepFn });

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.records).toHaveLength(15);
    expect(result.stopReason).toBe("repeated_page");
    expect(result.pagesFetched).toBe(2);
    expect(result.failures).toEqual([]);
    expect(new Set(result.records.map(dedupKey)).size).toBe(15);
    expect(requests.map((request) => pageNumber(request.init))).toEqual([1, 2]);
    expect(sleepFn).toHaveBeenCalledTimes(1);
    expect(sleepFn).toHaveBeenCalledWith(250);
    expect(metrics.getCounter("records_duplicate")).toBe(15);
  });

  it("posts the round, tier and page to the listing", async () => {
    const { fetchFn, requests } = scriptedFetch(() => textResponse(storePage(secondPrizeSection(secondPrizeRows(2)), pager(1, 1))));
    const { instance } = harvester(fetchFn);

    await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(requests[0].url).toBe("https://lotto.test/store.do?method=topStore&pageGubun=L645");
    const form = formOf(requests[0].init);
    expect(form.get("drwNo")).toBe("1150");
    expect(form.get("rankNo")).toBe("2");
    expect(form.get("nowPage")).toBe("1");
  });

  it("stops at the page ceiling against a source that never runs dry", async () => {
    const { fetchFn } = scriptedFetch((_url, init) => {
      const page = pageNumber(init);
      return textResponse(storePage(secondPrizeSection(secondPrizeRows(15, `p${page}-`)), pager(page, page + 1)));
    });
    const { instance, lines } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: { pageCeiling: 5, recordCeiling: 3_000 } });

    expect(result.pagesFetched).toBe(5);
    expect(result.records).toHaveLength(75);
    expect(result.stopReason).toBe("page_ceiling");
    expect(result.guard).toMatchObject({ guard: "page_ceiling", limit: 5 });
    expect(lines.filter((line) => line.entry.msg === "harvest_max_pages_reached")).toHaveLength(1);
  });

  it("ends a single-page tier normally", async () => {
    const page = storePage(
      firstPrizeSection([
        ["행운마트", "자동", "서울 강남구 역삼동 1"],
        ["인터넷 복권판매사이트", "자동", "동행복권(dhlottery.co.kr)"],
      ]),
      secondPrizeSection(secondPrizeRows(3)),
    );
    const { fetchFn, requests } = scriptedFetch(() => textResponse(page));
    const { instance, lines } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 1, limits: { pageCeiling: 1, recordCeiling: 200 } });

    expect(result.stopReason).toBe("page_ceiling");
    expect(result.guard).toBeUndefined();
    expect(requests).toHaveLength(1);
    expect(result.records.map((record) => [record.label, record.classification, record.regionCode])).toEqual([
      ["행운마트", "자동", "SEOUL"],
      ["인터넷 복권판매사이트", "자동", "ONLINE"],
    ]);
    expect(lines.some((line) => line.entry.msg === "harvest_max_pages_reached")).toBe(false);
  });

  it("trips the record ceiling", async () => {
    const { fetchFn } = scriptedFetch((_url, init) => {
      const page = pageNumber(init);
      return textResponse(storePage(secondPrizeSection(secondPrizeRows(15, `p${page}-`))));
    });
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: { pageCeiling: 30, recordCeiling: 20 } });

    expect(result.records).toHaveLength(20);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("record_ceiling");
    expect(result.guard).toMatchObject({ guard: "record_ceiling", limit: 20 });
  });

  it("stops when the pager shows no further page", async () => {
    const { fetchFn } = scriptedFetch(() => textResponse(storePage(secondPrizeSection(secondPrizeRows(4)), pager(1, 1))));
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.stopReason).toBe("last_page");
    expect(result.pagesFetched).toBe(1);
    expect(result.records).toHaveLength(4);
  });

  it("stops on a page with only a no-result row", async () => {
    const empty = storePage(`
      <h4>2등 배출점</h4>
      <table><thead><tr><th>번호</th><th>상호명</th><th>소재지</th><th>위치보기</th></tr></thead>
      <tbody><tr><td colspan="4">조회 결과가 없습니다.</td></tr></tbody></table>`);
    const { fetchFn } = scriptedFetch(() => textResponse(empty));
    const { instance, metrics } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.stopReason).toBe("empty_page");
    expect(result.records).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(metrics.getCounter("rows_rejected")).toBe(1);
  });

  it("records a failure when the section cannot be found on the first page", async () => {
    const { fetchFn } = scriptedFetch(() => textResponse("<html><body><p>서비스 점검 중</p></body></html>"));
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.stopReason).toBe("not_found");
    expect(result.failures).toEqual([
      { unit: "1150:2:1", kind: "structure_not_found", reason: "no table found for tier 2 in round 1150" },
    ]);
  });

  it("treats a missing section after page one as the end of the listing", async () => {
    const { fetchFn } = scriptedFetch((_url, init) =>
      textResponse(pageNumber(init) === 1 ? storePage(secondPrizeSection(secondPrizeRows(3))) : "<html><body></body></html>"),
    );
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.stopReason).toBe("not_found");
    expect(result.records).toHaveLength(3);
    expect(result.failures).toEqual([]);
  });

  it("turns a fetch failure into a unit failure", async () => {
    const { fetchFn } = scriptedFetch(() => textResponse("forbidden", 403));
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.stopReason).toBe("fetch_failed");
    expect(result.pagesFetched).toBe(0);
    expect(result.failures).toEqual([
      {
        unit: "1150:2:1",
        kind: "transport",
        reason: "HTTP 403 while fetching https://lotto.test/store.do?method=topStore&pageGubun=L645",
      },
    ]);
  });

  it("returns what it has once the run budget is spent", async () => {
    const clock = [0, 5_000];
    const { fetchFn } = scriptedFetch((_url, init) => {
      const page = pageNumber(init);
      return textResponse(storePage(secondPrizeSection(secondPrizeRows(15, `p${page}-`))));
    });
    const { instance } = harvester(fetchFn, { now: () => clock.shift() ?? 5_000 });

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated, deadline: 1_000 });

    expect(result.stopReason).toBe("budget_exhausted");
    expect(result.records).toHaveLength(15);
    expect(result.failures).toEqual([
      { unit: "1150:2:2", kind: "budget_exhausted", reason: "run budget exhausted before page 2" },
    ]);
  });

  it("does not emit duplicates that repeat within later pages", async () => {
    const { fetchFn } = scriptedFetch((_url, init) => {
      const page = pageNumber(init);
      const rows = page === 1 ? secondPrizeRows(5) : [...secondPrizeRows(5).slice(3), ...secondPrizeRows(3, "새가게")];
      return textResponse(storePage(secondPrizeSection(rows), pager(page, 2)));
    });
    const { instance } = harvester(fetchFn);

    const result = await instance.harvestSection({ round: 1150, tier: 2, limits: paginated });

    expect(result.records).toHaveLength(8);
    expect(result.stopReason).toBe("last_page");
    expect(new Set(result.records.map(dedupKey)).size).toBe(8);
  });
});
