import { describe, expect, it } from "vitest";
import { ConfigError } from "../../src/core/errors";
import { DateRoundResolver, estimateRoundByDate } from "../../src/rounds";

const options = {
  anchorRound: 1152,
  anchorDate: "2024-12-28",
  drawWeekday: 6,
  publishHour: 21,
  utcOffsetMinutes: 540,
};

describe("estimateRoundByDate", () => {
  it("keeps last week's round until the draw is published", () => {
    expect(estimateRoundByDate(options, new Date("2025-01-04T11:59:00Z"))).toBe(1152);
  });

  it("moves to the new round at the publish hour", () => {
    expect(estimateRoundByDate(options, new Date("2025-01-04T12:00:00Z"))).toBe(1153);
  });

  it("stays on the anchor round during the rest of the week", () => {
    expect(estimateRoundByDate(options, new Date("2025-01-03T12:00:00Z"))).toBe(1152);
  });

  it("is one behind on the anchor day before publication", () => {
    expect(estimateRoundByDate(options, new Date("2024-12-28T10:00:00Z"))).toBe(1151);
  });

  it("counts whole weeks far from the anchor", () => {
    expect(estimateRoundByDate(options, new Date("2025-12-27T12:00:00Z"))).toBe(1204);
  });

  it("never goes below round 1", () => {
    expect(estimateRoundByDate({ ...options, anchorRound: 1 }, new Date("2020-01-01T00:00:00Z"))).toBe(1);
  });

  it("rejects a malformed anchor date", () => {
    expect(() => estimateRoundByDate({ ...options, anchorDate: "28/12/2024" }, new Date())).toThrow(ConfigError);
  });
});

describe("DateRoundResolver", () => {
  it("returns the same round for a fixed clock", async () => {
    const resolver = new DateRoundResolver(options, () => new Date("2025-02-10T03:00:00Z"));
    const first = await resolver.resolveLatest();
    const second = await resolver.resolveLatest();
    expect(first).toBe(1158);
    expect(second).toBe(first);
  });
});
