import { describe, expect, it } from "vitest";
import { createSilentLogger, MetricsRegistry } from "../../src/observability";
import { ApiRoundProbe, interpretDrawPayload } from "../../src/rounds";
import { scriptedFetch, testClient, textResponse, TEST_BASE_URL } from "../helpers";

describe("interpretDrawPayload", () => {
  it("accepts a successful payload for the requested round", () => {
    expect(interpretDrawPayload('{"returnValue":"success","drwNo":1150}', 1150)).toBe("exists");
    expect(interpretDrawPayload('{"returnValue":"success","drwNo":"1150"}', 1150)).toBe("exists");
  });

  it("treats a payload for another round as absent", () => {
    expect(interpretDrawPayload('{"returnValue":"success","drwNo":1149}', 1150)).toBe("absent");
  });

  it("treats fail as absent", () => {
    expect(interpretDrawPayload('{"returnValue":"fail"}', 1151)).toBe("absent");
  });

  it("reports unreadable bodies as unknown", () => {
    expect(interpretDrawPayload("<html><body>blocked</body></html>", 1150)).toBe("unknown");
    expect(interpretDrawPayload('{"status":"ok"}', 1150)).toBe("unknown");
    expect(interpretDrawPayload('{"returnValue":"maintenance"}', 1150)).toBe("unknown");
  });
});

describe("ApiRoundProbe", () => {
  it("queries the draw endpoint for the round", async () => {
    const { fetchFn, requests } = scriptedFetch(() => textResponse('{"returnValue":"success","drwNo":5}', 200, "application/json"));
    const metrics = new MetricsRegistry();
    const probe = new ApiRoundProbe({ client: testClient(fetchFn), baseUrl: TEST_BASE_URL, logger: createSilentLogger(), metrics });

    await expect(probe.probe(5)).resolves.toBe("exists");
    expect(requests[0].url).toBe("https://lotto.test/common.do?method=getLottoNumber&drwNo=5");
    expect(metrics.getCounter("probes_sent")).toBe(1);
  });

  it("answers unknown when the request fails", async () => {
    const { fetchFn } = scriptedFetch(() => textResponse("down", 503));
    const probe = new ApiRoundProbe({ client: testClient(fetchFn), baseUrl: TEST_BASE_URL, logger: createSilentLogger() });

    await expect(probe.probe(5)).resolves.toBe("unknown");
  });
});
