import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig, parseConfigOverrides } from "../../src/config";
import { ConfigError } from "../../src/core/errors";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "harvester-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(value: unknown): string {
    const filePath = path.join(tempDir, "config.json");
    fs.writeFileSync(filePath, JSON.stringify(value), "utf-8");
    return filePath;
  }

  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("merges a config file over the defaults", () => {
    const config = loadConfig(writeConfig({ window: 3, tiers: { "2": { pageCeiling: 4 } }, rounds: { strategy: "date" } }), {});

    expect(config.window).toBe(3);
    expect(config.tiers["2"]).toEqual({ pageCeiling: 4, recordCeiling: 3_000 });
    expect(config.tiers["1"]).toEqual({ pageCeiling: 1, recordCeiling: 200 });
    expect(config.rounds.strategy).toBe("date");
    expect(config.rounds.anchorRound).toBe(1152);
  });

  it("lets the environment override the file", () => {
    const config = loadConfig(writeConfig({ window: 3 }), {
      WINDOW: "5",
      MAX_PAGES: "7",
      MAX_RECORDS: "50",
      ROUND_HINT: "1140",
      SINK_TYPE: "HTTP",
      IGNORE_HTTPS_ERRORS: "yes",
    });

    expect(config.window).toBe(5);
    expect(config.tiers).toEqual({
      "1": { pageCeiling: 1, recordCeiling: 50 },
      "2": { pageCeiling: 7, recordCeiling: 50 },
    });
    expect(config.rounds.hint).toBe(1140);
    expect(config.sink.type).toBe("http");
    expect(config.ignoreHttpsErrors).toBe(true);
  });

  it("ignores environment values it cannot parse", () => {
    const config = loadConfig(undefined, { WINDOW: "many", ROUND_STRATEGY: "guess", ROUND_HINT: "-4" });
    expect(config.window).toBe(10);
    expect(config.rounds.strategy).toBe("probe_with_date_fallback");
    expect(config.rounds.hint).toBeUndefined();
  });

  it("rejects invalid values in the file", () => {
    expect(() => loadConfig(writeConfig({ window: 0 }), {})).toThrow(ConfigError);
    expect(() => loadConfig(writeConfig({ window: 0 }), {})).toThrow(/window/);
  });

  it("reports a missing file", () => {
    expect(() => loadConfig(path.join(tempDir, "absent.json"), {})).toThrow(/Config file not found/);
  });

  it("reports a file that is not JSON", () => {
    const filePath = path.join(tempDir, "broken.json");
    fs.writeFileSync(filePath, "{ window: 3", "utf-8");
    expect(() => loadConfig(filePath, {})).toThrow(/not valid JSON/);
  });
});

describe("parseConfigOverrides", () => {
  it("rejects unknown keys", () => {
    expect(() => parseConfigOverrides({ windowSize: 3 })).toThrow(ConfigError);
  });

  it("accepts a partial sink section", () => {
    expect(parseConfigOverrides({ sink: { type: "http", httpEndpoint: "https://sink.test/snapshots" } })).toEqual({
      sink: { type: "http", httpEndpoint: "https://sink.test/snapshots" },
    });
  });
});
