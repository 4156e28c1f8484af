import { z } from "zod";
import { errorMessage, HarvestError } from "../core/errors";
import { FetchClient } from "../fetch";
import { Logger, MetricsRegistry } from "../observability";
import { drawProbeUrl } from "../source/endpoints";
import { ProbeOutcome, RoundProbe } from "./types";

const drawPayloadSchema = z
  .object({
    returnValue: z.string(),
    drwNo: z.coerce.number().int().optional(),
  })
  .passthrough();

export interface ApiRoundProbeDeps {
  client: FetchClient;
  baseUrl: string;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export function interpretDrawPayload(text: string, round: number): ProbeOutcome {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    // blocked requests come back as an HTML page with status 200
    return "unknown";
  }

  const parsed = drawPayloadSchema.safeParse(json);
  if (!parsed.success) {
    return "unknown";
  }

  const { returnValue, drwNo } = parsed.data;
  if (returnValue === "success") {
    return drwNo === undefined || drwNo === round ? "exists" : "absent";
  }
  if (returnValue === "fail") {
    return "absent";
  }
  return "unknown";
}

/** Existence oracle backed by the draw-number JSON endpoint. */
export class ApiRoundProbe implements RoundProbe {
  private readonly deps: ApiRoundProbeDeps;

  constructor(deps: ApiRoundProbeDeps) {
    this.deps = deps;
  }

  async probe(round: number): Promise<ProbeOutcome> {
    const { client, baseUrl, logger, metrics } = this.deps;
    const url = drawProbeUrl(baseUrl, round);
    metrics?.incrementCounter("probes_sent", 1);
    const stopTimer = metrics?.startTimer("probe_ms");

    try {
      const document = await client.fetchDocument(url, { accept: "application/json, text/javascript, */*" });
      const outcome = interpretDrawPayload(document.text, round);
      if (outcome === "unknown") {
        logger.warn("round_probe_unreadable", { round, url, bodyPrefix: document.text.slice(0, 80) });
      }
      return outcome;
    } catch (error) {
      if (!(error instanceof HarvestError)) {
        throw error;
      }
      logger.warn("round_probe_failed", { round, url, kind: error.kind, error: errorMessage(error) });
      return "unknown";
    } finally {
      stopTimer?.();
    }
  }
}
