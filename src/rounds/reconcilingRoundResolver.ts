import { RoundStrategy } from "../config";
import { errorMessage, RoundProbeError, RoundResolutionError } from "../core/errors";
import { Logger } from "../observability";
import { RoundResolution, RoundResolver } from "./types";

export interface ReconcilingRoundOptions {
  strategy: RoundStrategy;
  dateEstimate: () => number;
  probeResolverFor: (hint: number) => RoundResolver;
  /** Newest round recorded by a previous run. */
  previousHint?: number;
  pageHint?: () => Promise<number | undefined>;
  deviationAlarmRounds: number;
  logger: Logger;
}

/**
 * Probe result is authoritative; the date estimate seeds the search when no
 * better hint exists and is kept as a cross-check.
 */
export class ReconcilingRoundResolver implements RoundResolver {
  readonly name = "reconciling";
  private readonly options: ReconcilingRoundOptions;

  constructor(options: ReconcilingRoundOptions) {
    this.options = options;
  }

  async resolveLatest(): Promise<number> {
    const resolution = await this.resolve();
    return resolution.round;
  }

  async resolve(): Promise<RoundResolution> {
    const { strategy, logger } = this.options;
    const dateEstimate = this.options.dateEstimate();

    if (strategy === "date") {
      logger.info("round_resolved", { source: "date", round: dateEstimate });
      return { round: dateEstimate, source: "date", dateEstimate };
    }

    const { hint, hintSource } = await this.pickHint(dateEstimate);

    let round: number;
    try {
      round = await this.options.probeResolverFor(hint).resolveLatest();
    } catch (error) {
      const recoverable = error instanceof RoundProbeError || error instanceof RoundResolutionError;
      if (strategy !== "probe_with_date_fallback" || !recoverable) {
        throw error;
      }
      logger.warn("round_probe_failed_using_date_estimate", {
        hint,
        hintSource,
        round: dateEstimate,
        error: errorMessage(error),
      });
      return { round: dateEstimate, source: "date", hint, hintSource, dateEstimate };
    }

    const deviation = round - dateEstimate;
    if (Math.abs(deviation) > this.options.deviationAlarmRounds) {
      logger.warn("round_estimate_deviation", { round, dateEstimate, deviation });
    }

    logger.info("round_resolved", { source: "probe", round, hint, hintSource, dateEstimate });
    return { round, source: "probe", hint, hintSource, dateEstimate, deviation };
  }

  private async pickHint(
    dateEstimate: number,
  ): Promise<{ hint: number; hintSource: NonNullable<RoundResolution["hintSource"]> }> {
    if (this.options.previousHint !== undefined) {
      return { hint: this.options.previousHint, hintSource: "previous_run" };
    }
    const fromPage = this.options.pageHint ? await this.options.pageHint() : undefined;
    if (fromPage !== undefined) {
      return { hint: fromPage, hintSource: "result_page" };
    }
    return { hint: dateEstimate, hintSource: "date_estimate" };
  }
}
