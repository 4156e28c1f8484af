import { AppConfig } from "../config";
import { FetchLike } from "../fetch";
import { resolveLatestRound, runHarvest, HarvestRunResult } from "../harvest";
import { Logger, MetricsRegistry } from "../observability";
import { RoundResolution } from "../rounds";
import { Sink } from "../sink";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export async function runLatest(ctx: CommandContext): Promise<RoundResolution> {
  ctx.logger.info("latest_start", { strategy: ctx.config.rounds.strategy, hint: ctx.config.rounds.hint });
  const resolution = await resolveLatestRound(ctx);
  ctx.logger.info("latest_complete", { ...resolution });
  return resolution;
}

export async function runHarvestCommand(ctx: CommandContext, dryRun: boolean): Promise<HarvestRunResult> {
  ctx.logger.info("harvest_command_start", { window: ctx.config.window, sink: ctx.sink.name, dryRun });
  const result = await runHarvest(ctx);
  const { meta } = result.snapshot;

  if (dryRun) {
    ctx.logger.info("snapshot_publish_skipped", { round: meta.latestRound, reason: "dry-run" });
  } else {
    await ctx.sink.publishSnapshot(result.snapshot);
    ctx.logger.info("snapshot_published", { sink: ctx.sink.name, round: meta.latestRound });
  }

  ctx.logger.info("harvest_command_complete", {
    round: meta.latestRound,
    processedUnits: meta.processedUnits,
    failures: meta.failures,
    guards: meta.guards,
  });
  return result;
}
