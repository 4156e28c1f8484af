import { AppConfig, loadConfig } from "../config";
import { runHarvestCommand, runLatest } from "../core/commands";
import { errorMessage, RoundProbeError, RoundResolutionError } from "../core/errors";
import { closeFetchDispatchers } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";

export type CommandName = "latest" | "harvest";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  configPath?: string;
  hint?: number;
  window?: number;
}

const HELP_TEXT = `
Usage:
  lotto-store-harvester <command> [options]

Commands:
  latest     Resolve and print the newest published round
  harvest    Harvest winning stores for the latest rounds and publish a snapshot
  help       Show this help

Options:
  --config <path>        Optional path to JSON config file
  --hint <round>         Round to start the probe search from (e.g. the previous run's latest)
  --window <n>           Number of rounds to harvest, newest first
  --dry-run              Harvest but do not publish the snapshot
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "latest" || raw === "harvest") {
    return raw;
  }
  return undefined;
}

function positiveIntFlag(argv: string[], flag: string): number | undefined {
  const index = argv.indexOf(flag);
  const raw = index >= 0 ? argv[index + 1] : undefined;
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    configPath,
    hint: positiveIntFlag(argv, "--hint"),
    window: positiveIntFlag(argv, "--window"),
  };
}

/** Command-line flags win over the config file and the environment. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    window: parsed.window ?? config.window,
    rounds: { ...config.rounds, hint: parsed.hint ?? config.rounds.hint },
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const sink = createSink(config.sink, { retry: config.retry, logger: logger.child("sink") });
  const context = { runId, config, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    window: config.window,
    hint: config.rounds.hint,
  });

  try {
    switch (parsed.command) {
      case "latest":
        await runLatest({ ...context, logger: logger.child("latest") });
        break;
      case "harvest":
        await runHarvestCommand({ ...context, logger: logger.child("pipeline") }, parsed.dryRun);
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof RoundProbeError || error instanceof RoundResolutionError) {
      logger.error("round_resolution_failed", { command: parsed.command, error: errorMessage(error) });
      return 1;
    }
    throw error;
  } finally {
    await closeFetchDispatchers();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
