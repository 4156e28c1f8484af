import { AppConfig } from "../config";
import { FetchClient } from "../fetch";
import { Logger, MetricsRegistry } from "../observability";
import { ApiRoundProbe } from "./apiRoundProbe";
import { DateRoundResolver } from "./dateRoundResolver";
import { fetchLatestRoundHint } from "./pageHint";
import { ProbeRoundResolver } from "./probeRoundResolver";
import { ReconcilingRoundResolver } from "./reconcilingRoundResolver";

export interface RoundResolverDeps {
  config: AppConfig;
  client: FetchClient;
  logger: Logger;
  metrics?: MetricsRegistry;
  now?: () => Date;
}

export function createRoundResolver(deps: RoundResolverDeps): ReconcilingRoundResolver {
  const { config, client, logger, metrics } = deps;
  const rounds = config.rounds;
  const dateResolver = new DateRoundResolver(rounds, deps.now);
  const probe = new ApiRoundProbe({ client, baseUrl: config.baseUrl, logger, metrics });

  return new ReconcilingRoundResolver({
    strategy: rounds.strategy,
    dateEstimate: () => dateResolver.estimate(),
    probeResolverFor: (hint) => new ProbeRoundResolver({ probe, hint, ceiling: rounds.probeCeiling, logger }),
    previousHint: rounds.hint,
    pageHint: rounds.usePageHint ? () => fetchLatestRoundHint(client, config.baseUrl, logger) : undefined,
    deviationAlarmRounds: rounds.deviationAlarmRounds,
    logger,
  });
}
