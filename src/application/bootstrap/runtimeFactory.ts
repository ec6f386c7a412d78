import { BronzeIngestionService } from "../services/bronzeIngestionService";
import { env, sourceConfig, type SourceConfig } from "../../shared/config/env";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { createAlphaVantageFetcher } from "../../infra/providers/alphavantage/alphaVantageFetcher";
import { createFredFetcher } from "../../infra/providers/fred/fredFetcher";
import { SecEdgarDownloader } from "../../infra/providers/sec/secEdgarDownloader";
import { SecEdgarFilings } from "../../infra/providers/sec/secEdgarFilings";
import { setupLogging } from "../../shared/logger/logger";

/**
 * Centralizes runtime wiring so every command shares one composition root and one config struct.
 */
export const createRuntime = (config: SourceConfig = sourceConfig(env)) => {
  setupLogging();

  const httpClient = new HttpJsonClient();

  const alphaVantage = createAlphaVantageFetcher(
    config.alphaVantage,
    undefined,
    httpClient,
  );
  const fred = createFredFetcher(config.fred, undefined, httpClient);
  const secEdgar = new SecEdgarFilings(
    config.secEdgar,
    (identity, downloadDir) =>
      new SecEdgarDownloader(identity, downloadDir, config.secEdgar, httpClient),
  );

  const bronzeIngestionService = new BronzeIngestionService(
    alphaVantage,
    fred,
    secEdgar,
  );

  return {
    config,
    alphaVantage,
    fred,
    secEdgar,
    bronzeIngestionService,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
