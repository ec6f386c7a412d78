import { ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type {
  BronzeError,
  MissingCredentialError,
} from "../../core/entities/appError";
import type {
  FilingDownloadOutcome,
  FilingTypeMap,
} from "../../core/entities/filing";
import type { BatchResult, Payload } from "../../core/entities/payload";
import type {
  AlphaVantageQueryOptions,
  FilingsDownloadPort,
  FredQueryOptions,
  SourceFetcherPort,
} from "../../core/ports/inboundPorts";
import { getPipelineLogger } from "../../shared/logger/logger";

export type BronzeRunRequest = {
  symbols: readonly string[];
  seriesIds: readonly string[];
  tickers: readonly string[];
  filingTypes: FilingTypeMap;
  filingsPerTicker: number;
  marketOptions?: AlphaVantageQueryOptions;
  macroOptions?: FredQueryOptions;
};

export type BronzeRunReport = {
  marketData: Result<BatchResult<Payload>, MissingCredentialError>;
  macroSeries: Result<BatchResult<unknown[]>, MissingCredentialError>;
  filings: Result<FilingDownloadOutcome[], BronzeError>;
};

/**
 * Runs every bronze source in turn. A structural failure in one source is
 * reported for that source only; the remaining sources still run.
 */
export class BronzeIngestionService {
  constructor(
    private readonly marketData: SourceFetcherPort<
      AlphaVantageQueryOptions,
      Payload
    >,
    private readonly macroSeries: SourceFetcherPort<FredQueryOptions, unknown[]>,
    private readonly filings: FilingsDownloadPort,
    private readonly logger: Logger = getPipelineLogger(),
  ) {}

  async run(request: BronzeRunRequest): Promise<BronzeRunReport> {
    this.logger.info(
      {
        symbols: request.symbols.length,
        seriesIds: request.seriesIds.length,
        tickers: request.tickers.length,
      },
      "Bronze ingestion started",
    );

    const marketData = await this.marketData.fetchBatch(
      request.symbols,
      request.marketOptions,
    );
    const macroSeries = await this.macroSeries.fetchBatch(
      request.seriesIds,
      request.macroOptions,
    );
    const filings: BronzeRunReport["filings"] =
      request.tickers.length === 0
        ? ok([])
        : await this.filings.downloadFilings({
            tickers: request.tickers,
            filingTypes: request.filingTypes,
            filingsPerTicker: request.filingsPerTicker,
          });

    this.logger.info(
      {
        marketData: summarizeBatch(marketData),
        macroSeries: summarizeBatch(macroSeries),
        filings: filings.match<Record<string, number | string>>(
          (outcomes) => ({
            pairs: outcomes.length,
            failed: outcomes.filter((item) => item.status === "failed").length,
          }),
          (error) => ({ error: error.code }),
        ),
      },
      "Bronze ingestion finished",
    );

    return { marketData, macroSeries, filings };
  }
}

export type BatchSummary =
  | { requested: number; missing: number }
  | { error: string; variable: string };

/**
 * Counts fetched and absent entries for the run summary.
 */
export const summarizeBatch = <T>(
  batch: Result<BatchResult<T>, MissingCredentialError>,
): BatchSummary =>
  batch.match<BatchSummary>(
    (entries) => {
      const values = Array.from(entries.values());
      return {
        requested: values.length,
        missing: values.filter((value) => value === null).length,
      };
    },
    (error) => ({ error: error.code, variable: error.variable }),
  );
