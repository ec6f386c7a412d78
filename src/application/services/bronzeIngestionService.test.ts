import { err, ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import { BronzeIngestionService, summarizeBatch } from "./bronzeIngestionService";
import { missingCredential } from "../../core/entities/appError";
import type { FilingDownloadOutcome } from "../../core/entities/filing";
import type { BatchResult, Payload } from "../../core/entities/payload";
import type {
  AlphaVantageQueryOptions,
  FilingsDownloadPort,
  FredQueryOptions,
  SourceFetcherPort,
} from "../../core/ports/inboundPorts";
import { captureLogger } from "../../__tests__/support/captureLogger";

const marketBatch: BatchResult<Payload> = new Map<string, Payload | null>([
  ["AAPL", { data: "x" }],
  ["BAD", null],
]);

const macroBatch: BatchResult<unknown[]> = new Map<string, unknown[] | null>([
  ["GDP", [{ date: "2024-01-01", value: "1" }]],
]);

const outcome: FilingDownloadOutcome = {
  ticker: "AAPL",
  description: "10-K",
  formType: "10-K",
  status: "downloaded",
  fileCount: 1,
};

type MarketBatch = SourceFetcherPort<
  AlphaVantageQueryOptions,
  Payload
>["fetchBatch"];

const fetchMarketBatch: MarketBatch = async () => ok(marketBatch);

const buildService = (market: MarketBatch = fetchMarketBatch) => {
  const marketData: SourceFetcherPort<AlphaVantageQueryOptions, Payload> = {
    fetchOne: vi.fn(async () => ok(null)),
    fetchBatch: vi.fn(market),
  };
  const macroSeries: SourceFetcherPort<FredQueryOptions, unknown[]> = {
    fetchOne: vi.fn(async () => ok(null)),
    fetchBatch: vi.fn(async () => ok(macroBatch)),
  };
  const filings: FilingsDownloadPort = {
    downloadFilings: vi.fn(async () => ok([outcome])),
  };
  const { logger, lines } = captureLogger();

  return {
    marketData,
    macroSeries,
    filings,
    lines,
    service: new BronzeIngestionService(marketData, macroSeries, filings, logger),
  };
};

const request = {
  symbols: ["AAPL", "BAD"],
  seriesIds: ["GDP"],
  tickers: ["AAPL"],
  filingTypes: { "10-K": "10-K" },
  filingsPerTicker: 2,
  macroOptions: { frequency: "q" },
};

describe("BronzeIngestionService", () => {
  it("runs every source and returns each result", async () => {
    const { service, marketData, macroSeries, filings } = buildService();

    const report = await service.run(request);

    expect(report.marketData._unsafeUnwrap()).toBe(marketBatch);
    expect(report.macroSeries._unsafeUnwrap()).toBe(macroBatch);
    expect(report.filings._unsafeUnwrap()).toEqual([outcome]);
    expect(marketData.fetchBatch).toHaveBeenCalledWith(["AAPL", "BAD"], undefined);
    expect(macroSeries.fetchBatch).toHaveBeenCalledWith(["GDP"], {
      frequency: "q",
    });
    expect(filings.downloadFilings).toHaveBeenCalledWith({
      tickers: ["AAPL"],
      filingTypes: { "10-K": "10-K" },
      filingsPerTicker: 2,
    });
  });

  it("keeps running the other sources when one lacks a credential", async () => {
    const { service, macroSeries } = buildService(async () =>
      err(missingCredential("alphavantage", "API_ALPHA_VANTAGE_KEY")),
    );

    const report = await service.run(request);

    expect(report.marketData._unsafeUnwrapErr().variable).toBe(
      "API_ALPHA_VANTAGE_KEY",
    );
    expect(macroSeries.fetchBatch).toHaveBeenCalledTimes(1);
    expect(report.filings.isOk()).toBe(true);
  });

  it("skips the filings download when no tickers are requested", async () => {
    const { service, filings, lines } = buildService();

    const report = await service.run({ ...request, tickers: [] });

    expect(filings.downloadFilings).not.toHaveBeenCalled();
    expect(report.filings._unsafeUnwrap()).toEqual([]);
    expect(lines.map((line) => line.msg)).toEqual([
      "Bronze ingestion started",
      "Bronze ingestion finished",
    ]);
  });
});

describe("summarizeBatch", () => {
  it("counts requested and missing entries", () => {
    expect(summarizeBatch(ok(marketBatch))).toEqual({
      requested: 2,
      missing: 1,
    });
  });

  it("reports the missing variable", () => {
    expect(
      summarizeBatch(err(missingCredential("fred", "API_FREDAPI_KEY"))),
    ).toEqual({ error: "missing_credential", variable: "API_FREDAPI_KEY" });
  });
});
