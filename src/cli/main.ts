import { Command, InvalidArgumentError } from "commander";
import type { Result } from "neverthrow";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { BronzeError } from "../core/entities/appError";
import type { FilingTypeMap } from "../core/entities/filing";
import type { BatchResult } from "../core/entities/payload";
import { appFredSeries, appSymbols } from "../shared/config/env";
import { getPipelineLogger } from "../shared/logger/logger";

export const DEFAULT_FILING_TYPES: FilingTypeMap = {
  "10-K": "10-K",
  "10-Q": "10-Q",
  "8-K": "8-K",
  "Form 4 (Insider Trading)": "4",
  "Proxy Statements (DEF 14A)": "DEF 14A",
};

const parseList = (raw: string): string[] =>
  Array.from(
    new Set(
      raw
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean),
    ),
  );

const parseSymbols = (raw: string): string[] =>
  parseList(raw).map((item) => item.toUpperCase());

const parsePositiveInt = (raw: string): number => {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const parseOutputSize = (raw: string): "compact" | "full" => {
  if (raw !== "compact" && raw !== "full") {
    throw new InvalidArgumentError("Expected 'compact' or 'full'.");
  }
  return raw;
};

const filingTypesFromForms = (forms: string[] | undefined): FilingTypeMap =>
  forms && forms.length > 0
    ? Object.fromEntries(forms.map((form) => [form, form]))
    : DEFAULT_FILING_TYPES;

/**
 * Converts a batch map into a plain object for JSON output; request order is kept.
 */
export const batchToJson = <T>(
  batch: BatchResult<T>,
): Record<string, T | null> => Object.fromEntries(batch);

const printJson = (value: unknown): void => {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

/**
 * Prints the successful value, or logs the structural failure and flags a non-zero exit.
 */
const report = <T>(
  result: Result<T, BronzeError>,
  render: (value: T) => unknown,
): void => {
  if (result.isErr()) {
    getPipelineLogger().fatal(
      {
        source: result.error.source,
        code: result.error.code,
        variable: result.error.variable,
      },
      result.error.message,
    );
    process.exitCode = 1;
    return;
  }

  printJson(render(result.value));
};

/**
 * Defines a single command surface so every source runs through the same runtime wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("bronze-ingest")
    .description("Bronze-layer ingestion for market data, macro series and SEC filings");

  cli
    .command("alpha-vantage")
    .description("Fetch raw Alpha Vantage payloads for a list of symbols")
    .requiredOption("--symbols <symbols>", "Comma-separated tickers", parseSymbols)
    .option("--function <name>", "Alpha Vantage function name")
    .option("--output-size <size>", "compact or full", parseOutputSize)
    .option("--date <date>", "Trading date (YYYY-MM-DD) for historical options")
    .action(
      async (opts: {
        symbols: string[];
        function?: string;
        outputSize?: "compact" | "full";
        date?: string;
      }) => {
        const runtime = createRuntime();
        const result = await runtime.alphaVantage.fetchBatch(opts.symbols, {
          function: opts.function,
          outputSize: opts.outputSize,
          date: opts.date,
        });
        report(result, batchToJson);
      },
    );

  cli
    .command("fred")
    .description("Fetch FRED observations for a list of series ids")
    .requiredOption("--series <ids>", "Comma-separated series ids", parseSymbols)
    .option("--start <date>", "Observation start (YYYY-MM-DD)")
    .option("--end <date>", "Observation end (YYYY-MM-DD)")
    .option("--frequency <frequency>", "Aggregation frequency, e.g. m, q, a")
    .action(
      async (opts: {
        series: string[];
        start?: string;
        end?: string;
        frequency?: string;
      }) => {
        const runtime = createRuntime();
        const result = await runtime.fred.fetchBatch(opts.series, {
          observationStart: opts.start,
          observationEnd: opts.end,
          frequency: opts.frequency,
        });
        report(result, batchToJson);
      },
    );

  cli
    .command("sec-filings")
    .description("Download recent SEC filings for a list of tickers")
    .requiredOption("--tickers <tickers>", "Comma-separated tickers", parseSymbols)
    .option("--forms <forms>", "Comma-separated form codes", parseList)
    .option("--limit <count>", "Filings per form and ticker", parsePositiveInt, 5)
    .action(
      async (opts: { tickers: string[]; forms?: string[]; limit: number }) => {
        const runtime = createRuntime();
        const result = await runtime.secEdgar.downloadFilings({
          tickers: opts.tickers,
          filingTypes: filingTypesFromForms(opts.forms),
          filingsPerTicker: opts.limit,
        });
        report(result, (outcomes) => outcomes);
      },
    );

  cli
    .command("run")
    .description("Run every source for the configured symbols and series")
    .option("--limit <count>", "Filings per form and ticker", parsePositiveInt, 5)
    .option("--skip-filings", "Do not download SEC filings")
    .action(async (opts: { limit: number; skipFilings?: boolean }) => {
      const runtime = createRuntime();
      const symbols = appSymbols();
      const runReport = await runtime.bronzeIngestionService.run({
        symbols,
        seriesIds: appFredSeries(),
        tickers: opts.skipFilings ? [] : symbols,
        filingTypes: DEFAULT_FILING_TYPES,
        filingsPerTicker: opts.limit,
      });

      const failures = [
        runReport.marketData,
        runReport.macroSeries,
        runReport.filings,
      ].filter((result) => result.isErr());
      if (failures.length > 0) {
        process.exitCode = 1;
      }

      printJson({
        marketData: runReport.marketData.map(batchToJson).unwrapOr(null),
        macroSeries: runReport.macroSeries.map(batchToJson).unwrapOr(null),
        filings: runReport.filings.unwrapOr(null),
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
