import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOGGING_CONFIG_PATH: z.string().default("config/logging/logging.yaml"),
  APP_SYMBOLS: z.string().default("AAPL,MSFT"),
  APP_FRED_SERIES: z.string().default("GDP,CPIAUCSL"),
  ALPHA_VANTAGE_BASE_URL: z.string().default("https://www.alphavantage.co"),
  API_ALPHA_VANTAGE_KEY: z.string().default(""),
  ALPHA_VANTAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ALPHA_VANTAGE_FUNCTION: z.string().default("HISTORICAL_OPTIONS"),
  ALPHA_VANTAGE_OUTPUT_SIZE: z.enum(["compact", "full"]).default("full"),
  FRED_BASE_URL: z.string().default("https://api.stlouisfed.org"),
  API_FREDAPI_KEY: z.string().default(""),
  FRED_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SEC_EDGAR_NAME: z.string().default(""),
  SEC_EDGAR_EMAIL: z.string().default(""),
  SEC_EDGAR_BASE_URL: z.string().default("https://data.sec.gov"),
  SEC_EDGAR_ARCHIVES_BASE_URL: z
    .string()
    .default("https://www.sec.gov/Archives/edgar/data"),
  SEC_EDGAR_TICKERS_URL: z
    .string()
    .default("https://www.sec.gov/files/company_tickers.json"),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SEC_EDGAR_DOWNLOAD_DIR: z.string().default("sec-filings"),
});

export type AppEnv = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv =>
  envSchema.parse(source);

export const env: AppEnv = parseEnv(process.env);

export type AlphaVantageSourceConfig = {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  defaultFunction: string;
  defaultOutputSize: "compact" | "full";
};

export type FredSourceConfig = {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
};

export type SecEdgarSourceConfig = {
  companyName: string;
  email: string;
  baseUrl: string;
  archivesBaseUrl: string;
  tickersUrl: string;
  timeoutMs: number;
  downloadDir: string;
};

/**
 * Credentials and endpoints for every source, read once at startup and passed to fetchers explicitly.
 */
export type SourceConfig = {
  alphaVantage: AlphaVantageSourceConfig;
  fred: FredSourceConfig;
  secEdgar: SecEdgarSourceConfig;
};

export const sourceConfig = (appEnv: AppEnv = env): SourceConfig => ({
  alphaVantage: {
    baseUrl: appEnv.ALPHA_VANTAGE_BASE_URL,
    apiKey: appEnv.API_ALPHA_VANTAGE_KEY,
    timeoutMs: appEnv.ALPHA_VANTAGE_TIMEOUT_MS,
    defaultFunction: appEnv.ALPHA_VANTAGE_FUNCTION,
    defaultOutputSize: appEnv.ALPHA_VANTAGE_OUTPUT_SIZE,
  },
  fred: {
    baseUrl: appEnv.FRED_BASE_URL,
    apiKey: appEnv.API_FREDAPI_KEY,
    timeoutMs: appEnv.FRED_TIMEOUT_MS,
  },
  secEdgar: {
    companyName: appEnv.SEC_EDGAR_NAME,
    email: appEnv.SEC_EDGAR_EMAIL,
    baseUrl: appEnv.SEC_EDGAR_BASE_URL,
    archivesBaseUrl: appEnv.SEC_EDGAR_ARCHIVES_BASE_URL,
    tickersUrl: appEnv.SEC_EDGAR_TICKERS_URL,
    timeoutMs: appEnv.SEC_EDGAR_TIMEOUT_MS,
    downloadDir: appEnv.SEC_EDGAR_DOWNLOAD_DIR,
  },
});

const splitList = (raw: string, normalize: (item: string) => string) =>
  Array.from(
    new Set(
      raw
        .split(",")
        .map((item) => normalize(item.trim()))
        .filter(Boolean),
    ),
  );

/**
 * Normalizes configured symbols once so runs stay deterministic across environments.
 */
export const appSymbols = (appEnv: AppEnv = env): string[] =>
  splitList(appEnv.APP_SYMBOLS, (item) => item.toUpperCase());

export const appFredSeries = (appEnv: AppEnv = env): string[] =>
  splitList(appEnv.APP_FRED_SERIES, (item) => item.toUpperCase());
