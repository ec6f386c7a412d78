import type { Result } from "neverthrow";
import type {
  BronzeError,
  MissingCredentialError,
} from "../entities/appError";
import type { BatchResult, RequestParams } from "../entities/payload";
import type { FilingTypeMap, FilingDownloadOutcome } from "../entities/filing";

/**
 * Sentinel keys whose mere presence in a payload classifies the response.
 */
export type ResponseSentinels = {
  errorKeys: readonly string[];
  noticeKeys: readonly string[];
};

/**
 * Maps an identifier plus optional per-call modifiers to one request's query parameters.
 */
export interface RequestParamsBuilder<TOptions> {
  buildParams(
    identifier: string,
    options?: TOptions,
  ): Result<RequestParams, MissingCredentialError>;
}

export type AlphaVantageQueryOptions = {
  function?: string;
  outputSize?: "compact" | "full";
  date?: string;
  dataType?: "json" | "csv";
};

export type FredQueryOptions = {
  observationStart?: string;
  observationEnd?: string;
  frequency?: string;
};

export interface SourceFetcherPort<TOptions, TValue> {
  fetchOne(
    identifier: string,
    options?: TOptions,
  ): Promise<Result<TValue | null, MissingCredentialError>>;
  fetchBatch(
    identifiers: readonly string[],
    options?: TOptions,
  ): Promise<Result<BatchResult<TValue>, MissingCredentialError>>;
}

export type FilingsDownloadRequest = {
  tickers: readonly string[];
  filingTypes: FilingTypeMap;
  filingsPerTicker: number;
};

export interface FilingsDownloadPort {
  downloadFilings(
    request: FilingsDownloadRequest,
  ): Promise<Result<FilingDownloadOutcome[], BronzeError>>;
}
