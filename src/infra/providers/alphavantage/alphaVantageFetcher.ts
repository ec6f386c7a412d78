import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import {
  missingCredential,
  type MissingCredentialError,
} from "../../../core/entities/appError";
import type { Payload, RequestParams } from "../../../core/entities/payload";
import type {
  AlphaVantageQueryOptions,
  RequestParamsBuilder,
  ResponseSentinels,
} from "../../../core/ports/inboundPorts";
import type { AlphaVantageSourceConfig } from "../../../shared/config/env";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { SourceFetcher } from "../sourceFetcher";

export const ALPHA_VANTAGE_KEY_VARIABLE = "API_ALPHA_VANTAGE_KEY";

/**
 * Alpha Vantage answers HTTP 200 with the problem described in the body.
 */
export const alphaVantageSentinels: ResponseSentinels = {
  errorKeys: ["Error Message"],
  noticeKeys: ["Note", "Information"],
};

export type AlphaVantageParamsConfig = Pick<
  AlphaVantageSourceConfig,
  "apiKey" | "defaultFunction" | "defaultOutputSize"
>;

export class AlphaVantageParamsBuilder
  implements RequestParamsBuilder<AlphaVantageQueryOptions>
{
  constructor(private readonly config: AlphaVantageParamsConfig) {}

  buildParams(
    symbol: string,
    options: AlphaVantageQueryOptions = {},
  ): Result<RequestParams, MissingCredentialError> {
    const apiKey = this.config.apiKey.trim();
    if (!apiKey) {
      return err(missingCredential("alphavantage", ALPHA_VANTAGE_KEY_VARIABLE));
    }

    const params: RequestParams = {
      function: options.function ?? this.config.defaultFunction,
      symbol,
      apikey: apiKey,
      outputsize: options.outputSize ?? this.config.defaultOutputSize,
    };

    if (options.date) {
      params.date = options.date;
    }
    if (options.dataType) {
      params.datatype = options.dataType;
    }

    return ok(params);
  }
}

export type AlphaVantageFetcher = SourceFetcher<
  AlphaVantageQueryOptions,
  Payload
>;

export const createAlphaVantageFetcher = (
  config: AlphaVantageSourceConfig,
  logger?: Logger,
  httpClient = new HttpJsonClient(),
): AlphaVantageFetcher =>
  new SourceFetcher(
    {
      source: "alphavantage",
      url: new URL("/query", config.baseUrl).toString(),
      timeoutMs: config.timeoutMs,
      identifierLabel: "symbol",
      sentinels: alphaVantageSentinels,
      paramsBuilder: new AlphaVantageParamsBuilder(config),
      project: (payload) => payload,
    },
    logger,
    httpClient,
  );
