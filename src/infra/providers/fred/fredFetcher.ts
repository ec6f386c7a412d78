import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import {
  missingCredential,
  type MissingCredentialError,
} from "../../../core/entities/appError";
import {
  isPayloadObject,
  type Payload,
  type RequestParams,
} from "../../../core/entities/payload";
import type {
  FredQueryOptions,
  RequestParamsBuilder,
  ResponseSentinels,
} from "../../../core/ports/inboundPorts";
import type { FredSourceConfig } from "../../../shared/config/env";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { SourceFetcher } from "../sourceFetcher";

export const FRED_KEY_VARIABLE = "API_FREDAPI_KEY";

export const fredSentinels: ResponseSentinels = {
  errorKeys: ["error_message"],
  noticeKeys: [],
};

export class FredParamsBuilder implements RequestParamsBuilder<FredQueryOptions> {
  constructor(private readonly config: Pick<FredSourceConfig, "apiKey">) {}

  buildParams(
    seriesId: string,
    options: FredQueryOptions = {},
  ): Result<RequestParams, MissingCredentialError> {
    const apiKey = this.config.apiKey.trim();
    if (!apiKey) {
      return err(missingCredential("fred", FRED_KEY_VARIABLE));
    }

    const params: RequestParams = {
      series_id: seriesId,
      api_key: apiKey,
      file_type: "json",
    };

    if (options.observationStart) {
      params.observation_start = options.observationStart;
    }
    if (options.observationEnd) {
      params.observation_end = options.observationEnd;
    }
    if (options.frequency) {
      params.frequency = options.frequency;
    }

    return ok(params);
  }
}

/**
 * Unwraps the `observations` list, defaulting to empty when the payload has none.
 */
export const projectObservations = (payload: Payload): unknown[] => {
  if (!isPayloadObject(payload)) {
    return [];
  }

  const observations = payload.observations;
  return Array.isArray(observations) ? observations : [];
};

export type FredFetcher = SourceFetcher<FredQueryOptions, unknown[]>;

export const createFredFetcher = (
  config: FredSourceConfig,
  logger?: Logger,
  httpClient = new HttpJsonClient(),
): FredFetcher =>
  new SourceFetcher(
    {
      source: "fred",
      url: new URL("/fred/series/observations", config.baseUrl).toString(),
      timeoutMs: config.timeoutMs,
      identifierLabel: "series id",
      sentinels: fredSentinels,
      paramsBuilder: new FredParamsBuilder(config),
      project: projectObservations,
    },
    logger,
    httpClient,
  );
