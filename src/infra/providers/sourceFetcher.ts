import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type {
  BronzeSource,
  MissingCredentialError,
} from "../../core/entities/appError";
import {
  isPayload,
  type BatchResult,
  type Payload,
  type RequestParams,
} from "../../core/entities/payload";
import type {
  RequestParamsBuilder,
  ResponseSentinels,
  SourceFetcherPort,
} from "../../core/ports/inboundPorts";
import { getBronzeLogger } from "../../shared/logger/logger";
import { DEFAULT_TIMEOUT_MS, HttpJsonClient } from "../http/httpJsonClient";
import { validateResponse } from "./responseValidator";

/**
 * Everything that distinguishes one source from another: where to send the
 * request, how to build it, which sentinels to look for, and how to project a
 * validated payload.
 */
export type SourceDescriptor<TOptions, TValue> = {
  source: BronzeSource;
  url: string;
  timeoutMs?: number;
  identifierLabel: string;
  sentinels: ResponseSentinels;
  paramsBuilder: RequestParamsBuilder<TOptions>;
  project: (payload: Payload) => TValue;
};

/**
 * Runs the single-request fetch, validate and batch loop shared by every HTTP source.
 */
export class SourceFetcher<TOptions, TValue>
  implements SourceFetcherPort<TOptions, TValue>
{
  constructor(
    private readonly descriptor: SourceDescriptor<TOptions, TValue>,
    private readonly logger: Logger = getBronzeLogger(),
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  /**
   * Issues exactly one GET and returns the decoded body, or `null` after logging any transport failure.
   */
  async fetchRaw(params: RequestParams): Promise<Payload | null> {
    const { source, url } = this.descriptor;
    this.logger.info({ source, url }, `Fetching data from ${url}.`);

    const response = await this.httpClient.getJson({
      url,
      query: params,
      timeoutMs: this.descriptor.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    if (response.isErr()) {
      this.logger.error(
        {
          source,
          code: response.error.code,
          httpStatus: response.error.httpStatus,
        },
        `Request failed: ${response.error.message}`,
      );
      return null;
    }

    if (!isPayload(response.value)) {
      this.logger.error(
        { source, code: "invalid_json" },
        "Request failed: response body was not a JSON object or array.",
      );
      return null;
    }

    this.logger.info({ source }, "Successfully fetched data.");
    return response.value;
  }

  /**
   * Returns the projected payload for one identifier, `null` when the source had no usable data.
   * A missing credential fails before any request is sent.
   */
  async fetchOne(
    identifier: string,
    options?: TOptions,
  ): Promise<Result<TValue | null, MissingCredentialError>> {
    const params = this.descriptor.paramsBuilder.buildParams(
      identifier,
      options,
    );
    if (params.isErr()) {
      this.logger.error(
        { source: this.descriptor.source, variable: params.error.variable },
        params.error.message,
      );
      return err(params.error);
    }

    const raw = await this.fetchRaw(params.value);
    const validated = validateResponse(
      raw,
      identifier,
      this.descriptor.sentinels,
      this.logger,
    );

    return ok(validated === null ? null : this.descriptor.project(validated));
  }

  /**
   * Fetches identifiers one after another in first-appearance order. Item
   * failures become `null` entries; only a missing credential stops the batch.
   */
  async fetchBatch(
    identifiers: readonly string[],
    options?: TOptions,
  ): Promise<Result<BatchResult<TValue>, MissingCredentialError>> {
    const results: BatchResult<TValue> = new Map();

    for (const identifier of identifiers) {
      if (results.has(identifier)) {
        continue;
      }

      this.logger.info(
        { source: this.descriptor.source, identifier },
        `Fetching data for ${this.descriptor.identifierLabel}: ${identifier}`,
      );

      const result = await this.fetchOne(identifier, options);
      if (result.isErr()) {
        return err(result.error);
      }

      results.set(identifier, result.value);
    }

    return ok(results);
  }
}
