import type { Logger } from "pino";
import {
  isPayloadObject,
  type Payload,
} from "../../core/entities/payload";
import type { ResponseSentinels } from "../../core/ports/inboundPorts";

export type ResponseClassification =
  | { status: "ok"; payload: Payload }
  | { status: "missing" }
  | { status: "source_error"; key: string; message: string }
  | { status: "source_throttled"; key: string; message: string };

const sentinelMessage = (value: unknown): string =>
  typeof value === "string" ? value : JSON.stringify(value);

const findSentinel = (
  payload: Record<string, unknown>,
  keys: readonly string[],
): string | undefined => keys.find((key) => Object.hasOwn(payload, key));

/**
 * Classifies a decoded payload by sentinel presence alone. Error keys win over notice keys.
 */
export const classifyResponse = (
  payload: Payload | null,
  sentinels: ResponseSentinels,
): ResponseClassification => {
  if (payload === null) {
    return { status: "missing" };
  }

  if (!isPayloadObject(payload)) {
    return { status: "ok", payload };
  }

  const errorKey = findSentinel(payload, sentinels.errorKeys);
  if (errorKey) {
    return {
      status: "source_error",
      key: errorKey,
      message: sentinelMessage(payload[errorKey]),
    };
  }

  const noticeKey = findSentinel(payload, sentinels.noticeKeys);
  if (noticeKey) {
    return {
      status: "source_throttled",
      key: noticeKey,
      message: sentinelMessage(payload[noticeKey]),
    };
  }

  return { status: "ok", payload };
};

/**
 * Logs the classification of a payload and returns it unchanged on success, `null` otherwise.
 * An absent payload was already logged by the fetch step.
 */
export const validateResponse = (
  payload: Payload | null,
  identifier: string,
  sentinels: ResponseSentinels,
  logger: Logger,
): Payload | null => {
  const classification = classifyResponse(payload, sentinels);

  switch (classification.status) {
    case "ok":
      return classification.payload;
    case "missing":
      return null;
    case "source_error":
      logger.error(
        { identifier, sentinel: classification.key },
        `Error fetching data for ${identifier}: ${classification.message}`,
      );
      return null;
    case "source_throttled":
      logger.warn(
        { identifier, sentinel: classification.key },
        `Rate limit hit: ${classification.message}`,
      );
      return null;
  }
};
