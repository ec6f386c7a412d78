/**
 * Ordered query-parameter mapping sent with a single source request.
 */
export type RequestParams = Record<string, string>;

export type PayloadObject = Record<string, unknown>;

/**
 * Decoded JSON body of a source response. Only objects and arrays qualify.
 */
export type Payload = PayloadObject | unknown[];

/**
 * One entry per requested identifier, in request order; `null` marks an item
 * with no usable data.
 */
export type BatchResult<T> = Map<string, T | null>;

export const isPayloadObject = (value: unknown): value is PayloadObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isPayload = (value: unknown): value is Payload =>
  Array.isArray(value) || isPayloadObject(value);
