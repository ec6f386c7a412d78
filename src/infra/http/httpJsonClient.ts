import { err, ok, type Result } from "neverthrow";

export type HttpGetRequest = {
  url: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Centralizes HTTP GET IO so every source shares one timeout and status policy.
 * Each call is a single attempt; nothing is retried.
 */
export class HttpJsonClient {
  async getJson(
    request: HttpGetRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    return this.performRequest<unknown>(request, async (response) => {
      try {
        return ok(await response.json());
      } catch (jsonError) {
        if (jsonError instanceof Error && jsonError.name === "AbortError") {
          throw jsonError;
        }

        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          cause: jsonError,
        });
      }
    });
  }

  /**
   * Returns the body unchanged, for documents that may not be text.
   */
  async getBytes(
    request: HttpGetRequest,
  ): Promise<Result<Uint8Array, HttpClientError>> {
    return this.performRequest<Uint8Array>(request, async (response) =>
      ok(new Uint8Array(await response.arrayBuffer())),
    );
  }

  /**
   * Reads the body inside the timeout window so a stalled body counts as a timeout too.
   */
  private async performRequest<T>(
    request: HttpGetRequest,
    readBody: (response: Response) => Promise<Result<T, HttpClientError>>,
  ): Promise<Result<T, HttpClientError>> {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
        });
      }

      return await readBody(response);
    } catch (error) {
      const isTimeoutError =
        error instanceof Error && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
