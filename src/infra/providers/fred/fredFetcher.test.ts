import { afterEach, describe, expect, it } from "vitest";
import {
  FredParamsBuilder,
  createFredFetcher,
  projectObservations,
} from "./fredFetcher";
import type { FredSourceConfig } from "../../../shared/config/env";
import {
  LEVEL,
  captureLogger,
  linesAt,
} from "../../../__tests__/support/captureLogger";
import {
  jsonResponse,
  restoreFetch,
  setFetch,
} from "../../../__tests__/support/stubFetch";

const config: FredSourceConfig = {
  baseUrl: "https://api.stlouisfed.org",
  apiKey: "test-key",
  timeoutMs: 5_000,
};

const observations = [
  { date: "2024-01-01", value: "100.0" },
  { date: "2024-04-01", value: "101.5" },
];

afterEach(() => {
  restoreFetch();
});

describe("FredParamsBuilder", () => {
  it("builds the required parameters", () => {
    const params = new FredParamsBuilder(config).buildParams("GDP");

    expect(Object.entries(params._unsafeUnwrap())).toEqual([
      ["series_id", "GDP"],
      ["api_key", "test-key"],
      ["file_type", "json"],
    ]);
  });

  it("adds observation bounds and frequency when given", () => {
    const params = new FredParamsBuilder(config).buildParams("CPIAUCSL", {
      observationStart: "2020-01-01",
      observationEnd: "2020-12-31",
      frequency: "q",
    });

    expect(params._unsafeUnwrap()).toEqual({
      series_id: "CPIAUCSL",
      api_key: "test-key",
      file_type: "json",
      observation_start: "2020-01-01",
      observation_end: "2020-12-31",
      frequency: "q",
    });
  });

  it("fails with a missing-credential error when the key is empty", () => {
    const params = new FredParamsBuilder({ apiKey: "" }).buildParams("GDP");

    expect(params._unsafeUnwrapErr()).toEqual({
      source: "fred",
      code: "missing_credential",
      variable: "API_FREDAPI_KEY",
      message:
        "API_FREDAPI_KEY is missing. Please check your environment variables.",
    });
  });
});

describe("projectObservations", () => {
  it("unwraps the observations list", () => {
    expect(projectObservations({ count: 2, observations })).toEqual(
      observations,
    );
  });

  it("defaults to an empty list when observations are absent or malformed", () => {
    expect(projectObservations({})).toEqual([]);
    expect(projectObservations({ observations: "none" })).toEqual([]);
    expect(projectObservations([1, 2])).toEqual([]);
  });
});

describe("FRED fetcher", () => {
  it("requests series observations and returns the list", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return jsonResponse({ observations });
    });

    const { logger } = captureLogger();
    const fetcher = createFredFetcher(config, logger);

    const result = await fetcher.fetchOne("GDP");

    expect(result._unsafeUnwrap()).toEqual(observations);
    expect(requestedUrl).toBe(
      "https://api.stlouisfed.org/fred/series/observations?series_id=GDP&api_key=test-key&file_type=json",
    );
  });

  it("returns an empty list for an object without observations", async () => {
    setFetch(async () => jsonResponse({}));

    const { logger } = captureLogger();
    const fetcher = createFredFetcher(config, logger);

    expect((await fetcher.fetchOne("GDP"))._unsafeUnwrap()).toEqual([]);
  });

  it("returns null and logs the error message sentinel", async () => {
    setFetch(async () =>
      jsonResponse({
        error_code: 400,
        error_message: "Bad Request. The series does not exist.",
      }),
    );

    const { logger, lines } = captureLogger();
    const fetcher = createFredFetcher(config, logger);

    const result = await fetcher.fetchOne("NOPE");

    expect(result._unsafeUnwrap()).toBeNull();
    expect(linesAt(lines, LEVEL.error)).toEqual([
      "Error fetching data for NOPE: Bad Request. The series does not exist.",
    ]);
  });

  it("returns null rather than an empty list after a transport failure", async () => {
    setFetch(async () => jsonResponse({ observations }, 500));

    const { logger } = captureLogger();
    const fetcher = createFredFetcher(config, logger);

    expect((await fetcher.fetchOne("GDP"))._unsafeUnwrap()).toBeNull();
  });

  it("maps each series id in the batch", async () => {
    setFetch(async (input) => {
      const seriesId = new URL(String(input)).searchParams.get("series_id");
      return seriesId === "GDP"
        ? jsonResponse({ observations })
        : jsonResponse({ error_message: "unknown series" });
    });

    const { logger, lines } = captureLogger();
    const fetcher = createFredFetcher(config, logger);

    const result = await fetcher.fetchBatch(["GDP", "NOPE"]);

    expect(Array.from(result._unsafeUnwrap().entries())).toEqual([
      ["GDP", observations],
      ["NOPE", null],
    ]);
    expect(linesAt(lines, LEVEL.info)).toEqual([
      "Fetching data for series id: GDP",
      "Fetching data from https://api.stlouisfed.org/fred/series/observations.",
      "Successfully fetched data.",
      "Fetching data for series id: NOPE",
      "Fetching data from https://api.stlouisfed.org/fred/series/observations.",
      "Successfully fetched data.",
    ]);
  });

  it("stops the batch on a missing credential", async () => {
    let calls = 0;
    setFetch(async () => {
      calls += 1;
      return jsonResponse({ observations });
    });

    const { logger, lines } = captureLogger();
    const fetcher = createFredFetcher({ ...config, apiKey: "" }, logger);

    const result = await fetcher.fetchBatch(["GDP"]);

    expect(calls).toBe(0);
    expect(result._unsafeUnwrapErr().variable).toBe("API_FREDAPI_KEY");
    expect(linesAt(lines, LEVEL.error)).toEqual([
      "API_FREDAPI_KEY is missing. Please check your environment variables.",
    ]);
  });
});
