import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BRONZE_LOGGER,
  consoleDestination,
  getBronzeLogger,
  getLogger,
  getPipelineLogger,
  parseLoggingConfig,
  resetLogging,
  setupLogging,
} from "./logger";

describe("parseLoggingConfig", () => {
  it("applies defaults to a minimal document", () => {
    expect(parseLoggingConfig("level: debug\n")._unsafeUnwrap()).toEqual({
      level: "debug",
      console: true,
      loggers: {},
    });
  });

  it("reads file output and per-logger levels", () => {
    const config = parseLoggingConfig(
      [
        "console: false",
        "file:",
        "  path: logs/pipeline.log",
        "loggers:",
        "  data_pipeline_bronze: trace",
      ].join("\n"),
    );

    expect(config._unsafeUnwrap()).toEqual({
      level: "info",
      console: false,
      file: { path: "logs/pipeline.log" },
      loggers: { data_pipeline_bronze: "trace" },
    });
  });

  it("rejects an empty or scalar document", () => {
    expect(parseLoggingConfig("")._unsafeUnwrapErr()).toBe(
      "Malformed logging configuration file.",
    );
    expect(parseLoggingConfig("just text")._unsafeUnwrapErr()).toBe(
      "Malformed logging configuration file.",
    );
  });

  it("names the offending field for an unknown level", () => {
    expect(parseLoggingConfig("level: loud")._unsafeUnwrapErr()).toMatch(
      /^level: Invalid enum value/,
    );
  });

  it("reports YAML syntax errors", () => {
    expect(parseLoggingConfig("loggers: [unclosed").isErr()).toBe(true);
  });
});

describe("consoleDestination", () => {
  it("writes to stderr so stdout only carries command output", () => {
    expect(consoleDestination().fd).toBe(2);
  });
});

describe("setupLogging", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "logging-"));
  });

  afterEach(() => {
    resetLogging();
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to a warn-level logger when the file is missing", () => {
    const root = setupLogging(join(dir, "missing.yaml"));

    expect(root.level).toBe("warn");
    expect(getPipelineLogger().level).toBe("warn");
  });

  it("falls back when the file cannot be parsed", () => {
    const path = join(dir, "broken.yaml");
    writeFileSync(path, "level: loud\n");

    expect(setupLogging(path).level).toBe("warn");
  });

  it("configures the root once and applies per-logger levels", () => {
    const path = join(dir, "logging.yaml");
    const logFile = join(dir, "logs", "pipeline.log");
    writeFileSync(
      path,
      [
        "level: info",
        "console: false",
        "file:",
        `  path: ${logFile}`,
        "loggers:",
        `  ${BRONZE_LOGGER}: debug`,
      ].join("\n"),
    );

    const root = setupLogging(path);

    expect(root.level).toBe("info");
    expect(setupLogging(join(dir, "other.yaml"))).toBe(root);
    expect(getBronzeLogger().level).toBe("debug");
    expect(getPipelineLogger().level).toBe("info");
    expect(existsSync(logFile)).toBe(true);

    getBronzeLogger().debug("bronze detail");
    const written = readFileSync(logFile, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line).msg);
    expect(written).toEqual(["Logging setup complete", "bronze detail"]);
  });

  it("returns the same named logger on repeated lookups", () => {
    setupLogging(join(dir, "missing.yaml"));

    expect(getLogger("data_pipeline_silver")).toBe(
      getLogger("data_pipeline_silver"),
    );
  });
});
