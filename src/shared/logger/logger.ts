import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { err, ok, type Result } from "neverthrow";
import pino, { type Logger } from "pino";
import { parse } from "yaml";
import { z } from "zod";
import { env } from "../config/env";

export const PIPELINE_LOGGER = "data_pipeline";
export const BRONZE_LOGGER = "data_pipeline_bronze";
export const SILVER_LOGGER = "data_pipeline_silver";
export const GOLD_LOGGER = "data_pipeline_gold";

const levelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const loggingConfigSchema = z.object({
  level: levelSchema.default("info"),
  console: z.boolean().default(true),
  file: z
    .object({
      path: z.string().min(1),
    })
    .optional(),
  loggers: z.record(z.string(), levelSchema).default({}),
});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Parses a YAML logging document; any syntax or shape problem is returned as a reason string.
 */
export const parseLoggingConfig = (
  content: string,
): Result<LoggingConfig, string> => {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }

  if (typeof document !== "object" || document === null) {
    return err("Malformed logging configuration file.");
  }

  const parsed = loggingConfigSchema.safeParse(document);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
        .join("; "),
    );
  }

  return ok(parsed.data);
};

type LoggingState = {
  root: Logger;
  levels: Record<string, string>;
};

let state: LoggingState | null = null;
const registry = new Map<string, Logger>();

/**
 * Console output goes to stderr; stdout carries the CLI's JSON results.
 */
export const consoleDestination = () => pino.destination(2);

const buildConfiguredRoot = (config: LoggingConfig): Logger => {
  const streams: pino.StreamEntry[] = [];

  if (config.console) {
    streams.push({ level: "trace", stream: consoleDestination() });
  }

  if (config.file) {
    mkdirSync(dirname(config.file.path), { recursive: true });
    streams.push({
      level: "trace",
      stream: pino.destination({ dest: config.file.path, sync: true }),
    });
  }

  return pino({ level: config.level }, pino.multistream(streams));
};

const basicRoot = (): Logger =>
  pino({ level: "warn" }, consoleDestination());

const fallbackState = (
  message: string,
  bindings: Record<string, unknown>,
): LoggingState => {
  const root = basicRoot();
  root.warn(bindings, `${message} Using basic configuration.`);
  return { root, levels: {} };
};

const loadLoggingState = (configPath: string | undefined): LoggingState => {
  if (!configPath || !existsSync(configPath)) {
    return fallbackState(
      `Logging configuration file not found at ${configPath ?? "(unset)"}.`,
      { configPath },
    );
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    return fallbackState(
      `Failed to read logging configuration from ${configPath}.`,
      { configPath, error: error instanceof Error ? error.message : error },
    );
  }

  const config = parseLoggingConfig(content);
  if (config.isErr()) {
    return fallbackState(
      `Failed to load logging configuration from ${configPath}: ${config.error}.`,
      { configPath },
    );
  }

  const root = buildConfiguredRoot(config.value);
  root.info({ configPath }, "Logging setup complete");
  return { root, levels: config.value.loggers };
};

/**
 * Configures the process-wide root logger once; later calls return it unchanged until `resetLogging`.
 */
export const setupLogging = (
  configPath: string | undefined = env.LOGGING_CONFIG_PATH,
): Logger => {
  if (!state) {
    state = loadLoggingState(configPath);
  }

  return state.root;
};

/**
 * Returns the cached named logger, configuring logging first when nothing has yet.
 */
export const getLogger = (name: string): Logger => {
  const cached = registry.get(name);
  if (cached) {
    return cached;
  }

  const root = setupLogging();
  const level = state?.levels[name];
  const child = level ? root.child({ name }, { level }) : root.child({ name });
  registry.set(name, child);
  return child;
};

export const getPipelineLogger = (): Logger => getLogger(PIPELINE_LOGGER);

export const getBronzeLogger = (): Logger => getLogger(BRONZE_LOGGER);

export const getSilverLogger = (): Logger => getLogger(SILVER_LOGGER);

export const getGoldLogger = (): Logger => getLogger(GOLD_LOGGER);

export const resetLogging = (): void => {
  state = null;
  registry.clear();
};
