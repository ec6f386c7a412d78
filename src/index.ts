#!/usr/bin/env node
import { runCli } from "./cli/main";
import { getPipelineLogger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

runCli(process.argv).catch((error: unknown) => {
  getPipelineLogger().fatal({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
