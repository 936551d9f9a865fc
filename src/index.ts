#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";

import { USAGE, parseConfig } from "./config/parser.js";
import { createLoggers, describeError } from "./ui/logger.js";
import { createSpinner } from "./ui/spinner.js";
import { createOllamaClient } from "./core/ollama.js";
import { createCompletionService } from "./core/services.js";
import { ConfigError } from "./core/errors.js";
import { runCommand } from "./commands.js";

async function main(): Promise<void> {
  const { config, command } = parseConfig();
  const loggers = createLoggers(config.debug);
  const spinner = createSpinner(config.debug);

  const ollamaClient = createOllamaClient({
    config,
    spinner,
    toLLMLog: loggers.toLLMLog,
    fromLLMLog: loggers.fromLLMLog,
    stageWarn: loggers.stageWarn,
  });
  const completion = createCompletionService(ollamaClient);

  loggers.stageLog(`[main] ${command.kind} with model ${config.model} at ${config.ollamaUrl}`);
  try {
    await runCommand(command, { completion, loggers });
  } finally {
    spinner.stop();
  }
}

try {
  await main();
} catch (error) {
  const { stageError } = createLoggers(false);
  stageError(`[main] ${describeError(error)}`);
  if (error instanceof ConfigError) {
    console.error(`\n${USAGE}`);
  }
  process.exitCode = 1;
}
