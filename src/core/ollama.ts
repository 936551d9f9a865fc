import type { Config, OllamaMessage, OllamaResponse } from "../types.js";
import type { Logger } from "../ui/logger.js";
import type { Spinner } from "../ui/spinner.js";
import { describeError } from "../ui/logger.js";
import { blankLine } from "../ui/output.js";
import { extractAssistantText, truncateMiddle } from "../utils/strings.js";
import { LOG_TEXT_LIMIT } from "../config/constants.js";
import { ServiceError } from "./errors.js";

export interface CallOllamaOptions {
  options?: Record<string, unknown>;
  silent?: boolean;
  spinnerMessage?: string;
  /** "json" or a JSON schema the reply must follow. */
  format?: unknown;
}

export interface OllamaClient {
  call: (messages: OllamaMessage[], overrides?: CallOllamaOptions) => Promise<OllamaResponse>;
}

export interface OllamaClientDeps {
  config: Config;
  spinner: Spinner;
  toLLMLog: Logger;
  fromLLMLog: Logger;
  stageWarn: Logger;
  fetchImpl?: typeof fetch;
}

function isOllamaResponse(value: unknown): value is OllamaResponse {
  if (typeof value !== "object" || value === null || !("message" in value)) return false;
  const message: unknown = value.message;
  return (
    typeof message === "object" &&
    message !== null &&
    "content" in message &&
    typeof message.content === "string"
  );
}

export function createOllamaClient(deps: OllamaClientDeps): OllamaClient {
  const { config, spinner, toLLMLog, fromLLMLog, stageWarn } = deps;
  const fetchImpl = deps.fetchImpl ?? fetch;

  async function attempt(
    messages: OllamaMessage[],
    overrides: CallOllamaOptions
  ): Promise<OllamaResponse> {
    const { options: optionOverrides, silent, spinnerMessage, format } = overrides;

    const body: Record<string, unknown> = {
      model: config.model,
      messages,
      stream: false,
      options: {
        // Whole manuscripts go through a single prompt.
        num_ctx: 32_768,
        ...optionOverrides,
      },
    };
    if (format !== undefined) {
      body["format"] = format;
    }

    if (!silent) {
      toLLMLog("[toLLM] ─── Prompt ───");
      for (const message of messages) {
        toLLMLog(`[${message.role}]`);
        toLLMLog(truncateMiddle(message.content, LOG_TEXT_LIMIT));
        blankLine(config.debug);
      }
    }

    if (!silent && spinnerMessage) {
      spinner.start(spinnerMessage);
    }
    let response: Response;
    try {
      response = await fetchImpl(`${config.ollamaUrl}/api/chat`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });
    } finally {
      spinner.stop();
    }

    if (!response.ok) {
      const text = await response.text();
      throw new ServiceError(
        `Ollama call failed with status ${response.status}: ${truncateMiddle(text, 200)}`
      );
    }
    const result: unknown = await response.json();
    if (!isOllamaResponse(result)) {
      throw new ServiceError("Ollama returned a reply without a message");
    }

    if (!silent) {
      fromLLMLog("[fromLLM] ─── Response ───");
      fromLLMLog(`[content] ${truncateMiddle(extractAssistantText(result.message), LOG_TEXT_LIMIT)}`);
    }

    return result;
  }

  async function call(
    messages: OllamaMessage[],
    overrides: CallOllamaOptions = {}
  ): Promise<OllamaResponse> {
    const maxRetries = Math.max(1, config.maxRetries || 1);

    for (let attemptNumber = 1; attemptNumber <= maxRetries; attemptNumber++) {
      try {
        return await attempt(messages, overrides);
      } catch (error) {
        if (attemptNumber === maxRetries) {
          throw error instanceof ServiceError
            ? error
            : new ServiceError(`Ollama call failed: ${describeError(error)}`, { cause: error });
        }
        const delay = Math.min(1000 * Math.pow(2, attemptNumber - 1), 10_000);
        stageWarn(
          `[llm] Ollama call failed, retrying in ${delay}ms (${attemptNumber}/${maxRetries})...`
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw new ServiceError("Unexpected: exhausted retries without result");
  }

  return { call };
}
