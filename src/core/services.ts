/**
 * The completion capability the stages depend on.
 *
 * Stages only ever see `CompletionService`; the Ollama-backed implementation
 * is built once at start-up and injected.
 */

import type { OllamaResponse } from "../types.js";
import type { OllamaClient } from "./ollama.js";
import { extractAssistantText, stripCodeFences } from "../utils/strings.js";
import { ServiceError } from "./errors.js";

export interface CompleteOptions {
  spinnerMessage?: string;
  temperature?: number;
}

export interface CompletionService {
  /** Plain-text reply to a single prompt. Rejects with ServiceError. */
  complete: (prompt: string, options?: CompleteOptions) => Promise<string>;
  /**
   * Reply constrained to `schema`, parsed as JSON but not validated.
   * Rejects with ServiceError, including for replies that are not JSON.
   */
  completeJson: (prompt: string, schema: object, options?: CompleteOptions) => Promise<unknown>;
}

export function parseJsonReply(text: string): unknown {
  const cleaned = stripCodeFences(text);
  if (!cleaned) {
    throw new ServiceError("Model returned an empty reply where JSON was expected");
  }
  try {
    const value: unknown = JSON.parse(cleaned);
    return value;
  } catch (error) {
    throw new ServiceError("Model reply is not valid JSON", { cause: error });
  }
}

function replyText(response: OllamaResponse): string {
  if (response.done_reason === "length") {
    throw new ServiceError(
      "Model reply was truncated at the context or output limit; the result would be incomplete"
    );
  }
  return extractAssistantText(response.message);
}

export function createCompletionService(ollamaClient: OllamaClient): CompletionService {
  async function complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const response = await ollamaClient.call([{ role: "user", content: prompt }], {
      ...(options.spinnerMessage ? { spinnerMessage: options.spinnerMessage } : {}),
      ...(options.temperature !== undefined
        ? { options: { temperature: options.temperature } }
        : {}),
    });
    const text = replyText(response).trim();
    if (!text) {
      throw new ServiceError("Model returned an empty reply");
    }
    return text;
  }

  async function completeJson(
    prompt: string,
    schema: object,
    options: CompleteOptions = {}
  ): Promise<unknown> {
    const response = await ollamaClient.call([{ role: "user", content: prompt }], {
      format: schema,
      ...(options.spinnerMessage ? { spinnerMessage: options.spinnerMessage } : {}),
      options: { temperature: options.temperature ?? 0 },
    });
    return parseJsonReply(replyText(response));
  }

  return { complete, completeJson };
}
