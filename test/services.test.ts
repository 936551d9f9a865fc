import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { OllamaMessage, OllamaResponse } from "../src/types.js";
import type { CallOllamaOptions, OllamaClient } from "../src/core/ollama.js";
import { createCompletionService, parseJsonReply } from "../src/core/services.js";
import { ServiceError } from "../src/core/errors.js";

function fakeClient(content: string, doneReason?: string): OllamaClient & {
  requests: Array<{ messages: OllamaMessage[]; overrides: CallOllamaOptions | undefined }>;
} {
  const requests: Array<{ messages: OllamaMessage[]; overrides: CallOllamaOptions | undefined }> = [];
  return {
    requests,
    async call(messages, overrides) {
      requests.push({ messages, overrides });
      const response: OllamaResponse = {
        message: { role: "assistant", content },
        done: true,
        ...(doneReason !== undefined ? { done_reason: doneReason } : {}),
      };
      return response;
    },
  };
}

describe("parseJsonReply", () => {
  it("parses a bare JSON reply", () => {
    assert.deepStrictEqual(parseJsonReply(' ["English"] '), ["English"]);
  });

  it("drops a code fence around the JSON", () => {
    assert.deepStrictEqual(parseJsonReply('```json\n[{"a":1}]\n```'), [{ a: 1 }]);
  });

  it("rejects empty and non-JSON replies", () => {
    assert.throws(() => parseJsonReply("   "), /empty reply where JSON was expected/);
    assert.throws(() => parseJsonReply("Sure! Here is the glossary."), ServiceError);
  });
});

describe("createCompletionService", () => {
  it("sends one user message and returns the trimmed reply", async () => {
    const client = fakeClient("  edited text \n");
    const completion = createCompletionService(client);

    assert.strictEqual(
      await completion.complete("prompt", { spinnerMessage: "Editing manuscript" }),
      "edited text"
    );
    assert.deepStrictEqual(client.requests[0], {
      messages: [{ role: "user", content: "prompt" }],
      overrides: { spinnerMessage: "Editing manuscript" },
    });
  });

  it("rejects an empty reply", async () => {
    const completion = createCompletionService(fakeClient(" "));
    await assert.rejects(completion.complete("prompt"), /Model returned an empty reply/);
  });

  it("asks for JSON with the schema and a zero temperature", async () => {
    const client = fakeClient('["Sanskrit"]');
    const completion = createCompletionService(client);
    const schema = { type: "array", items: { type: "string" } };

    assert.deepStrictEqual(await completion.completeJson("prompt", schema), ["Sanskrit"]);
    assert.deepStrictEqual(client.requests[0]?.overrides, {
      format: schema,
      options: { temperature: 0 },
    });
  });

  it("rejects a reply cut off at the length limit", async () => {
    const completion = createCompletionService(
      fakeClient("[H1]Chapter One[/H1]\nFirst half of the bo", "length")
    );
    await assert.rejects(completion.complete("prompt"), (error: unknown) => {
      assert.ok(error instanceof ServiceError);
      assert.match(error.message, /^Model reply was truncated/);
      return true;
    });
  });

  it("rejects a truncated JSON reply", async () => {
    const completion = createCompletionService(fakeClient('[{"term":"dharma"', "length"));
    await assert.rejects(completion.completeJson("prompt", {}), /Model reply was truncated/);
  });

  it("accepts a reply that stopped normally", async () => {
    const completion = createCompletionService(fakeClient("done", "stop"));
    assert.strictEqual(await completion.complete("prompt"), "done");
  });
});
