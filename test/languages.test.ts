import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { buildLanguagePrompt, detectLanguages, sampleText } from "../src/stages/languages.js";
import { ServiceError } from "../src/core/errors.js";
import { fakeCompletion, stageDeps } from "./helpers.js";

describe("sampleText", () => {
  it("trims and cuts to the limit", () => {
    assert.strictEqual(sampleText("  abcdef  ", 3), "abc");
  });

  it("uses a 2000-character default", () => {
    assert.strictEqual(sampleText("x".repeat(2500)).length, 2000);
  });
});

describe("detectLanguages", () => {
  it("skips the call for blank text", async () => {
    const completion = fakeCompletion({});
    assert.deepStrictEqual(await detectLanguages("  \n", stageDeps(completion)), []);
    assert.strictEqual(completion.calls.length, 0);
  });

  it("removes repeated names, keeping the first spelling", async () => {
    const completion = fakeCompletion({
      completeJson: async () => ["English", "Sanskrit", "english", " Hindi "],
    });
    const languages = await detectLanguages("Om namah shivaya. Hello.", stageDeps(completion));

    assert.deepStrictEqual(languages, ["English", "Sanskrit", "Hindi"]);
    assert.strictEqual(completion.calls[0]?.prompt, buildLanguagePrompt("Om namah shivaya. Hello."));
  });

  it("sends only the sample", async () => {
    const completion = fakeCompletion({ completeJson: async () => ["English"] });
    await detectLanguages(`${"a".repeat(2000)}TAIL`, stageDeps(completion));
    assert.ok(!completion.calls[0]?.prompt.includes("TAIL"));
  });

  it("rejects a reply that is not a list of names", async () => {
    const completion = fakeCompletion({ completeJson: async () => ({ languages: ["English"] }) });
    await assert.rejects(detectLanguages("Hello.", stageDeps(completion)), ServiceError);
  });
});
