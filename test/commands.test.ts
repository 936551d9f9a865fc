import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Command } from "../src/types.js";
import { DEFAULT_STYLE } from "../src/config/constants.js";
import { runCommand } from "../src/commands.js";
import { createDocumentModel } from "../src/document/model.js";
import { writeDocument } from "../src/document/docx-writer.js";
import { readParagraphs } from "../src/document/docx-reader.js";
import { FormatError } from "../src/core/errors.js";
import { createSilentLoggers } from "../src/ui/logger.js";
import { fakeCompletion } from "./helpers.js";

describe("runCommand process", () => {
  let dir = "";
  let input = "";

  before(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "process-test-"));
    input = path.join(dir, "draft.docx");
    const model = createDocumentModel();
    model.blocks.push(
      { type: "paragraph", runs: [{ text: "chapter one" }], alignment: "default" },
      { type: "paragraph", runs: [{ text: "their going to the temple" }], alignment: "default" }
    );
    fs.writeFileSync(input, await writeDocument(model, DEFAULT_STYLE));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function processCommand(source: string, output: string): Command {
    return {
      kind: "process",
      input: source,
      output,
      brief: { authorPersona: "", bookSummary: "", languageRules: "" },
      style: DEFAULT_STYLE,
      glossary: true,
      consistency: false,
    };
  }

  it("edits the draft and writes the styled result", async () => {
    const completion = fakeCompletion({
      complete: async () => "[H1]Chapter One[/H1]\nThey're going to the temple.",
      completeJson: async () => [
        { term: "mandir", transliteration: "", translation: "temple", context: null },
      ],
    });
    const output = path.join(dir, "edited_draft.docx");

    await runCommand(processCommand(input, output), { completion, loggers: createSilentLoggers() });

    assert.ok(completion.calls[0]?.prompt.endsWith("chapter one\ntheir going to the temple"));
    assert.deepStrictEqual(await readParagraphs(fs.readFileSync(output)), [
      "Chapter One",
      "They're going to the temple.",
      "",
      "Glossary",
    ]);
  });

  it("fails on a missing input file", async () => {
    const completion = fakeCompletion({});
    const command = processCommand(path.join(dir, "nope.docx"), path.join(dir, "out.docx"));

    await assert.rejects(
      runCommand(command, { completion, loggers: createSilentLoggers() }),
      FormatError
    );
    assert.strictEqual(completion.calls.length, 0);
  });
});
