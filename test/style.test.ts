import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_STYLE } from "../src/config/constants.js";
import { decodeStyleFile, loadStyleFile, resolveStyle } from "../src/config/style.js";
import { ConfigError } from "../src/core/errors.js";

describe("resolveStyle", () => {
  it("returns the defaults without a file or flags", () => {
    assert.deepStrictEqual(resolveStyle(), { ...DEFAULT_STYLE, shloka: undefined });
  });

  it("freezes the result", () => {
    const style = resolveStyle();
    assert.ok(Object.isFrozen(style));
    assert.ok(Object.isFrozen(style.margins));
    assert.ok(Object.isFrozen(style.lineSpacing));
  });

  it("merges a style file over the defaults", () => {
    const style = resolveStyle(
      decodeStyleFile({
        fontSize: 14,
        lineSpacing: { points: 18 },
        margins: { left: 1.25 },
        heading2: { bold: false },
        shloka: { centerAlign: true },
      })
    );

    assert.strictEqual(style.fontFamily, "Times New Roman");
    assert.strictEqual(style.fontSize, 14);
    assert.deepStrictEqual(style.lineSpacing, { kind: "points", value: 18 });
    assert.deepStrictEqual(style.margins, { top: 1, bottom: 1, left: 1.25, right: 1 });
    assert.deepStrictEqual(style.heading2, { size: 14, bold: false });
    assert.deepStrictEqual(style.shloka, {
      lineBreaks: false,
      addNumbering: false,
      translationStyle: "",
      centerAlign: true,
    });
  });

  it("reads a bare number as a spacing ratio", () => {
    const style = resolveStyle(decodeStyleFile({ lineSpacing: 2 }));
    assert.deepStrictEqual(style.lineSpacing, { kind: "ratio", value: 2 });
  });

  it("lets flags win over the file", () => {
    const style = resolveStyle(
      { fontSize: 14, shloka: { lineBreaks: false } },
      { fontSize: 11, lineSpacing: { kind: "ratio", value: 1 }, shloka: { lineBreaks: true } }
    );
    assert.strictEqual(style.fontSize, 11);
    assert.deepStrictEqual(style.lineSpacing, { kind: "ratio", value: 1 });
    assert.strictEqual(style.shloka?.lineBreaks, true);
  });
});

describe("decodeStyleFile", () => {
  it("rejects a non-positive size with its path", () => {
    assert.throws(() => decodeStyleFile({ fontSize: -1 }), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^Invalid style file at fontSize: /);
      return true;
    });
  });

  it("rejects unknown keys", () => {
    assert.throws(() => decodeStyleFile({ fontColour: "red" }), ConfigError);
  });
});

describe("loadStyleFile", () => {
  let dir = "";

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "style-test-"));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads and validates a JSON file", () => {
    const file = path.join(dir, "style.json");
    fs.writeFileSync(file, JSON.stringify({ fontFamily: "Georgia" }));
    assert.deepStrictEqual(loadStyleFile(file), { fontFamily: "Georgia" });
  });

  it("rejects invalid JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ fontFamily: ");
    assert.throws(() => loadStyleFile(file), /is not valid JSON/);
  });

  it("rejects a missing file", () => {
    assert.throws(() => loadStyleFile(path.join(dir, "missing.json")), ConfigError);
  });
});
