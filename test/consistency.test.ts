import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  buildConsistencyReport,
  describeCluster,
  findNameVariants,
} from "../src/consistency/names.js";

describe("findNameVariants", () => {
  it("groups close spellings under the first one used", () => {
    const text = "Suresh met Kamala. Later Suresh spoke. Suraesh agreed with Suresh.";
    assert.deepStrictEqual(findNameVariants(text), [
      {
        preferred: "Suresh",
        variants: [
          { name: "Suresh", count: 3 },
          { name: "Suraesh", count: 1 },
        ],
      },
    ]);
  });

  it("allows two edits for longer names", () => {
    const clusters = findNameVariants("Vishwamitra taught. Vishvamitraa listened.");
    assert.deepStrictEqual(
      clusters.map((c) => c.variants.map((v) => v.name)),
      [["Vishwamitra", "Vishvamitraa"]]
    );
  });

  it("reports nothing for distinct names", () => {
    assert.deepStrictEqual(findNameVariants("Arjuna asked Krishna about Bhishma."), []);
  });

  it("ignores short and lowercase words", () => {
    assert.deepStrictEqual(findNameVariants("Ram met Rim. suresh and suraesh."), []);
  });

  it("checks name spellings only, not dates or numbers", () => {
    assert.deepStrictEqual(
      findNameVariants("Born in 1947 in Kashi. Born in 1948 in Kashi. He was 12, then 21."),
      []
    );
  });

  it("does not pair names with different initials", () => {
    assert.deepStrictEqual(findNameVariants("Kamala and Gamala"), []);
  });
});

describe("buildConsistencyReport", () => {
  it("describes each cluster", () => {
    assert.deepStrictEqual(buildConsistencyReport("Suresh met Kamala. Suraesh left."), [
      'Possible spelling variants: "Suresh" (1x), "Suraesh" (1x). Standardize to "Suresh" (first usage).',
    ]);
  });

  it("formats a cluster", () => {
    assert.strictEqual(
      describeCluster({
        preferred: "Gita",
        variants: [
          { name: "Gita", count: 4 },
          { name: "Geta", count: 2 },
        ],
      }),
      'Possible spelling variants: "Gita" (4x), "Geta" (2x). Standardize to "Gita" (first usage).'
    );
  });
});
