import { describe, expect, test } from "vitest";
import { lexiconOf } from "../../tests/fixtures";
import { QueryExpander } from "./lexicon";
import { suggestQueries } from "./suggestions";

const expander = new QueryExpander(
  lexiconOf(
    { ai: ["artificial intelligence", "machine learning", "deep learning", "neural network"] },
    ["graph neural networks", "deep learning computer vision", "Deep reinforcement learning"]
  )
);

describe("suggestQueries", () => {
  test("offers popular searches containing the text", () => {
    expect(suggestQueries("deep", expander)).toEqual([
      "deep learning computer vision",
      "Deep reinforcement learning",
    ]);
  });

  test("extends the text with the first three expansions of each key", () => {
    expect(suggestQueries("ai", expander)).toEqual([
      "ai artificial intelligence",
      "ai machine learning",
      "ai deep learning",
    ]);
  });

  test("truncates to the limit", () => {
    expect(suggestQueries("ai", expander, 2)).toEqual([
      "ai artificial intelligence",
      "ai machine learning",
    ]);
  });

  test("drops duplicates regardless of case", () => {
    const withPopular = new QueryExpander(
      lexiconOf({ ai: ["artificial intelligence", "deep learning"] }, ["AI deep learning"])
    );
    expect(suggestQueries("ai", withPopular)).toEqual([
      "AI deep learning",
      "ai artificial intelligence",
    ]);
  });

  test("returns nothing for blank text", () => {
    expect(suggestQueries("   ", expander)).toEqual([]);
  });
});
