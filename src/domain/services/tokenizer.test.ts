/**
 * Tests for the tokenizer
 */

import { describe, expect, test } from "vitest";
import { normalizeWords, tokenize } from "./tokenizer";

describe("tokenize", () => {
  test("lowercases and drops stopwords", () => {
    expect([...tokenize("Deep Learning for Image Classification")]).toEqual([
      "deep",
      "learning",
      "image",
      "classification",
    ]);
  });

  test("keeps hyphens and periods inside words", () => {
    expect([...tokenize("Q-Learning, GPT-3.5 and e.g. BERT.")]).toEqual([
      "q-learning",
      "gpt-3.5",
      "bert",
    ]);
  });

  test("drops tokens shorter than three characters", () => {
    expect([...tokenize("an AI of the 2020s")]).toEqual(["2020s"]);
  });

  test("keeps non-ASCII letters", () => {
    expect([...tokenize("Schrödinger équation")]).toEqual(["schrödinger", "équation"]);
  });

  test("returns nothing for punctuation only", () => {
    expect([...tokenize("--- ... ---")]).toEqual([]);
    expect([...tokenize("")]).toEqual([]);
  });

  test("can be iterated more than once", () => {
    const terms = tokenize("graph neural networks");
    expect([...terms]).toEqual([...terms]);
    expect([...terms]).toEqual(["graph", "neural", "networks"]);
  });

  test("accepts a custom minimum length and stopword set", () => {
    expect([...tokenize("ai is the data", { minLength: 2, stopWords: new Set(["is"]) })]).toEqual([
      "ai",
      "the",
      "data",
    ]);
  });
});

describe("normalizeWords", () => {
  test("keeps short words and stopwords", () => {
    expect(normalizeWords("An AI of the 2020s!")).toEqual(["an", "ai", "of", "the", "2020s"]);
  });

  test("splits on punctuation", () => {
    expect(normalizeWords("self-driving/cars (survey)")).toEqual([
      "self-driving",
      "cars",
      "survey",
    ]);
  });
});
