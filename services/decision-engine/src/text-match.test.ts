import { describe, expect, it } from "vitest";
import {
  compareText,
  containsTerm,
  findTerm,
  normalizeText,
  stemToken,
  stemmedTokens,
  stripPhrases,
  tokenSimilarity
} from "./text-match.js";

// ── Normalization ──────────────────────────────────────

describe("normalizeText", () => {
  it("lowercases and strips special characters", () => {
    expect(normalizeText("Gluten-Free Rice (2 lb)")).toBe("gluten free rice 2 lb");
  });

  it("collapses whitespace", () => {
    expect(normalizeText("  whole   wheat  ")).toBe("whole wheat");
  });

  it("drops diacritics", () => {
    expect(normalizeText("Jalapeño Crème Fraîche")).toBe("jalapeno creme fraiche");
  });

  it("keeps letters and digits from non-Latin scripts", () => {
    expect(normalizeText("豆腐 (400g)")).toBe("豆腐 400g");
  });
});

describe("stemToken", () => {
  it("folds plurals", () => {
    expect(stemToken("eggs")).toBe("egg");
    expect(stemToken("berries")).toBe("berrie");
    expect(stemToken("tomatoes")).toBe("tomato");
    expect(stemToken("peanuts")).toBe("peanut");
  });

  it("gives -y singulars and -ie singulars the same stem as their plurals", () => {
    expect(stemToken("berry")).toBe("berrie");
    expect(stemToken("cookies")).toBe("cookie");
    expect(stemToken("cookie")).toBe("cookie");
    expect(stemToken("fries")).toBe(stemToken("fry"));
  });

  it("keeps vowel-y endings", () => {
    expect(stemToken("soy")).toBe("soy");
    expect(stemToken("honey")).toBe("honey");
  });

  it("keeps double-s endings and short tokens", () => {
    expect(stemToken("glass")).toBe("glass");
    expect(stemToken("gas")).toBe("gas");
    expect(stemToken("ties")).toBe("tie");
  });

  it("leaves singular tokens alone", () => {
    expect(stemToken("rice")).toBe("rice");
  });
});

describe("stemmedTokens", () => {
  it("returns empty for blank text", () => {
    expect(stemmedTokens("   ")).toEqual([]);
  });

  it("stems each token in order", () => {
    expect(stemmedTokens("Large Brown Eggs")).toEqual(["large", "brown", "egg"]);
  });
});

// ── Term matching ──────────────────────────────────────

describe("stripPhrases", () => {
  it("removes whole-word phrases only", () => {
    expect(stripPhrases("organic coconut milk, sugar", ["coconut milk"])).toBe("organic sugar");
    expect(stripPhrases("coconutmilk", ["coconut milk"])).toBe("coconutmilk");
  });

  it("removes repeated occurrences", () => {
    expect(stripPhrases("gluten free oats gluten free", ["gluten free"])).toBe("oats");
  });
});

describe("containsTerm", () => {
  it("matches single tokens as whole words", () => {
    expect(containsTerm(stemmedTokens("whole wheat flour"), "wheat")).toBe(true);
    expect(containsTerm(stemmedTokens("buckwheat groats"), "wheat")).toBe(false);
  });

  it("matches multi-word terms contiguously", () => {
    expect(containsTerm(stemmedTokens("thai fish sauce"), "fish sauce")).toBe(true);
    expect(containsTerm(stemmedTokens("sauce with fish"), "fish sauce")).toBe(false);
  });

  it("matches across plural forms", () => {
    expect(containsTerm(stemmedTokens("roasted peanuts"), "peanut")).toBe(true);
    expect(containsTerm(stemmedTokens("anchovies in oil"), "anchovy")).toBe(true);
  });
});

describe("findTerm", () => {
  it("returns the first matching term", () => {
    expect(findTerm("enriched wheat flour, malted barley", ["barley", "wheat"])).toBe("barley");
  });

  it("ignores exempt phrases", () => {
    expect(findTerm("coconut milk", ["milk"], ["coconut milk"])).toBeNull();
    expect(findTerm("coconut milk, skim milk", ["milk"], ["coconut milk"])).toBe("milk");
  });

  it("finds accented ingredients under their plain spelling", () => {
    expect(findTerm("crème fraîche, salt", ["creme fraiche"])).toBe("creme fraiche");
  });

  it("returns null for empty text", () => {
    expect(findTerm("", ["milk"])).toBeNull();
  });
});

// ── Similarity & ordering ──────────────────────────────

describe("tokenSimilarity", () => {
  it("returns 1 for identical strings", () => {
    expect(tokenSimilarity("brown rice", "Brown Rice")).toBe(1);
  });

  it("computes Jaccard over stemmed tokens", () => {
    // {brown, rice} vs {organic, brown, rice, 2, lb} → 2/5
    expect(tokenSimilarity("brown rice", "Organic Brown Rice 2 lb")).toBeCloseTo(0.4, 5);
  });

  it("returns 0 when one side is empty", () => {
    expect(tokenSimilarity("", "rice")).toBe(0);
  });
});

describe("compareText", () => {
  it("orders by code point", () => {
    expect(compareText("Apple", "apple")).toBe(-1);
    expect(compareText("b", "a")).toBe(1);
    expect(compareText("same", "same")).toBe(0);
  });
});
