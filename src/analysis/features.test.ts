import { describe, expect, it } from "vitest";
import { FEATURE_NAMES } from "../report/schema.js";
import {
  burstinessOf,
  entropyOf,
  extractFeatures,
  repetitionOf,
  SINGLE_SENTENCE_BURSTINESS,
} from "./features.js";

describe("extractFeatures", () => {
  it("returns every feature as 0 for empty text", () => {
    const f = extractFeatures("");
    expect(Object.keys(f).sort()).toEqual([...FEATURE_NAMES].sort());
    for (const name of FEATURE_NAMES) expect(f[name]).toBe(0);
  });

  it("scores three identical sentences", () => {
    const text = "The cat sat. The cat sat. The cat sat.";
    const f = extractFeatures(text);
    expect(f.repetition).toBeCloseTo(3 / 9, 12);
    expect(f.diversity).toBeCloseTo(3 / 9, 12);
    expect(f.burstiness).toBe(0);
    expect(f.entropy).toBeCloseTo(1, 12);
    expect(f.stopword_ratio).toBeCloseTo(3 / 9, 12);
    // 38 characters: three periods, three capital T
    expect(f.punctuation_density).toBeCloseTo(3 / 38, 12);
    expect(f.uppercase_ratio).toBeCloseTo(3 / 38, 12);
    expect(f.digit_ratio).toBe(0);
    expect(f.complexity).toBe(0);
  });

  it("scores a single short sentence", () => {
    const f = extractFeatures("Hello world");
    expect(f.burstiness).toBe(0.2);
    expect(f.diversity).toBe(1);
    expect(f.repetition).toBe(0.5);
    expect(f.entropy).toBe(1);
    expect(f.stopword_ratio).toBe(0);
    expect(f.punctuation_density).toBe(0);
    expect(f.uppercase_ratio).toBeCloseTo(1 / 11, 12);
    // avg token length 5 -> scale(5, 4, 8) = 0.25
    expect(f.complexity).toBeCloseTo(0.3 * 0.25, 12);
  });

  it("blends sentence length and token length into complexity", () => {
    const text = Array.from({ length: 25 }, () => "abcdef").join(" ") + ".";
    const f = extractFeatures(text);
    // 25 words per sentence -> 0.5, 6 chars per token -> 0.5
    expect(f.complexity).toBeCloseTo(0.5, 12);
    expect(f.repetition).toBe(1);
    expect(f.diversity).toBe(1 / 25);
    expect(f.entropy).toBe(0);
  });

  it("counts digits and uppercase letters over all characters", () => {
    expect(extractFeatures("abc 123").digit_ratio).toBeCloseTo(3 / 7, 12);
    expect(extractFeatures("ABc").uppercase_ratio).toBeCloseTo(2 / 3, 12);
  });

  it("counts superscript and circled digits", () => {
    // 4 digit characters out of 22
    expect(extractFeatures("x\u00B2 and \u2460\u2461\u2462 are digits?").digit_ratio).toBeCloseTo(4 / 22, 12);
  });

  it("tokenizes CJK text character by character", () => {
    const f = extractFeatures("我爱我家");
    expect(f.repetition).toBe(0.5);
    expect(f.diversity).toBe(0.75);
    expect(f.uppercase_ratio).toBe(0);
  });

  it("keeps every feature within 0..1", () => {
    const texts = [
      "!!!???...",
      "A. B. C. D. E.",
      "UPPER CASE SHOUTING WITH 1234567890 NUMBERS",
      "one; two three four five six seven eight nine ten eleven twelve; x",
      "\"'()[]\"'()[]",
      "超长的中文句子没有任何标点符号但是仍然应该被正确处理",
    ];
    for (const text of texts) {
      const f = extractFeatures(text);
      for (const name of FEATURE_NAMES) {
        expect(f[name]).toBeGreaterThanOrEqual(0);
        expect(f[name]).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe("repetitionOf", () => {
  it("is 1 when one token repeats k times", () => {
    expect(repetitionOf(["go", "go", "go", "go"])).toBe(1);
  });

  it("is 0 for no tokens", () => {
    expect(repetitionOf([])).toBe(0);
  });
});

describe("burstinessOf", () => {
  it("is 0 without sentences", () => {
    expect(burstinessOf([])).toBe(0);
    expect(burstinessOf(["   "])).toBe(0);
  });

  it("is the fixed sentinel for a single sentence", () => {
    expect(burstinessOf(["just one sentence with several words"])).toBe(SINGLE_SENTENCE_BURSTINESS);
    expect(burstinessOf(["x"])).toBe(0.2);
  });

  it("is the coefficient of variation of sentence lengths", () => {
    // lengths 2 and 6: mean 4, population std dev 2
    expect(burstinessOf(["one two", "one two three four five six"])).toBe(0.5);
  });

  it("is clamped to 1", () => {
    const long = Array.from({ length: 20 }, (_, i) => `w${i}`).join(" ");
    expect(burstinessOf(["a", "a", "a", long])).toBe(1);
  });
});

describe("burstinessOf whitespace", () => {
  it("splits words on unit separators and NEL", () => {
    // 4 and 3 words: pstdev 0.5 / mean 3.5
    const f = extractFeatures("Tab\u001fsep words here. And\u0085more there!");
    expect(f.burstiness).toBeCloseTo(1 / 7, 12);
    expect(f.complexity).toBe(0);
  });
});

describe("entropyOf", () => {
  it("is 0 for no tokens or a single distinct token", () => {
    expect(entropyOf([])).toBe(0);
    expect(entropyOf(["a", "a", "a"])).toBe(0);
  });

  it("is 1 for a uniform distribution", () => {
    expect(entropyOf(["a", "b", "c", "d"])).toBe(1);
  });

  it("is below 1 for a skewed distribution", () => {
    // p = 3/4, 1/4 -> H ≈ 0.8113 bits, normalised by log2(2) = 1
    expect(entropyOf(["a", "a", "a", "b"])).toBeCloseTo(0.811278, 5);
  });
});
