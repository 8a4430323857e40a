import { describe, expect, it } from "vitest";
import { FEATURE_NAMES, type FeatureName, type FeatureVector } from "../report/schema.js";
import {
  DEFAULT_DETECTOR_CONFIG,
  explainFeatures,
  HeuristicDetector,
  labelFor,
  sigmoid,
  summarizeBatch,
  toFlatRecord,
  verdictBand,
} from "./detector.js";

function vector(overrides: Partial<Record<FeatureName, number>> = {}): FeatureVector {
  return {
    complexity: 0.5,
    burstiness: 0.5,
    repetition: 0.5,
    diversity: 0.5,
    stopword_ratio: 0.5,
    punctuation_density: 0.5,
    uppercase_ratio: 0.5,
    digit_ratio: 0.5,
    entropy: 0.5,
    ...overrides,
  };
}

describe("sigmoid", () => {
  it("maps 0 to 0.5", () => {
    expect(sigmoid(0)).toBe(0.5);
  });

  it("does not overflow for extreme scores", () => {
    expect(sigmoid(1000)).toBe(1);
    expect(sigmoid(-1000)).toBe(0);
    expect(Number.isFinite(sigmoid(-1e308))).toBe(true);
  });

  it("is symmetric", () => {
    expect(sigmoid(2) + sigmoid(-2)).toBeCloseTo(1, 15);
  });
});

describe("labelFor", () => {
  it("labels 0.5 and above as AI-written", () => {
    expect(labelFor(0.5)).toBe("AI-written");
    expect(labelFor(0.4999)).toBe("Human-written");
  });
});

describe("HeuristicDetector", () => {
  const detector = new HeuristicDetector();

  it("scores empty text as sigmoid(bias)", () => {
    const r = detector.predict("");
    for (const name of FEATURE_NAMES) expect(r.features[name]).toBe(0);
    expect(r.aiProbability).toBe(sigmoid(DEFAULT_DETECTOR_CONFIG.bias));
    expect(r.humanProbability).toBe(1 - r.aiProbability);
    expect(r.label).toBe("AI-written");
  });

  it("combines features with the reference weights", () => {
    const r = detector.predict("Hello world");
    // 0.15 + 1.2*0.075 - 1.4*0.2 + 1.1*0.5 - 1.3*1 - 0.7*1
    expect(detector.score(r.features)).toBeCloseTo(-1.49, 12);
    expect(r.aiProbability).toBeCloseTo(sigmoid(-1.49), 12);
    expect(r.label).toBe("Human-written");
  });

  it("scores words separated by control whitespace", () => {
    const r = detector.predict("Tab\u001fsep words here. And\u0085more there!");
    expect(r.aiProbability).toBeCloseTo(0.1561519518521783, 12);
  });

  it("keeps human probability as the exact complement", () => {
    const texts = ["The cat sat. The cat sat. The cat sat.", "Short!", "数据驱动的决策。", "x y z"];
    for (const t of texts) {
      const r = detector.predict(t);
      expect(r.humanProbability).toBe(1 - r.aiProbability);
      expect(r.aiProbability).toBeGreaterThanOrEqual(0);
      expect(r.aiProbability).toBeLessThanOrEqual(1);
    }
  });

  it("ignores features without a configured weight", () => {
    expect(detector.predict("ABC DEF 123").aiProbability).toBe(detector.predict("abc def 456").aiProbability);
  });

  it("uses an injected configuration", () => {
    const biasOnly = new HeuristicDetector({ weights: {}, bias: -2 });
    expect(biasOnly.predict("anything at all").aiProbability).toBe(sigmoid(-2));

    const shouting = new HeuristicDetector({ weights: { uppercase_ratio: 10 }, bias: 0 });
    expect(shouting.predict("ABC").aiProbability).toBe(sigmoid(10));
    expect(detector.config.weights.uppercase_ratio).toBeUndefined();
  });

  it("copies and freezes its configuration", () => {
    const weights: Partial<Record<FeatureName, number>> = { repetition: 1 };
    const d = new HeuristicDetector({ weights, bias: 0 });
    weights.repetition = 100;
    expect(d.config.weights.repetition).toBe(1);
    expect(Object.isFrozen(d.config)).toBe(true);
    expect(Object.isFrozen(d.config.weights)).toBe(true);
  });

  it("returns frozen results", () => {
    const r = detector.predict("Hello world");
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.features)).toBe(true);
  });

  it("batch-predicts element-wise in order", () => {
    const t1 = "The cat sat. The cat sat. The cat sat.";
    const t2 = "Hello world";
    expect(detector.batchPredict([t1, t2])).toEqual([detector.predict(t1), detector.predict(t2)]);
    expect(detector.batchPredict([t2, t1])[0]).toEqual(detector.predict(t2));
    expect(detector.batchPredict([])).toEqual([]);
  });

  it("never lowers the AI probability as repetition grows", () => {
    let prev = -Infinity;
    for (let i = 0; i <= 10; i += 1) {
      const p = sigmoid(detector.score(vector({ repetition: i / 10 })));
      expect(p).toBeGreaterThanOrEqual(prev);
      prev = p;
    }
  });

  it("never raises the AI probability as burstiness grows", () => {
    let prev = Infinity;
    for (let i = 0; i <= 10; i += 1) {
      const p = sigmoid(detector.score(vector({ burstiness: i / 10 })));
      expect(p).toBeLessThanOrEqual(prev);
      prev = p;
    }
  });
});

describe("toFlatRecord", () => {
  it("flattens the result into tabular keys", () => {
    const r = new HeuristicDetector().predict("Hello world");
    const flat = toFlatRecord(r);
    expect(Object.keys(flat)).toEqual(["label", "ai_probability", "human_probability", ...FEATURE_NAMES]);
    expect(flat.label).toBe("Human-written");
    expect(flat.ai_probability).toBe(r.aiProbability);
    expect(flat.burstiness).toBe(0.2);
  });
});

describe("verdictBand", () => {
  it("splits probabilities into three bands", () => {
    expect(verdictBand(0.7)).toBe("likely-ai");
    expect(verdictBand(0.65)).toBe("uncertain");
    expect(verdictBand(0.35)).toBe("uncertain");
    expect(verdictBand(0.2)).toBe("likely-human");
  });
});

describe("explainFeatures", () => {
  it("reports out-of-range features in a fixed order", () => {
    const zeros = vector({
      complexity: 0,
      burstiness: 0,
      repetition: 0,
      diversity: 0,
      stopword_ratio: 0,
      punctuation_density: 0,
      uppercase_ratio: 0,
      digit_ratio: 0,
      entropy: 0,
    });
    expect(explainFeatures(zeros).map((o) => o.code)).toEqual(["low-burstiness", "low-diversity"]);

    const loud = vector({ burstiness: 0.1, repetition: 0.3, diversity: 0.4, entropy: 0.9, stopword_ratio: 0.6 });
    expect(explainFeatures(loud).map((o) => o.code)).toEqual([
      "low-burstiness",
      "high-repetition",
      "low-diversity",
      "high-entropy",
      "high-stopword-ratio",
    ]);
  });

  it("falls back to a single neutral note", () => {
    const calm = vector({ burstiness: 0.5, repetition: 0.1, diversity: 0.8, entropy: 0.5, stopword_ratio: 0.3 });
    expect(explainFeatures(calm).map((o) => o.code)).toEqual(["within-normal-range"]);
  });
});

describe("summarizeBatch", () => {
  it("counts labels and averages the AI probability", () => {
    const d = new HeuristicDetector({ weights: {}, bias: 0 });
    const results = d.batchPredict(["a", "b"]);
    expect(summarizeBatch(results)).toEqual({
      total: 2,
      aiCount: 2,
      humanCount: 0,
      averageAiProbability: 0.5,
    });
  });

  it("handles an empty batch", () => {
    expect(summarizeBatch([])).toEqual({ total: 0, aiCount: 0, humanCount: 0, averageAiProbability: 0 });
  });
});
