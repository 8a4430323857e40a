import type {
  BatchSummary,
  DetectionLabel,
  DetectionResult,
  FeatureName,
  FeatureVector,
  FlatDetectionRecord,
  Observation,
  VerdictBand,
} from "../report/schema.js";
import { FEATURE_NAMES } from "../report/schema.js";
import { extractFeatures } from "./features.js";
import { mean } from "./textUtils.js";

/**
 * 线性模型配置：权重为正表示该特征把结果推向 "AI-written"。
 *
 * 未出现在 `weights` 里的特征不参与打分（例如 uppercase_ratio / digit_ratio
 * 只用于展示）。
 */
export type DetectorConfig = Readonly<{
  weights: Readonly<Partial<Record<FeatureName, number>>>;
  bias: number;
}>;

export const DEFAULT_DETECTOR_CONFIG: DetectorConfig = Object.freeze({
  weights: Object.freeze({
    complexity: 1.2,
    burstiness: -1.4,
    repetition: 1.1,
    diversity: -1.3,
    stopword_ratio: 0.8,
    punctuation_density: -0.4,
    entropy: -0.7,
  }),
  bias: 0.15,
});

/** 数值稳定的 logistic：只对非正数求 exp，极端分值不会溢出 */
export function sigmoid(x: number): number {
  if (x >= 0) return 1 / (1 + Math.exp(-x));
  const e = Math.exp(x);
  return e / (1 + e);
}

export function labelFor(aiProbability: number): DetectionLabel {
  return aiProbability >= 0.5 ? "AI-written" : "Human-written";
}

/**
 * 启发式 AI/人类文本判别器（固定线性权重 + sigmoid）。
 *
 * 实例只持有只读配置，可在并发请求间共享；不同配置的实例可以同时存在。
 */
export class HeuristicDetector {
  readonly config: DetectorConfig;

  constructor(config: DetectorConfig = DEFAULT_DETECTOR_CONFIG) {
    this.config = Object.freeze({
      weights: Object.freeze({ ...config.weights }),
      bias: config.bias,
    });
  }

  score(features: FeatureVector): number {
    let score = this.config.bias;
    for (const name of FEATURE_NAMES) {
      const w = this.config.weights[name];
      if (w !== undefined) score += w * features[name];
    }
    return score;
  }

  predict(text: string): DetectionResult {
    const features = Object.freeze(extractFeatures(text));
    const aiProbability = sigmoid(this.score(features));
    return Object.freeze({
      label: labelFor(aiProbability),
      aiProbability,
      humanProbability: 1 - aiProbability,
      features,
    });
  }

  batchPredict(texts: readonly string[]): DetectionResult[] {
    return texts.map((t) => this.predict(t));
  }
}

export function toFlatRecord(result: DetectionResult): FlatDetectionRecord {
  return {
    label: result.label,
    ai_probability: result.aiProbability,
    human_probability: result.humanProbability,
    ...result.features,
  };
}

export function verdictBand(aiProbability: number): VerdictBand {
  if (aiProbability > 0.65) return "likely-ai";
  if (aiProbability < 0.35) return "likely-human";
  return "uncertain";
}

/**
 * 特征解读：把几个关键特征的越界情况翻译成可读提示。
 * 阈值只用于展示，不影响打分。
 */
export function explainFeatures(features: FeatureVector): Observation[] {
  const notes: Observation[] = [];
  if (features.burstiness < 0.25) {
    notes.push({
      code: "low-burstiness",
      message: "Sentence lengths vary little, which is common in flat machine-written prose.",
    });
  }
  if (features.repetition > 0.22) {
    notes.push({ code: "high-repetition", message: "A single word dominates the text." });
  }
  if (features.diversity < 0.5) {
    notes.push({
      code: "low-diversity",
      message: "Vocabulary diversity is low; check for templated content.",
    });
  }
  if (features.entropy > 0.65) {
    notes.push({
      code: "high-entropy",
      message: "Word distribution is spread out, closer to free human writing.",
    });
  }
  if (features.stopword_ratio > 0.55) {
    notes.push({
      code: "high-stopword-ratio",
      message: "Function words make up most of the text; phrasing may be overly regular.",
    });
  }
  if (!notes.length) {
    notes.push({
      code: "within-normal-range",
      message: "Features fall in the usual range; no single signal is decisive.",
    });
  }
  return notes;
}

export function summarizeBatch(results: readonly DetectionResult[]): BatchSummary {
  const aiCount = results.filter((r) => r.label === "AI-written").length;
  return {
    total: results.length,
    aiCount,
    humanCount: results.length - aiCount,
    averageAiProbability: mean(results.map((r) => r.aiProbability)),
  };
}
