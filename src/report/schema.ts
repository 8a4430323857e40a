export const FEATURE_NAMES = [
  "complexity",
  "burstiness",
  "repetition",
  "diversity",
  "stopword_ratio",
  "punctuation_density",
  "uppercase_ratio",
  "digit_ratio",
  "entropy",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/** 九个风格特征，取值均在 0..1。 */
export type FeatureVector = Readonly<Record<FeatureName, number>>;

export type DetectionLabel = "AI-written" | "Human-written";

export type DetectionResult = Readonly<{
  label: DetectionLabel;
  aiProbability: number;
  humanProbability: number;
  features: FeatureVector;
}>;

/**
 * 扁平化结果：用于 CSV / 表格导出。
 * - 键名与特征名保持一致（snake_case），方便与下游表格对齐。
 */
export type FlatDetectionRecord = {
  label: DetectionLabel;
  ai_probability: number;
  human_probability: number;
} & Record<FeatureName, number>;

export type VerdictBand = "likely-ai" | "uncertain" | "likely-human";

export type ObservationCode =
  | "low-burstiness"
  | "high-repetition"
  | "low-diversity"
  | "high-entropy"
  | "high-stopword-ratio"
  | "within-normal-range";

export type Observation = {
  code: ObservationCode;
  /** 面向用户的一句话说明 */
  message: string;
};

export type BatchSummary = {
  total: number;
  aiCount: number;
  humanCount: number;
  averageAiProbability: number;
};
