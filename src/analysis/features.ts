import { PUNCTUATION_CHARS, STOPWORDS } from "./lexicons.js";
import type { FeatureVector } from "../report/schema.js";
import {
  clamp,
  codePoints,
  countBy,
  mean,
  pstdev,
  scale,
  splitSentences,
  tokenize,
  wordCount,
} from "./textUtils.js";

/** 只有一句话时无法衡量方差，按"轻度起伏"处理 */
export const SINGLE_SENTENCE_BURSTINESS = 0.2;

// 十进制数字，外加上标、下标与带圈/带括号的数字
const DIGIT_RE =
  /[\p{Nd}\u00B2\u00B3\u00B9\u2070-\u2079\u2080-\u2089\u2460-\u2468\u2474-\u247C\u2488-\u2490\u24F5-\u24FD\u24FF\u2776-\u277E\u2780-\u2788\u278A-\u2792\u1369-\u1371\u19DA]/u;

function isUppercase(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/** 出现最多的单个 token 占全部 token 的比例 */
export function repetitionOf(tokens: string[]): number {
  if (!tokens.length) return 0;
  let maxFreq = 0;
  for (const n of countBy(tokens).values()) if (n > maxFreq) maxFreq = n;
  return maxFreq / tokens.length;
}

/**
 * 句长起伏：句长（空白切分词数）的变异系数。
 *
 * - 没有任何非空句 → 0；
 * - 仅一句 → {@link SINGLE_SENTENCE_BURSTINESS}。
 */
export function burstinessOf(sentences: string[]): number {
  const lengths = sentences.map(wordCount).filter((n) => n > 0);
  if (!lengths.length) return 0;
  if (lengths.length === 1) return SINGLE_SENTENCE_BURSTINESS;
  const m = mean(lengths);
  if (m === 0) return 0;
  return clamp(pstdev(lengths) / m);
}

/** 归一化香农熵（以 2 为底，除以 log2(不同 token 数)） */
export function entropyOf(tokens: string[]): number {
  if (!tokens.length) return 0;
  const freq = countBy(tokens);
  let entropy = 0;
  for (const count of freq.values()) {
    const p = count / tokens.length;
    entropy -= p * Math.log2(p);
  }
  const maxEntropy = freq.size > 1 ? Math.log2(freq.size) : 1;
  return clamp(entropy / maxEntropy);
}

/**
 * 提取九个风格特征。
 *
 * 所有除数都至少为 1，空字符串得到全 0 的特征向量。
 */
export function extractFeatures(text: string): FeatureVector {
  const chars = codePoints(text);
  const tokens = tokenize(text);
  const sentences = splitSentences(text);

  const totalChars = Math.max(1, chars.length);
  const totalTokens = Math.max(1, tokens.length);

  const avgSentenceWords = sentences.length ? mean(sentences.map(wordCount)) : tokens.length;
  const avgTokenLen = mean(tokens.map((t) => codePoints(t).length));

  let punctuation = 0;
  let uppercase = 0;
  let digits = 0;
  for (const ch of chars) {
    if (PUNCTUATION_CHARS.has(ch)) punctuation += 1;
    if (isUppercase(ch)) uppercase += 1;
    if (DIGIT_RE.test(ch)) digits += 1;
  }

  const stopwords = tokens.filter((t) => STOPWORDS.has(t)).length;

  return {
    complexity: scale(avgSentenceWords, 10, 40) * 0.7 + scale(avgTokenLen, 4, 8) * 0.3,
    burstiness: burstinessOf(sentences),
    repetition: repetitionOf(tokens),
    diversity: new Set(tokens).size / totalTokens,
    stopword_ratio: stopwords / totalTokens,
    punctuation_density: clamp(punctuation / totalChars),
    uppercase_ratio: clamp(uppercase / totalChars),
    digit_ratio: clamp(digits / totalChars),
    entropy: entropyOf(tokens),
  };
}
