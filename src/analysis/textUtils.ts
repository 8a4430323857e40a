const TOKEN_RE = /[A-Za-z0-9']+|[\u4e00-\u9fff]/g;
const SENTENCE_DELIMITER_RE = /[.!?？！。；;]+/;
// 空白字符集：含 \x1c-\x1f 与 NEL，不含 BOM（\uFEFF 不算空白）
const WS = "\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";
const WHITESPACE_RUN_RE = new RegExp(`[${WS}]+`, "g");
const EDGE_WHITESPACE_RE = new RegExp(`^[${WS}]+|[${WS}]+$`, "g");

/**
 * 英文/数字词 + 单个汉字分词。
 *
 * 实现方式：
 * - 先整体转小写（汉字不受影响），再按正则取出所有匹配；
 * - 不依赖词典，同一输入永远得到同一结果。
 */
export function tokenize(input: string): string[] {
  return input.toLowerCase().match(TOKEN_RE) ?? [];
}

export function splitSentences(input: string): string[] {
  return input
    .split(SENTENCE_DELIMITER_RE)
    .map(trimWhitespace)
    .filter(Boolean);
}

/** 去掉首尾空白；与 String#trim 不同，保留 BOM */
export function trimWhitespace(input: string): string {
  return input.replace(EDGE_WHITESPACE_RE, "");
}

/** 按空白切分的词数（句长统计用） */
export function wordCount(sentence: string): number {
  return sentence.split(WHITESPACE_RUN_RE).filter(Boolean).length;
}

/** 按码点计数，避免代理对被算成两个字符 */
export function codePoints(input: string): string[] {
  return Array.from(input);
}

export function countBy<T>(xs: Iterable<T>): Map<T, number> {
  const freq = new Map<T, number>();
  for (const x of xs) freq.set(x, (freq.get(x) ?? 0) + 1);
  return freq;
}

export function clamp(n: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, n));
}

export function mean(xs: number[]): number {
  if (!xs.length) return 0;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

/** 总体标准差（除以 n） */
export function pstdev(xs: number[]): number {
  if (xs.length <= 1) return 0;
  const m = mean(xs);
  return Math.sqrt(xs.reduce((a, b) => a + (b - m) ** 2, 0) / xs.length);
}

/** 线性映射到 0..1；区间退化时返回 0 */
export function scale(value: number, lo: number, hi: number): number {
  if (hi === lo) return 0;
  return clamp((value - lo) / (hi - lo));
}
