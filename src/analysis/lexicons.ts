/**
 * 常见英文功能词。停用词比例越高，句子通常越"规整"。
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "the",
  "and",
  "to",
  "of",
  "in",
  "is",
  "it",
  "that",
  "as",
  "for",
  "with",
  "was",
  "were",
  "on",
  "by",
  "be",
  "are",
  "this",
  "at",
  "from",
  "or",
  "which",
  "but",
  "have",
  "has",
  "had",
  "not",
  "we",
  "they",
  "you",
  "i",
  "their",
  "its",
  "our",
  "will",
  "can",
  "about",
  "also",
  "into",
  "more",
  "than",
]);

/** 计入标点密度的 ASCII 标点 */
export const PUNCTUATION_CHARS: ReadonlySet<string> = new Set(".,;:!?()[]\"'");
