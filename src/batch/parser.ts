import { parseCsv } from "./csv.js";

export type BatchInputFailure = "empty" | "unparsable" | "missing-text-field";

export type BatchInput =
  | { ok: true; texts: string[] }
  | { ok: false; reason: BatchInputFailure };

export const SUPPORTED_BATCH_EXTENSIONS = [".csv", ".json", ".jsonl"] as const;

export function isSupportedBatchFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return SUPPORTED_BATCH_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** `text` 字段转字符串：数字/布尔值会被字符串化，null 与对象视为缺失 */
function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function fromRecords(records: unknown[]): BatchInput {
  const objects = records.filter(isRecord);
  if (!objects.length) return { ok: false, reason: "empty" };
  if (!objects.some((o) => "text" in o)) return { ok: false, reason: "missing-text-field" };
  const texts = objects.map((o) => textOf(o.text)).filter((t): t is string => t !== undefined);
  return texts.length ? { ok: true, texts } : { ok: false, reason: "empty" };
}

function parseCsvUpload(content: string): BatchInput {
  const rows = parseCsv(content);
  if (!rows) return { ok: false, reason: "unparsable" };
  const [header, ...body] = rows;
  if (!header) return { ok: false, reason: "empty" };
  const col = header.findIndex((h) => h.trim() === "text");
  if (col === -1) return { ok: false, reason: "missing-text-field" };
  const texts = body.map((r) => r[col]).filter((t): t is string => t !== undefined);
  return texts.length ? { ok: true, texts } : { ok: false, reason: "empty" };
}

function tryJsonLines(content: string): unknown[] | null {
  const records: unknown[] = [];
  for (const line of content.split(/\r?\n/g)) {
    if (!line.trim()) continue;
    try {
      records.push(JSON.parse(line));
    } catch {
      return null;
    }
  }
  return records;
}

function parseJsonUpload(content: string): BatchInput {
  const lines = tryJsonLines(content);
  // 单行 JSON 数组也会被当成一条 JSON Lines 记录，需要展开
  if (lines && !(lines.length === 1 && Array.isArray(lines[0]))) return fromRecords(lines);

  let doc: unknown;
  try {
    doc = JSON.parse(content);
  } catch {
    return { ok: false, reason: "unparsable" };
  }
  if (!Array.isArray(doc)) return { ok: false, reason: "unparsable" };
  return fromRecords(doc);
}

/**
 * 解析批量上传文件，抽取每行的 `text` 字段。
 *
 * - `.csv`：首行为表头，需包含 `text` 列；
 * - 其他：优先按 JSON Lines，失败再按整体 JSON 数组解析。
 *
 * 不抛异常：无法使用的输入统一返回 `{ ok: false, reason }`。
 */
export function parseBatchUpload(filename: string, raw: string): BatchInput {
  const content = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  if (!content.trim()) return { ok: false, reason: "empty" };
  if (filename.toLowerCase().endsWith(".csv")) return parseCsvUpload(content);
  return parseJsonUpload(content);
}
