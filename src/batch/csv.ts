import { FEATURE_NAMES, type DetectionResult } from "../report/schema.js";
import { toFlatRecord } from "../analysis/detector.js";

/**
 * RFC 4180 风格 CSV 读取。
 *
 * 实现方式：
 * - 逐字符状态机，支持引号包裹、`""` 转义、字段内换行、CRLF/LF；
 * - 引号不闭合时返回 `null`，由调用方当作"无法解析"处理。
 */
export function parseCsv(input: string): string[][] | null {
  const text = input.startsWith("\uFEFF") ? input.slice(1) : input;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === "") {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (inQuotes) return null;
  if (field !== "" || row.length) {
    row.push(field);
    rows.push(row);
  }
  // 丢弃纯空行
  return rows.filter((r) => r.length > 1 || r[0] !== "");
}

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export const CSV_COLUMNS = [
  "text",
  "label",
  "ai_probability",
  "human_probability",
  ...FEATURE_NAMES,
] as const;

/** 批量结果导出为 CSV（含表头，末尾带换行） */
export function toCsv(rows: ReadonlyArray<{ text: string; result: DetectionResult }>): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const { text, result } of rows) {
    const flat = toFlatRecord(result);
    const cells = CSV_COLUMNS.map((col) => (col === "text" ? text : String(flat[col])));
    lines.push(cells.map(escapeCsvField).join(","));
  }
  return lines.join("\n") + "\n";
}
