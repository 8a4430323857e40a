import fs from "node:fs";
import path from "node:path";
import { HeuristicDetector, summarizeBatch } from "../src/analysis/detector.js";
import { toCsv } from "../src/batch/csv.js";
import { parseBatchUpload } from "../src/batch/parser.js";

/**
 * 本地批量检测（不调用任何模型）。
 *
 * 用法：
 * - `npx tsx scripts/detect.ts /path/to/texts.csv`
 * - `npx tsx scripts/detect.ts /path/to/texts.jsonl --csv > out.csv`
 */
async function main() {
  const args = process.argv.slice(2);
  const asCsv = args.includes("--csv");
  const inputPath = args.find((a) => !a.startsWith("--"));
  if (!inputPath) {
    throw new Error("Usage: npx tsx scripts/detect.ts <file.csv|file.json|file.jsonl> [--csv]");
  }

  const abs = path.resolve(process.cwd(), inputPath);
  const content = await fs.promises.readFile(abs, "utf8");
  const input = parseBatchUpload(path.basename(abs), content);
  if (!input.ok) {
    throw new Error(`No usable input in ${abs}: ${input.reason}`);
  }

  const detector = new HeuristicDetector();
  const results = detector.batchPredict(input.texts);

  if (asCsv) {
    process.stdout.write(toCsv(input.texts.map((text, i) => ({ text, result: results[i] }))));
    return;
  }

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        input: abs,
        summary: summarizeBatch(results),
        results: results.map((r, i) => ({
          preview: input.texts[i].slice(0, 60),
          label: r.label,
          aiProbability: Number(r.aiProbability.toFixed(4)),
        })),
      },
      null,
      2
    )
  );
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
