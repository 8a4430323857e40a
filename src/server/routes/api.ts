import express from "express";
import multer from "multer";
import { z } from "zod";
import type { AppLogger } from "../../logger/index.js";
import {
  explainFeatures,
  summarizeBatch,
  verdictBand,
  type HeuristicDetector,
} from "../../analysis/detector.js";
import { toCsv } from "../../batch/csv.js";
import { isSupportedBatchFile, parseBatchUpload, type BatchInputFailure } from "../../batch/parser.js";
import { runSecondaryCheck, type TextOracle } from "../../llm/oracle.js";
import { SAMPLE_TEXTS } from "../../samples.js";
import { HttpError } from "../errors.js";
import { asyncHandler } from "./asyncHandler.js";

const NO_USABLE_INPUT_MESSAGES: Record<BatchInputFailure, string> = {
  empty: "No usable input: the file has no rows with text",
  unparsable: "No usable input: the file could not be parsed as CSV or JSON",
  "missing-text-field": "No usable input: the file has no `text` field",
};

/**
 * 检测 API。
 *
 * - 启发式检测同步完成，结果可直接返回；
 * - 二次复核只在请求显式要求时调用，失败不影响主结果。
 */
export function createApiRouter(params: {
  logger: AppLogger;
  detector: HeuristicDetector;
  oracle: TextOracle;
  maxUploadMb: number;
  maxBatchSize: number;
}) {
  const router = express.Router();
  const { detector } = params;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: params.maxUploadMb * 1024 * 1024 },
  });

  const detectBody = z.object({
    text: z.string(),
    secondOpinion: z.boolean().optional(),
  });
  const batchBody = z.object({
    texts: z.array(z.string()).min(1).max(params.maxBatchSize),
  });

  router.get("/health", (_req, res) => res.json({ ok: true }));

  router.get("/samples", (_req, res) => res.json({ ok: true, samples: SAMPLE_TEXTS }));

  router.post(
    "/detect",
    asyncHandler(async (req, res) => {
      const log = req.log ?? params.logger;
      const body = detectBody.parse(req.body);
      if (!body.text.trim()) throw new HttpError(400, "EMPTY_TEXT", "Text is empty");

      const result = detector.predict(body.text);
      log.info("Detected text", {
        chars: body.text.length,
        label: result.label,
        aiProbability: result.aiProbability,
      });

      const secondary = body.secondOpinion
        ? await runSecondaryCheck(params.oracle, body.text, log)
        : undefined;

      res.json({
        ok: true,
        result,
        band: verdictBand(result.aiProbability),
        observations: explainFeatures(result.features),
        secondary,
      });
    })
  );

  router.post("/detect/batch", (req, res) => {
    const log = req.log ?? params.logger;
    const body = batchBody.parse(req.body);
    const results = detector.batchPredict(body.texts);
    const summary = summarizeBatch(results);
    log.info("Detected batch", { ...summary });
    res.json({ ok: true, results, summary });
  });

  router.post("/detect/upload", upload.single("file"), (req, res) => {
    const log = req.log ?? params.logger;
    const file = req.file;
    if (!file) throw new HttpError(400, "NO_FILE", "Upload a .csv, .json or .jsonl file (field: file)");

    const filename = decodeMulterFilename(file.originalname);
    if (!isSupportedBatchFile(filename)) {
      throw new HttpError(400, "INVALID_FILE", "Only .csv, .json and .jsonl files are supported");
    }

    const input = parseBatchUpload(filename, file.buffer.toString("utf8"));
    if (!input.ok) {
      log.warn("Unusable batch upload", { filename, size: file.size, reason: input.reason });
      throw new HttpError(400, "NO_USABLE_INPUT", NO_USABLE_INPUT_MESSAGES[input.reason]);
    }

    const results = detector.batchPredict(input.texts);
    const summary = summarizeBatch(results);
    log.info("Detected uploaded batch", { filename, size: file.size, ...summary });

    if (req.query.format === "csv") {
      const csv = toCsv(input.texts.map((text, i) => ({ text, result: results[i] })));
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", 'attachment; filename="batch_detection.csv"');
      res.send(csv);
      return;
    }

    res.json({
      ok: true,
      filename,
      items: input.texts.map((text, i) => ({ text, result: results[i] })),
      summary,
    });
  });

  return router;
}

/**
 * multer 按 latin1 解码 multipart 文件名；能按 UTF-8 严格解码时取解码结果。
 */
function decodeMulterFilename(raw: string): string {
  try {
    const bytes = Uint8Array.from(raw, (c) => c.charCodeAt(0));
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return raw;
  }
}
