import express from "express";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { HeuristicDetector } from "../analysis/detector.js";
import type { AppConfig } from "../config.js";
import { DisabledOracle, type TextOracle } from "../llm/oracle.js";
import type { AppLogger } from "../logger/index.js";
import { requestContextMiddleware } from "./requestContext.js";
import { errorHandler } from "./errors.js";
import { createApiRouter } from "./routes/api.js";

export type CreateAppParams = {
  logger: AppLogger;
  config: Pick<AppConfig, "maxUploadMb" | "maxBatchSize">;
  detector?: HeuristicDetector;
  oracle?: TextOracle;
};

/**
 * 创建 Express 应用：API + 静态页面 + 统一错误处理。
 *
 * detector / oracle 由调用方注入；缺省时使用默认权重与关闭状态的复核。
 */
export function createApp(params: CreateAppParams) {
  const app = express();
  const detector = params.detector ?? new HeuristicDetector();
  const oracle = params.oracle ?? new DisabledOracle();

  app.disable("x-powered-by");
  app.use(requestContextMiddleware(params.logger));
  app.use(express.json({ limit: "2mb" }));

  app.use(
    "/api",
    createApiRouter({
      logger: params.logger,
      detector,
      oracle,
      maxUploadMb: params.config.maxUploadMb,
      maxBatchSize: params.config.maxBatchSize,
    })
  );

  const webDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../web");
  app.use("/", express.static(webDir));

  // 统一错误处理放在最后
  app.use(errorHandler(params.logger, { maxUploadMb: params.config.maxUploadMb }));

  return { app, detector, oracle };
}
