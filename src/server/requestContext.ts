import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { AppLogger } from "../logger/index.js";

export type RequestContext = {
  requestId: string;
  startedAt: number;
};

declare module "express-serve-static-core" {
  interface Request {
    ctx?: RequestContext;
    log?: AppLogger;
  }
}

/**
 * 注入请求上下文与链路日志。
 *
 * - `requestId` 取自 `x-request-id`，没有则生成 UUID，并回写到响应头；
 * - `req.log` 是携带 requestId 的 child logger；
 * - 响应结束时记录状态码与耗时。
 */
export function requestContextMiddleware(baseLogger: AppLogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id")?.trim() || randomUUID();
    const log = baseLogger.child({ requestId });
    req.ctx = { requestId, startedAt: Date.now() };
    req.log = log;
    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      log.debug("Request completed", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - (req.ctx?.startedAt ?? Date.now()),
      });
    });
    next();
  };
}
