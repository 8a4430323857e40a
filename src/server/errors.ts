import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import type { AppLogger } from "../logger/index.js";

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.status = status;
    this.code = code;
  }
}

/**
 * 统一错误响应：`{ ok: false, error: { code, message, requestId } }`。
 * 日志记录完整堆栈，响应里不回传原文或堆栈。
 */
export function errorHandler(baseLogger: AppLogger, opts: { maxUploadMb: number }) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const log = req.log ?? baseLogger;

    const httpErr = normalizeToHttpError(err, opts.maxUploadMb);

    const details =
      err instanceof Error
        ? { name: err.name, message: err.message, stack: err.stack }
        : { err };

    const level = httpErr.status >= 500 ? "error" : "warn";
    log.log(level, "Request failed: %s", httpErr.message, {
      status: httpErr.status,
      code: httpErr.code,
      path: req.path,
      method: req.method,
      ...details,
    });

    res.status(httpErr.status).json({
      ok: false,
      error: {
        code: httpErr.code,
        message: httpErr.message,
        requestId: req.ctx?.requestId,
      },
    });
  };
}

function normalizeToHttpError(err: unknown, maxUploadMb: number): HttpError {
  if (err instanceof HttpError) return err;

  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      return new HttpError(413, "UPLOAD_TOO_LARGE", `Upload too large: at most ${maxUploadMb}MB`);
    }
    return new HttpError(400, "INVALID_UPLOAD", err.message);
  }

  if (err instanceof ZodError) {
    return new HttpError(400, "INVALID_REQUEST", "Invalid request body");
  }

  // express.json() 的 JSON 语法错误
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return new HttpError(400, "INVALID_JSON", "Request body is not valid JSON");
  }

  return new HttpError(500, "INTERNAL_ERROR", "Internal server error");
}
