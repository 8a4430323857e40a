import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * 让路由可以直接写 async 函数，rejected promise 交给统一错误处理中间件。
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
