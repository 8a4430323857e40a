import winston from "winston";

export type AppLogger = winston.Logger;

/**
 * 创建应用级 Logger（Winston）。
 *
 * 实现方式：
 * - 开发环境：控制台彩色输出 + 元数据 JSON；
 * - 生产环境：JSON 结构化输出；
 * - `silent` 用于测试，关闭全部输出。
 */
export function createAppLogger(opts?: { serviceName?: string; level?: string; silent?: boolean }): AppLogger {
  const serviceName = opts?.serviceName ?? "stylometric-detector";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    })
  );

  const consoleFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const metadata: unknown = info.metadata;
          const meta =
            metadata && typeof metadata === "object" && Object.keys(metadata).length
              ? ` ${JSON.stringify(metadata)}`
              : "";
          return `${String(info.timestamp)} ${info.level} [${serviceName}] ${String(info.message)}${meta}`;
        })
      );

  return winston.createLogger({
    level: opts?.level ?? process.env.LOG_LEVEL ?? (isProd ? "info" : "debug"),
    silent: opts?.silent ?? false,
    defaultMeta: { service: serviceName },
    format: baseFormat,
    transports: [new winston.transports.Console({ format: consoleFormat })],
  });
}
