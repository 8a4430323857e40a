import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  MAX_UPLOAD_MB: z.coerce.number().positive().max(100).default(5),
  MAX_BATCH_SIZE: z.coerce.number().int().min(1).max(10000).default(500),
});

export type AppConfig = {
  env: string;
  port: number;
  maxUploadMb: number;
  maxBatchSize: number;
};

/** 从环境变量读取服务配置；非法取值直接抛出 ZodError，启动即失败 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    maxBatchSize: parsed.MAX_BATCH_SIZE,
  };
}
