import "dotenv/config";
import { loadAppConfig } from "./config.js";
import { createOracleFromEnv } from "./llm/oracle.js";
import { createAppLogger } from "./logger/index.js";
import { createApp } from "./server/app.js";

/**
 * 应用入口：只负责装配 logger、配置与 server。
 */
async function main() {
  const logger = createAppLogger({ serviceName: "stylometric-detector" });
  const config = loadAppConfig();
  const oracle = createOracleFromEnv(logger);
  const { app } = createApp({ logger, config, oracle });

  app.listen(config.port, () => {
    logger.info("Server started", { port: config.port, env: config.env, oracle: oracle.name });
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
