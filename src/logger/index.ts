export { createAppLogger, type AppLogger } from "./logger.js";
