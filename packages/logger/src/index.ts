export { createLogger } from "./create-logger.js";
export type { Logger } from "pino";
