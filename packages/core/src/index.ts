export * from "./types/transcript";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export * from "./errors";
export * from "./config";
export { createLogger, isLogLevel } from "./logger";
export type { Logger, LogLevel } from "./logger";
