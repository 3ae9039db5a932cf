export * from "./services/bids";
export * from "./utils/bidsPaths";
export * from "./utils/ingestErrors";
export * from "./lib/schemas";
export * from "./lib/constants";
export { createLogger, loggers } from "./lib/logger";
export type { Logger, LogContext, LogLevel } from "./lib/logger";
export type * from "./types/bids";
export type * from "./types/recording";
