/**
 * Core module exports.
 */

export * from "./analysis-runner.js";
export * from "./assembler.js";
export * from "./change-index.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./filters.js";
export * from "./grouper.js";
export * from "./intersect.js";
export * from "./pool.js";
export * from "./scanner.js";
export * from "./sorting.js";
export { configureLogger, getLoggerState, resetLogger } from "./logger.js";
export type * from "./types.js";
