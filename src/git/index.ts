/**
 * Git module exports.
 */

export * from "./batch.js";
export * from "./collector.js";
export * from "./parser.js";
export * from "./runner.js";
