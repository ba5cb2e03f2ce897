/**
 * coverage-culprit library exports.
 *
 * This module exports the core types and functions for programmatic use.
 */

// Core pipeline, types and errors
export * from "./core/index.js";

// Git backend and diff extraction
export * from "./git/index.js";

// Coverage readers
export {
  detectCoverageFormat,
  loadCoverageGaps,
  parseCobertura,
  parseLcov,
  relativizeGaps,
  toRepoPath,
  type LoadCoverageOptions,
  type ParsedCoverage,
} from "./coverage/index.js";

// Renderers
export * from "./render/index.js";
