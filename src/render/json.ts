/**
 * JSON renderer.
 */

import type { Analysis } from "../core/types.js";

export interface JsonRenderOptions {
  /** Indentation; 0 for a single line */
  indent?: number;
}

/**
 * Render an Analysis as JSON. Key order follows the Analysis shape, so equal
 * analyses render to identical text.
 */
export function renderJson(
  analysis: Analysis,
  options: JsonRenderOptions = {}
): string {
  const indent = options.indent ?? 2;
  return JSON.stringify(analysis, null, indent > 0 ? indent : undefined);
}
