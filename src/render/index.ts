/**
 * Renderer exports.
 */

export { renderJson, type JsonRenderOptions } from "./json.js";
export {
  formatPercent,
  renderGroup,
  renderTerminal,
  type TerminalRenderOptions,
} from "./terminal.js";
