/**
 * Terminal renderer with colors, tables, and source excerpts.
 * No emojis - plain text with color highlighting.
 */

import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";
import type { Analysis, BlameGroup, FileAnalysis } from "../core/types.js";
import { getTopCulprits } from "../core/assembler.js";
import { mostRecentChange } from "../core/sorting.js";

/**
 * Color scheme for terminal output.
 */
const colors = {
  // Culprit share
  shareHigh: chalk.red.bold,
  shareMedium: chalk.yellow.bold,
  shareLow: chalk.green.bold,

  // Source excerpts
  culprit: chalk.red,
  contextLine: chalk.dim,
  lineNumber: chalk.gray,

  // UI elements
  header: chalk.magenta.bold,
  subheader: chalk.cyan.bold,
  label: chalk.gray,
  value: chalk.white,
  muted: chalk.dim,
  warning: chalk.yellow,

  // Commit metadata
  commitId: chalk.yellow,
  author: chalk.cyan,
  path: chalk.blue,
};

/**
 * Unicode box-drawing characters for table rendering.
 */
const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

export interface TerminalRenderOptions {
  /** Number of files shown in the table and in detail */
  top?: number;
}

/**
 * Format a percentage with one decimal.
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function shareColor(percent: number): (text: string) => string {
  return percent >= 50
    ? colors.shareHigh
    : percent >= 20
      ? colors.shareMedium
      : colors.shareLow;
}

function sectionHeader(title: string): string {
  return `\n${colors.header(title)}\n${"─".repeat(50)}\n`;
}

function renderSummary(analysis: Analysis): string {
  const { parameters, scan } = analysis;
  const lines = [
    `${colors.label("Uncovered lines:")} ${colors.value(String(analysis.totalUncoveredLines))}`,
    `${colors.label("Culprit lines:")} ${colors.value(String(analysis.totalCulpritLines))} ` +
      shareColor(analysis.culpritPercentage)(`(${formatPercent(analysis.culpritPercentage)})`),
    `${colors.label("Files with culprits:")} ${colors.value(String(analysis.files.length))}`,
    `${colors.label("Lookback:")} ${parameters.days} days ${colors.muted(`(since ${parameters.since.slice(0, 10)})`)}`,
    `${colors.label("Commits scanned:")} ${scan.commitsScanned}` +
      (scan.commitsFailed > 0 ? colors.warning(` (${scan.commitsFailed} skipped)`) : ""),
  ];

  return boxen(lines.map((l) => `  ${l}`).join("\n"), {
    title: "Summary",
    titleAlignment: "left",
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: "cyan",
    borderStyle: "round",
  });
}

function renderTopTable(files: FileAnalysis[]): string {
  if (files.length === 0) return "";

  let output = sectionHeader("Top culprits");

  const table = new Table({
    head: [
      colors.label("File"),
      colors.label("Culprit"),
      colors.label("Uncovered"),
      colors.label("Share"),
      colors.label("Latest commit"),
    ],
    style: {
      head: [],
      border: ["dim"],
    },
    chars: TABLE_CHARS,
  });

  for (const file of files) {
    const latest = mostRecentChange(file.groups.map((g) => g.representative))?.commit;
    table.push([
      colors.path(file.file),
      String(file.culpritLines),
      String(file.uncoveredLines),
      shareColor(file.culpritPercentage)(formatPercent(file.culpritPercentage)),
      latest ? `${colors.commitId(latest.shortId)} ${colors.author(latest.author)}` : "-",
    ]);
  }

  output += table.toString() + "\n";
  return output;
}

function numbered(lineNumber: number, width: number, text: string): string {
  return `${colors.lineNumber(String(lineNumber).padStart(width))} │ ${text}`;
}

/**
 * Render one group as an excerpt: context dimmed, culprit lines in red,
 * other lines between culprits plain.
 */
export function renderGroup(group: BlameGroup): string {
  const { representative } = group;
  const commit = representative.commit;
  const culpritSet = new Set(group.lines);
  const firstContext = group.startLine - group.contextBefore.length;
  const width = String(group.endLine + group.contextAfter.length).length;

  const header =
    `${colors.subheader(`Lines ${group.startLine}-${group.endLine}`)} ` +
    `${colors.commitId(commit.shortId)} ${colors.author(commit.author)} ` +
    `${colors.muted(new Date(commit.timestamp * 1000).toISOString().slice(0, 10))} ` +
    `${colors.value(commit.message)}`;

  const lines: string[] = [header];
  if (group.commits.length > 1) {
    const others = group.commits
      .filter((c) => c.id !== commit.id)
      .map((c) => c.shortId)
      .join(", ");
    lines.push(colors.muted(`  also touched by ${others}`));
  }

  group.contextBefore.forEach((text, i) => {
    lines.push(numbered(firstContext + i, width, colors.contextLine(text)));
  });
  group.culpritText.forEach((text, i) => {
    const lineNumber = group.startLine + i;
    const styled = culpritSet.has(lineNumber) ? colors.culprit(text) : text;
    lines.push(numbered(lineNumber, width, styled));
  });
  group.contextAfter.forEach((text, i) => {
    lines.push(numbered(group.endLine + 1 + i, width, colors.contextLine(text)));
  });

  return lines.join("\n") + "\n";
}

function renderFileDetail(file: FileAnalysis): string {
  let output = sectionHeader(file.file);
  output += file.groups.map(renderGroup).join("\n");
  return output;
}

function renderSkipped(analysis: Analysis): string {
  const { scan } = analysis;
  if (scan.failures.length === 0 && scan.missingAtHead.length === 0) {
    return "";
  }

  let output = sectionHeader("Skipped");
  for (const failure of scan.failures) {
    output += `  ${colors.warning(failure.shortId)} ${colors.muted(`(${failure.kind})`)} ${failure.message.split("\n")[0] ?? ""}\n`;
  }
  for (const path of scan.missingAtHead) {
    output += `  ${colors.path(path)} ${colors.muted("(not present at HEAD)")}\n`;
  }
  return output;
}

/**
 * Render an Analysis for a terminal.
 */
export function renderTerminal(
  analysis: Analysis,
  options: TerminalRenderOptions = {}
): string {
  let output = "\n";
  output += renderSummary(analysis);
  output += "\n";

  if (analysis.files.length === 0) {
    output += "\n" + colors.muted("No uncovered lines were changed in the lookback window.") + "\n";
    output += renderSkipped(analysis);
    return output;
  }

  const top = getTopCulprits(analysis, options.top ?? 10);
  output += renderTopTable(top);

  for (const file of top) {
    output += renderFileDetail(file);
  }

  output += renderSkipped(analysis);
  return output;
}
