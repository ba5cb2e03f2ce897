import { LineTally, type ParsedCoverage } from "./types.js";

/**
 * Parse an LCOV report into uncovered lines per file.
 *
 * LCOV record structure:
 *   SF:<source file>
 *   DA:<line number>,<execution count>[,<checksum>]
 *   end_of_record
 *
 * A line with execution count 0 is a gap unless another record for the same
 * file reports it hit.
 */
export function parseLcov(content: string): ParsedCoverage {
  const tally = new LineTally();

  for (const record of content.split("end_of_record")) {
    const trimmed = record.trim();
    if (!trimmed) continue;

    let file: string | null = null;

    for (const raw of trimmed.split("\n")) {
      const line = raw.trim();
      if (line.startsWith("SF:")) {
        file = line.slice(3).trim();
      } else if (line.startsWith("DA:") && file) {
        const [lineStr, countStr] = line.slice(3).split(",");
        if (lineStr === undefined || countStr === undefined) continue;

        const lineNumber = parseInt(lineStr, 10);
        const count = parseInt(countStr, 10);
        if (Number.isNaN(lineNumber) || lineNumber < 1 || Number.isNaN(count)) {
          continue;
        }
        tally.record(file, lineNumber, count > 0);
      }
    }
  }

  return { gaps: tally.gaps(), sourceRoots: [] };
}
