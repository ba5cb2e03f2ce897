/**
 * Cobertura XML reader.
 */

import { XMLParser } from "fast-xml-parser";
import { LineTally, type ParsedCoverage } from "./types.js";

const ARRAY_TAGS = new Set(["package", "class", "line", "source"]);

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNode(value: unknown): XmlNode | undefined {
  return isNode(value) ? value : undefined;
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node ? asNode(node[name]) : undefined;
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim();
  const node = asNode(value);
  const text = node?.["#text"];
  return typeof text === "string" ? text.trim() : undefined;
}

/**
 * Classify one <line>. Gap iff hits == 0 and it is not a partially covered
 * branch line (branch-rate > 0).
 */
function isGap(line: XmlNode): boolean | undefined {
  const hits = Number(attr(line, "hits") ?? "0");
  if (Number.isNaN(hits)) return undefined;
  if (hits > 0) return false;
  const branchRate = Number(attr(line, "branch-rate") ?? "0");
  return !(branchRate > 0);
}

/**
 * Parse Cobertura XML into uncovered lines per `filename` attribute.
 * Line elements directly under each <class><lines> are read; several classes
 * sharing a file are merged.
 *
 * @throws Error when the document has no <coverage> root
 */
export function parseCobertura(xml: string): ParsedCoverage {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseAttributeValue: false,
    parseTagValue: false,
    isArray: (name, _jpath, _isLeaf, isAttribute) =>
      !isAttribute && ARRAY_TAGS.has(name),
  });

  const document: unknown = parser.parse(xml);
  const coverage = child(asNode(document), "coverage");
  if (!coverage) {
    throw new Error("missing <coverage> root element");
  }

  const sourceRoots = asList(child(coverage, "sources")?.["source"])
    .map(textOf)
    .filter((s): s is string => typeof s === "string" && s.length > 0);

  const tally = new LineTally();
  const packages = asList(child(coverage, "packages")?.["package"]);

  for (const pkg of packages) {
    const classes = asList(child(asNode(pkg), "classes")?.["class"]);
    for (const cls of classes) {
      const clsNode = asNode(cls);
      if (!clsNode) continue;
      const filename = attr(clsNode, "filename");
      if (!filename) continue;

      for (const entry of asList(child(clsNode, "lines")?.["line"])) {
        const line = asNode(entry);
        if (!line) continue;
        const number = parseInt(attr(line, "number") ?? "", 10);
        const gap = isGap(line);
        if (Number.isNaN(number) || number < 1 || gap === undefined) continue;
        tally.record(filename, number, !gap);
      }
    }
  }

  return { gaps: tally.gaps(), sourceRoots };
}
