/**
 * Batch reads of blobs through `git cat-file --batch`.
 */

import { GitCommandError } from "../core/errors.js";
import type { GitRunner } from "./runner.js";

/**
 * Parse `git cat-file --batch` output for the given request keys.
 *
 * Each object is "<oid> <type> <size>\n<content>\n"; a key that does not
 * resolve yields "<key> missing\n". Sizes are in bytes, so the output is
 * walked as a Buffer.
 */
export function parseCatFileBatch(
  keys: readonly string[],
  output: string | Buffer
): Map<string, string> {
  const stdout = Buffer.isBuffer(output) ? output : Buffer.from(output, "utf-8");
  const result = new Map<string, string>();

  let offset = 0;
  for (const key of keys) {
    if (offset >= stdout.length) break;

    const newline = stdout.indexOf("\n", offset);
    if (newline === -1) break;

    const header = stdout.subarray(offset, newline).toString("utf-8");
    offset = newline + 1;

    const fields = header.split(" ");
    const type = fields[1];
    const sizeField = fields[2];
    if (type === "missing" || type === "ambiguous" || sizeField === undefined) {
      continue;
    }

    const size = parseInt(sizeField, 10);
    if (Number.isNaN(size)) continue;

    if (type === "blob") {
      result.set(key, stdout.subarray(offset, offset + size).toString("utf-8"));
    }
    // Skip content plus the trailing newline
    offset += size + 1;
  }

  return result;
}

/**
 * Fetch file content at `ref` for many paths in one subprocess.
 * Paths absent at `ref` are absent from the returned map.
 */
export async function batchGetFileContent(
  run: GitRunner,
  paths: readonly string[],
  ref = "HEAD"
): Promise<Map<string, string>> {
  if (paths.length === 0) return new Map();

  const keys = paths.map((path) => `${ref}:${path}`);
  // cat-file --batch needs a newline after the last request
  const input = keys.join("\n") + "\n";

  const result = await run(["cat-file", "--batch"], { input, encoding: "buffer" });
  if (result.exitCode !== 0) {
    throw new GitCommandError("git cat-file --batch", result.stderr);
  }

  const byKey = parseCatFileBatch(keys, result.stdoutBytes ?? result.stdout);
  const byPath = new Map<string, string>();
  paths.forEach((path, i) => {
    const content = byKey.get(keys[i] ?? "");
    if (content !== undefined) byPath.set(path, content);
  });
  return byPath;
}
