/**
 * Shared source resolution utility.
 *
 * Detects whether a source string is raw JSON or a file path, and returns
 * the resolved text content.
 */

import fs from "node:fs/promises";
import path from "node:path";

export interface ResolvedSource {
  text: string;
  filePath?: string;
}

/**
 * Resolve a source string to JSON text.
 *
 * If the source starts with "{" or "[", it's treated as raw JSON.
 * Otherwise, it's treated as a file path and read from disk.
 */
export async function resolveSource(source: string): Promise<ResolvedSource> {
  const trimmed = source.trimStart();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return { text: source };
  }

  const filePath = path.resolve(source);
  const text = await fs.readFile(filePath, "utf-8");
  return { text, filePath };
}
