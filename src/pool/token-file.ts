import { readFile } from "fs/promises";
import { errorMessage, log } from "../utils/logger.js";

/**
 * Read session tokens from a text file: one per line, blank lines and
 * `#` comments ignored, duplicates dropped (first occurrence keeps its place).
 */
export async function readTokenFile(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    log.warn("[Tokens] Token file not readable", { file: filePath, error: errorMessage(err) });
    return [];
  }
  return parseTokenList(raw);
}

export function parseTokenList(raw: string): string[] {
  const seen = new Set<string>();
  for (const line of raw.split(/\r?\n/)) {
    const token = line.trim();
    if (!token || token.startsWith("#")) continue;
    seen.add(token);
  }
  return [...seen];
}
