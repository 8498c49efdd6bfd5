/**
 * ArtifactCache: generated images on local disk, served back by locator.
 *
 * Names are `<jobId>-<variantIndex>.<ext>`; the extension comes from the
 * payload's magic bytes. Files are written to a temp name and renamed, so a
 * reader never sees a partial image. Retention is left to the operator.
 */

import { mkdir, readFile, readdir, rename, stat, unlink, writeFile } from "fs/promises";
import { resolve } from "path";
import { errorMessage, log } from "../utils/logger.js";

export const LOCATOR_PREFIX = "/images/";

const NAME_PATTERN = /^[A-Za-z0-9_-]+\.(jpg|png|webp|gif|bin)$/;

const CONTENT_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  bin: "application/octet-stream",
};

export interface ArtifactInfo {
  name: string;
  locator: string;
  size: number;
  createdAt: string;
}

export function sniffExtension(bytes: Buffer): string {
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "jpg";
  if (bytes.length >= 4 && bytes.subarray(0, 4).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47]))) return "png";
  if (bytes.length >= 12 && bytes.toString("ascii", 0, 4) === "RIFF" && bytes.toString("ascii", 8, 12) === "WEBP") {
    return "webp";
  }
  if (bytes.length >= 4 && bytes.toString("ascii", 0, 4) === "GIF8") return "gif";
  return "bin";
}

export function contentTypeFor(name: string): string {
  const ext = name.slice(name.lastIndexOf(".") + 1);
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}

/** Bare file name for a locator or name, or null if it could escape the cache directory. */
export function nameFromLocator(locator: string): string | null {
  const name = locator.startsWith(LOCATOR_PREFIX) ? locator.slice(LOCATOR_PREFIX.length) : locator;
  return NAME_PATTERN.test(name) ? name : null;
}

export class ArtifactCache {
  constructor(private readonly dir: string) {}

  async store(jobId: string, variantIndex: number, bytes: Buffer): Promise<string> {
    const name = `${jobId}-${variantIndex}.${sniffExtension(bytes)}`;
    if (!NAME_PATTERN.test(name)) throw new Error(`Invalid artifact name: ${name}`);

    await mkdir(this.dir, { recursive: true });
    const target = resolve(this.dir, name);
    const tmp = resolve(this.dir, `.${name}.${process.pid}.tmp`);
    await writeFile(tmp, bytes);
    await rename(tmp, target);

    log.debug("[Cache] Stored artifact", { name, kb: Math.round(bytes.length / 102.4) / 10 });
    return LOCATOR_PREFIX + name;
  }

  async retrieve(locator: string): Promise<Buffer | null> {
    const name = nameFromLocator(locator);
    if (!name) return null;
    try {
      return await readFile(resolve(this.dir, name));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /** Newest first. */
  async list(limit = 100): Promise<ArtifactInfo[]> {
    const entries: ArtifactInfo[] = [];
    for (const name of await this.names()) {
      try {
        const info = await stat(resolve(this.dir, name));
        entries.push({
          name,
          locator: LOCATOR_PREFIX + name,
          size: info.size,
          createdAt: info.mtime.toISOString(),
        });
      } catch (err) {
        // Removed between readdir and stat
        if (!isNotFound(err)) throw err;
      }
    }
    entries.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.name.localeCompare(b.name));
    return entries.slice(0, limit);
  }

  /** Delete every cached artifact. Returns the number removed. */
  async clear(): Promise<number> {
    let removed = 0;
    for (const name of await this.names()) {
      try {
        await unlink(resolve(this.dir, name));
        removed++;
      } catch (err) {
        log.warn("[Cache] Could not delete artifact", { name, error: errorMessage(err) });
      }
    }
    log.info("[Cache] Cleared artifacts", { removed });
    return removed;
  }

  private async names(): Promise<string[]> {
    try {
      return (await readdir(this.dir)).filter((n) => NAME_PATTERN.test(n));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
