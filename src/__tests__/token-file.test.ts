import { describe, it, expect, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import { parseTokenList, readTokenFile } from "../pool/token-file.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("parseTokenList", () => {
  it("skips blanks and comments, trims, and keeps the first of duplicates", () => {
    const raw = "# pool\n tok-a \n\ntok-b\r\n#tok-c\ntok-a\n";
    expect(parseTokenList(raw)).toEqual(["tok-a", "tok-b"]);
  });
});

describe("readTokenFile", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await removeDir(dir);
  });

  it("reads tokens from disk", async () => {
    dir = await makeTempDir();
    const file = join(dir, "tokens.txt");
    await writeFile(file, "tok-1\ntok-2\n", "utf-8");
    expect(await readTokenFile(file)).toEqual(["tok-1", "tok-2"]);
  });

  it("returns an empty list when the file is missing", async () => {
    dir = await makeTempDir();
    expect(await readTokenFile(join(dir, "absent.txt"))).toEqual([]);
  });
});
