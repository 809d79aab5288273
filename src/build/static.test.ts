import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { copyStaticTree } from "./static";

describe("copyStaticTree", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pressmark-static-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("replaces the destination with a copy of the source", async () => {
    const source = join(dir, "static");
    const destination = join(dir, "output", "static");
    await mkdir(join(source, "css"), { recursive: true });
    await writeFile(join(source, "css", "site.css"), "body{}");
    await mkdir(destination, { recursive: true });
    await writeFile(join(destination, "stale.txt"), "old");

    expect(await copyStaticTree(source, destination)).toBe(true);
    expect(await readdir(destination)).toEqual(["css"]);
    expect(await readFile(join(destination, "css", "site.css"), "utf-8")).toBe("body{}");
  });

  it("leaves the destination alone when the source is missing", async () => {
    const destination = join(dir, "output", "static");
    await mkdir(destination, { recursive: true });
    await writeFile(join(destination, "keep.txt"), "keep");

    expect(await copyStaticTree(join(dir, "missing"), destination)).toBe(false);
    expect(await readdir(destination)).toEqual(["keep.txt"]);
  });
});
