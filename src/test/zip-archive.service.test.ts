import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import JSZip from "jszip";
import { ZipArchiveService } from "../infrastructure/archive/zip-archive.service";
import { ProcessingError } from "../domain/errors/app-error";
import { makeTempDir, removeDir } from "./helpers/fakes";

describe("ZipArchiveService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("zips matching files flat, in name order, with DEFLATE", async () => {
    const segments = join(dir, "job");
    await mkdir(join(segments, "nested"), { recursive: true });
    await writeFile(join(segments, "reel_02.mp4"), "second");
    await writeFile(join(segments, "reel_01.mp4"), "first");
    await writeFile(join(segments, "notes.txt"), "ignored");
    await writeFile(join(segments, "nested", "reel_03.mp4"), "ignored too");

    const target = join(dir, "job.zip");
    const result = await new ZipArchiveService().build(segments, target, ".mp4");

    expect(result.entries).toEqual(["reel_01.mp4", "reel_02.mp4"]);
    expect(result.path).toBe(target);

    const buffer = await readFile(target);
    expect(result.sizeBytes).toBe(buffer.length);

    const zip = await JSZip.loadAsync(buffer);
    expect(Object.keys(zip.files).sort()).toEqual(["reel_01.mp4", "reel_02.mp4"]);
    await expect(zip.file("reel_01.mp4")?.async("string")).resolves.toBe("first");
  });

  it("wraps file system failures", async () => {
    await expect(
      new ZipArchiveService().build(join(dir, "absent"), join(dir, "x.zip"), ".mp4")
    ).rejects.toBeInstanceOf(ProcessingError);
  });
});
