import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, readdir, utimes, writeFile } from "fs/promises";
import { join } from "path";
import { SweepExpiredJobsUseCase } from "../application/use-cases/sweep-expired-jobs.use-case";
import { InMemoryVideoJobStore } from "../infrastructure/store/in-memory.video-job.store";
import { LocalFileStorage } from "../infrastructure/storage/local-file.storage";
import { makeTempDir, removeDir } from "./helpers/fakes";

const HOUR_MS = 60 * 60 * 1000;

describe("SweepExpiredJobsUseCase", () => {
  let dir: string;
  let storage: LocalFileStorage;
  let clock: Date;
  let store: InMemoryVideoJobStore;
  let sweep: SweepExpiredJobsUseCase;

  async function createJobWithFiles(): Promise<string> {
    const job = await store.create({ filename: "a.mp4", sourcePath: "", segments: [], status: "uploaded" });
    const sourcePath = storage.sourcePath(job.id, "a.mp4");
    await writeFile(sourcePath, "video");
    await mkdir(storage.segmentDir(job.id));
    await writeFile(join(storage.segmentDir(job.id), "reel_01.mp4"), "segment");
    await writeFile(storage.archivePath(job.id), "zip");
    await store.update(job.id, { sourcePath, archivePath: storage.archivePath(job.id) });
    return job.id;
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    dir = await makeTempDir();
    storage = new LocalFileStorage({ uploadDir: join(dir, "uploads"), outputDir: join(dir, "outputs") });
    await storage.ensureDirectories();
    clock = new Date();
    store = new InMemoryVideoJobStore(() => clock);
    sweep = new SweepExpiredJobsUseCase(store, storage, HOUR_MS, () => clock);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("keeps jobs modified within the retention window", async () => {
    const jobId = await createJobWithFiles();
    clock = new Date(clock.getTime() + HOUR_MS - 1000);

    const result = await sweep.execute();

    expect(result).toEqual({ jobsRemoved: 0, entriesRemoved: 0, errors: 0 });
    expect(await store.findById(jobId)).not.toBeNull();
    expect(await readdir(storage.outputDir)).toHaveLength(2);
  });

  it("removes expired jobs with their source, segments and archive", async () => {
    const jobId = await createJobWithFiles();
    clock = new Date(clock.getTime() + HOUR_MS + 1000);

    const result = await sweep.execute();

    expect(result.jobsRemoved).toBe(1);
    expect(await store.findById(jobId)).toBeNull();
    expect(await readdir(storage.uploadDir)).toEqual([]);
    expect(await readdir(storage.outputDir)).toEqual([]);
  });

  it("measures retention from the last modification", async () => {
    const jobId = await createJobWithFiles();
    clock = new Date(clock.getTime() + 50 * 60 * 1000);
    await store.update(jobId, { status: "split" });
    clock = new Date(clock.getTime() + 50 * 60 * 1000);

    const result = await sweep.execute();

    expect(result).toEqual({ jobsRemoved: 0, entriesRemoved: 0, errors: 0 });
    expect(await store.findById(jobId)).not.toBeNull();
  });

  it("never deletes files of a live job by age alone", async () => {
    const jobId = await createJobWithFiles();
    const twoHoursAgo = new Date(clock.getTime() - 2 * HOUR_MS);
    await utimes(storage.sourcePath(jobId, "a.mp4"), twoHoursAgo, twoHoursAgo);
    await utimes(storage.archivePath(jobId), twoHoursAgo, twoHoursAgo);

    const result = await sweep.execute();

    expect(result.entriesRemoved).toBe(0);
    expect(await readdir(storage.uploadDir)).toEqual([`${jobId}_a.mp4`]);
    expect((await readdir(storage.outputDir)).sort()).toEqual([jobId, `${jobId}.zip`].sort());
  });

  it("deletes orphaned entries older than the threshold", async () => {
    const oldFile = join(storage.uploadDir, "orphan_upload.mp4");
    const oldDir = join(storage.outputDir, "orphan-job");
    const freshFile = join(storage.uploadDir, "fresh.upload");
    await writeFile(oldFile, "x");
    await mkdir(oldDir);
    await writeFile(freshFile, "y");

    const twoHoursAgo = new Date(clock.getTime() - 2 * HOUR_MS);
    await utimes(oldFile, twoHoursAgo, twoHoursAgo);
    await utimes(oldDir, twoHoursAgo, twoHoursAgo);

    const result = await sweep.execute();

    expect(result).toEqual({ jobsRemoved: 0, entriesRemoved: 2, errors: 0 });
    expect(await readdir(storage.uploadDir)).toEqual(["fresh.upload"]);
    expect(await readdir(storage.outputDir)).toEqual([]);
  });
});
