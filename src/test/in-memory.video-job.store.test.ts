import { describe, it, expect } from "vitest";
import { InMemoryVideoJobStore } from "../infrastructure/store/in-memory.video-job.store";
import { NewVideoJob } from "../domain/interfaces/ivideo-job.store";

const newJob: NewVideoJob = { filename: "a.mp4", sourcePath: "/uploads/a.mp4", segments: [], status: "uploaded" };

describe("InMemoryVideoJobStore", () => {
  it("assigns ids and timestamps on create", async () => {
    const at = new Date("2026-01-01T10:00:00Z");
    const store = new InMemoryVideoJobStore(() => at);

    const job = await store.create(newJob);

    expect(job.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(job.createdAt).toEqual(at);
    expect(job.updatedAt).toEqual(at);
    expect(await store.findById(job.id)).toEqual(job);
  });

  it("bumps updatedAt but never id or createdAt on update", async () => {
    let now = new Date("2026-01-01T10:00:00Z");
    const store = new InMemoryVideoJobStore(() => now);
    const job = await store.create(newJob);

    now = new Date("2026-01-01T10:30:00Z");
    const updated = await store.update(job.id, {
      id: "other",
      createdAt: new Date(0),
      status: "split",
    });

    expect(updated).toMatchObject({ id: job.id, createdAt: job.createdAt, updatedAt: now, status: "split" });
    expect(await store.update("missing", { status: "failed" })).toBeNull();
  });

  it("hands out copies", async () => {
    const store = new InMemoryVideoJobStore();
    const job = await store.create(newJob);

    job.segments.push({ number: 1, filename: "reel_01.mp4", start: 0, end: 30, duration: 30, sizeMb: 1 });

    expect((await store.findById(job.id))?.segments).toEqual([]);
  });

  it("lists jobs last modified before the cutoff", async () => {
    let now = new Date("2026-01-01T10:00:00Z");
    const store = new InMemoryVideoJobStore(() => now);
    const old = await store.create(newJob);
    now = new Date("2026-01-01T11:00:00Z");
    await store.create(newJob);

    const expired = await store.findExpired(new Date("2026-01-01T10:30:00Z"));

    expect(expired.map((job) => job.id)).toEqual([old.id]);
    expect(await store.delete(old.id)).toBe(true);
    expect(await store.delete(old.id)).toBe(false);
  });
});
