import { randomUUID } from "crypto";
import { VideoJob } from "../../domain/entities/video-job";
import { IVideoJobStore, NewVideoJob } from "../../domain/interfaces/ivideo-job.store";

function clone(job: VideoJob): VideoJob {
  return { ...job, segments: job.segments.map((segment) => ({ ...segment })) };
}

/**
 * Process-local job store. Records are lost on restart; the retention
 * sweep removes the files they leave behind once they age out.
 */
export class InMemoryVideoJobStore implements IVideoJobStore {
  private jobs = new Map<string, VideoJob>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(job: NewVideoJob): Promise<VideoJob> {
    const timestamp = this.now();
    const created: VideoJob = {
      ...job,
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.jobs.set(created.id, created);
    return clone(created);
  }

  async findById(id: string): Promise<VideoJob | null> {
    const job = this.jobs.get(id);
    return job ? clone(job) : null;
  }

  async update(id: string, updates: Partial<VideoJob>): Promise<VideoJob | null> {
    const existing = this.jobs.get(id);
    if (!existing) {
      return null;
    }
    const { id: _ignored, createdAt: _created, ...changes } = updates;
    const updated: VideoJob = { ...existing, ...changes, updatedAt: this.now() };
    this.jobs.set(id, updated);
    return clone(updated);
  }

  async findExpired(olderThan: Date): Promise<VideoJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.updatedAt.getTime() < olderThan.getTime())
      .map(clone);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }
}
