import { VideoJob } from "../entities/video-job";

export type NewVideoJob = Omit<VideoJob, "id" | "createdAt" | "updatedAt">;

// Abstraction over where job records live (memory, MongoDB, ...)

export interface IVideoJobStore {
  create(job: NewVideoJob): Promise<VideoJob>;
  findById(id: string): Promise<VideoJob | null>;
  update(id: string, updates: Partial<VideoJob>): Promise<VideoJob | null>;
  findExpired(olderThan: Date): Promise<VideoJob[]>; // updatedAt < olderThan
  delete(id: string): Promise<boolean>;
}
