import { randomUUID } from "crypto";
import { Collection, Db, UpdateFilter, WithId } from "mongodb";
import { VideoJob } from "../../../domain/entities/video-job";
import { IVideoJobStore, NewVideoJob } from "../../../domain/interfaces/ivideo-job.store";

const CLEARABLE_FIELDS = ["outputDir", "archivePath", "splitDuration", "info", "error"] as const;

type ClearableField = (typeof CLEARABLE_FIELDS)[number];

/**
 * Translates a partial job into a MongoDB update. The client runs with
 * `ignoreUndefined`, so a field explicitly set to undefined is cleared
 * through `$unset` instead of `$set`.
 */
export function buildJobUpdate(updates: Partial<VideoJob>, now: Date): UpdateFilter<VideoJob> {
  const { id: _ignored, createdAt: _created, ...changes } = updates;

  const unset: Partial<Record<ClearableField, "">> = {};
  for (const field of CLEARABLE_FIELDS) {
    if (field in changes && changes[field] === undefined) {
      unset[field] = "";
      delete changes[field];
    }
  }

  const update: UpdateFilter<VideoJob> = { $set: { ...changes, updatedAt: now } };
  if (Object.keys(unset).length > 0) {
    update.$unset = unset;
  }
  return update;
}

export class VideoJobRepository implements IVideoJobStore {
  private collection: Collection<VideoJob>;

  constructor(db: Db, collectionName: string = "videoJobs") {
    this.collection = db.collection<VideoJob>(collectionName);
  }

  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ id: 1 }, { unique: true });
    // Retention sweep scans by last modification
    await this.collection.createIndex({ updatedAt: 1 });
  }

  private toDomain(doc: WithId<VideoJob>): VideoJob {
    const { _id, ...job } = doc;
    return job;
  }

  async create(job: NewVideoJob): Promise<VideoJob> {
    const now = new Date();
    const doc: VideoJob = { ...job, id: randomUUID(), createdAt: now, updatedAt: now };
    // insertOne adds _id to the object it is given
    await this.collection.insertOne({ ...doc });
    return doc;
  }

  async findById(id: string): Promise<VideoJob | null> {
    const doc = await this.collection.findOne({ id });
    return doc ? this.toDomain(doc) : null;
  }

  async update(id: string, updates: Partial<VideoJob>): Promise<VideoJob | null> {
    const result = await this.collection.findOneAndUpdate({ id }, buildJobUpdate(updates, new Date()), {
      returnDocument: "after",
    });
    return result ? this.toDomain(result) : null;
  }

  async findExpired(olderThan: Date): Promise<VideoJob[]> {
    const docs = await this.collection.find({ updatedAt: { $lt: olderThan } }).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ id });
    return result.deletedCount > 0;
  }
}
