import { IVideoJobStore } from "../../domain/interfaces/ivideo-job.store";
import { LocalFileStorage } from "../../infrastructure/storage/local-file.storage";
import { errorMessage } from "../../domain/errors/app-error";

export interface SweepExpiredJobsResult {
  jobsRemoved: number; // Job records deleted along with their files
  entriesRemoved: number; // Orphaned files/directories deleted by age
  errors: number;
}

export class SweepExpiredJobsUseCase {
  constructor(
    private videoJobStore: IVideoJobStore,
    private storage: LocalFileStorage,
    private maxAgeMs: number,
    private now: () => Date = () => new Date()
  ) {}

  async execute(): Promise<SweepExpiredJobsResult> {
    const cutoff = new Date(this.now().getTime() - this.maxAgeMs);
    const result: SweepExpiredJobsResult = { jobsRemoved: 0, entriesRemoved: 0, errors: 0 };

    const expiredJobs = await this.videoJobStore.findExpired(cutoff);
    for (const job of expiredJobs) {
      try {
        await this.storage.remove(job.sourcePath);
        await this.storage.remove(this.storage.segmentDir(job.id));
        await this.storage.remove(this.storage.archivePath(job.id));
        await this.videoJobStore.delete(job.id);
        result.jobsRemoved++;
      } catch (error) {
        result.errors++;
        console.error(`[SweepExpiredJobs] Failed to remove job ${job.id}: ${errorMessage(error)}`);
      }
    }

    // Files no record points at: crashed requests, or records lost on restart
    const stale = await this.storage.removeStaleEntries(cutoff, (name) => this.belongsToLiveJob(name));
    result.entriesRemoved = stale.removed;
    result.errors += stale.failed;

    if (result.jobsRemoved > 0 || result.entriesRemoved > 0 || result.errors > 0) {
      console.log(
        `[SweepExpiredJobs] Removed ${result.jobsRemoved} expired jobs and ${result.entriesRemoved} stale entries` +
          (result.errors > 0 ? ` (${result.errors} errors)` : "")
      );
    }

    return result;
  }

  private async belongsToLiveJob(name: string): Promise<boolean> {
    const jobId = LocalFileStorage.jobIdOf(name);
    return jobId !== null && (await this.videoJobStore.findById(jobId)) !== null;
  }
}
