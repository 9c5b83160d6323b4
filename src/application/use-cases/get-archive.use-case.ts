import { IVideoJobStore } from "../../domain/interfaces/ivideo-job.store";
import { NotFoundError } from "../../domain/errors/app-error";
import { LocalFileStorage } from "../../infrastructure/storage/local-file.storage";

export interface ArchiveLocation {
  jobId: string;
  path: string;
}

export class GetArchiveUseCase {
  constructor(
    private videoJobStore: IVideoJobStore,
    private storage: LocalFileStorage
  ) {}

  async execute(jobId: string): Promise<ArchiveLocation> {
    const job = await this.videoJobStore.findById(jobId);
    if (!job || !job.archivePath || !(await this.storage.exists(job.archivePath))) {
      throw new NotFoundError("File not found or expired");
    }
    return { jobId: job.id, path: job.archivePath };
  }
}
