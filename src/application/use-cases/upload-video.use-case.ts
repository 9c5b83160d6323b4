import { VideoJob } from "../../domain/entities/video-job";
import { VideoInfo } from "../../domain/entities/video-info";
import { IVideoJobStore } from "../../domain/interfaces/ivideo-job.store";
import { IMediaProber } from "../../domain/interfaces/imedia.prober";
import { ProcessingError, ValidationError, errorMessage } from "../../domain/errors/app-error";
import {
  ALLOWED_VIDEO_EXTENSIONS,
  getExtension,
  isAllowedVideoFile,
  sanitizeFilename,
} from "../../domain/utils/upload-file.validator";
import { LocalFileStorage } from "../../infrastructure/storage/local-file.storage";
import { SweepExpiredJobsUseCase } from "./sweep-expired-jobs.use-case";

/**
 * The parts of a multer disk-storage file the use case relies on
 */
export interface UploadedVideoFile {
  originalname: string;
  path: string; // Where multer wrote the upload
  size: number;
}

export interface UploadVideoUseCaseParams {
  file: UploadedVideoFile;
}

export interface UploadVideoResult {
  job: VideoJob;
  info: VideoInfo;
}

export function invalidFileTypeMessage(allowed: readonly string[] = ALLOWED_VIDEO_EXTENSIONS): string {
  return `Invalid file type. Allowed: ${allowed.join(", ")}`;
}

export class UploadVideoUseCase {
  constructor(
    private videoJobStore: IVideoJobStore,
    private storage: LocalFileStorage,
    private prober: IMediaProber,
    private sweepExpiredJobsUseCase: SweepExpiredJobsUseCase,
    private allowedExtensions: readonly string[] = ALLOWED_VIDEO_EXTENSIONS
  ) {}

  /**
   * Runs the retention sweep. Called at the start of every upload request,
   * before the body is parsed, so rejected uploads sweep too. Never throws.
   */
  async sweepExpired(): Promise<void> {
    try {
      await this.sweepExpiredJobsUseCase.execute();
    } catch (error) {
      // An upload should not fail because old files could not be reclaimed
      console.error("[UploadVideoUseCase] Retention sweep failed:", error);
    }
  }

  async execute(params: UploadVideoUseCaseParams): Promise<UploadVideoResult> {
    const { file } = params;

    if (!file.originalname || file.size === 0) {
      await this.storage.remove(file.path);
      throw new ValidationError("No file selected");
    }

    if (!isAllowedVideoFile(file.originalname, this.allowedExtensions)) {
      await this.storage.remove(file.path);
      throw new ValidationError(invalidFileTypeMessage(this.allowedExtensions));
    }

    let filename = sanitizeFilename(file.originalname);
    if (!isAllowedVideoFile(filename, this.allowedExtensions)) {
      // Nothing usable survived sanitising, keep only the extension
      filename = `video.${getExtension(file.originalname)}`;
    }

    const job = await this.videoJobStore.create({
      filename,
      sourcePath: file.path,
      segments: [],
      status: "uploaded",
    });
    const sourcePath = this.storage.sourcePath(job.id, filename);

    try {
      await this.storage.moveInto(file.path, sourcePath);
      await this.videoJobStore.update(job.id, { sourcePath });

      const info = await this.prober.getVideoInfo(sourcePath);
      const updated = await this.videoJobStore.update(job.id, { info });

      console.log(
        `[UploadVideoUseCase] Stored job ${job.id} (${filename}, ${info.duration.toFixed(2)}s, ${info.sizeMb.toFixed(2)}MB)`
      );

      return { job: updated ?? { ...job, sourcePath, info }, info };
    } catch (error) {
      console.error(`[UploadVideoUseCase] Upload job ${job.id} failed:`, error);
      await this.storage.remove(file.path);
      await this.storage.remove(sourcePath);
      await this.videoJobStore.delete(job.id);
      if (error instanceof ProcessingError) {
        throw error;
      }
      throw new ProcessingError(errorMessage(error), { cause: error });
    }
  }
}
