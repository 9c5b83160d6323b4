import { join } from "path";
import { Segment } from "../../domain/entities/segment";
import { VideoJob } from "../../domain/entities/video-job";
import { IVideoJobStore } from "../../domain/interfaces/ivideo-job.store";
import { IMediaProber } from "../../domain/interfaces/imedia.prober";
import { ISegmentExtractor } from "../../domain/interfaces/isegment.extractor";
import { IArchiveBuilder } from "../../domain/interfaces/iarchive.builder";
import {
  AppError,
  ConflictError,
  NotFoundError,
  ProcessingError,
  ValidationError,
  errorMessage,
} from "../../domain/errors/app-error";
import { SegmentFailurePolicy } from "../../domain/enums/segment-failure.policy";
import { planSegments, segmentFilename } from "../../domain/utils/segment-plan";
import { LocalFileStorage } from "../../infrastructure/storage/local-file.storage";

const BYTES_PER_MB = 1024 * 1024;
const SEGMENT_EXTENSION = ".mp4";

export interface SplitVideoOptions {
  defaultDuration: number; // seconds
  failurePolicy: SegmentFailurePolicy;
}

export interface SplitVideoUseCaseParams {
  jobId: string;
  splitDuration?: number;
}

export interface SplitVideoResult {
  job: VideoJob;
  segments: Segment[];
  archiveSizeBytes: number;
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class SplitVideoUseCase {
  constructor(
    private videoJobStore: IVideoJobStore,
    private storage: LocalFileStorage,
    private prober: IMediaProber,
    private extractor: ISegmentExtractor,
    private archiveBuilder: IArchiveBuilder,
    private options: SplitVideoOptions
  ) {}

  // Jobs with a split running in this process, claimed before the first await
  private inFlight = new Set<string>();

  async execute(params: SplitVideoUseCaseParams): Promise<SplitVideoResult> {
    const splitDuration = params.splitDuration ?? this.options.defaultDuration;
    if (!Number.isFinite(splitDuration) || splitDuration <= 0) {
      throw new ValidationError("split_duration must be a positive number");
    }

    if (this.inFlight.has(params.jobId)) {
      throw new ConflictError("Video is already being split");
    }
    this.inFlight.add(params.jobId);

    try {
      return await this.split(params.jobId, splitDuration);
    } finally {
      this.inFlight.delete(params.jobId);
    }
  }

  private async split(jobId: string, splitDuration: number): Promise<SplitVideoResult> {
    const job = await this.videoJobStore.findById(jobId);
    if (!job || !(await this.storage.exists(job.sourcePath))) {
      throw new NotFoundError("Video not found. Please upload again.");
    }

    // Another instance sharing the store may hold the job
    if (job.status === "splitting") {
      throw new ConflictError("Video is already being split");
    }

    await this.videoJobStore.update(job.id, { status: "splitting", error: undefined });

    try {
      const segments = await this.extractSegments(job, splitDuration);

      const archive = await this.archiveBuilder.build(
        this.storage.segmentDir(job.id),
        this.storage.archivePath(job.id),
        SEGMENT_EXTENSION
      );

      const updated = await this.videoJobStore.update(job.id, {
        status: "split",
        segments,
        splitDuration,
        outputDir: this.storage.segmentDir(job.id),
        archivePath: archive.path,
      });

      console.log(
        `[SplitVideoUseCase] Job ${job.id}: ${segments.length} segments of ${splitDuration}s, archive ${archive.sizeBytes} bytes`
      );

      return {
        job: updated ?? { ...job, status: "split", segments, splitDuration, archivePath: archive.path },
        segments,
        archiveSizeBytes: archive.sizeBytes,
      };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[SplitVideoUseCase] Job ${job.id} failed: ${message}`);
      await this.videoJobStore.update(job.id, { status: "failed", error: message });
      if (error instanceof AppError) {
        throw error;
      }
      throw new ProcessingError(message, { cause: error });
    }
  }

  private async extractSegments(job: VideoJob, splitDuration: number): Promise<Segment[]> {
    const totalDuration = await this.prober.getDuration(job.sourcePath);
    const plan = planSegments(totalDuration, splitDuration);
    if (plan.length === 0) {
      throw new ProcessingError("Video has no playable duration");
    }

    // Old segments and archive must not leak into this split's result
    const outputDir = await this.storage.resetSegmentDir(job.id);
    await this.storage.remove(this.storage.archivePath(job.id));

    const segments: Segment[] = [];
    for (const planned of plan) {
      const filename = segmentFilename(planned.index);
      const outputPath = join(outputDir, filename);
      const result = await this.extractor.extract({
        sourcePath: job.sourcePath,
        outputPath,
        start: planned.start,
        duration: planned.duration,
      });

      if (!result.success) {
        const reason = `Segment ${planned.index + 1} of ${plan.length} failed: ${result.error ?? "unknown error"}`;
        if (this.options.failurePolicy === "abort") {
          throw new ProcessingError(reason);
        }
        console.warn(`[SplitVideoUseCase] Job ${job.id}: ${reason}, skipping`);
        await this.storage.remove(outputPath);
        continue;
      }

      const sizeBytes = await this.storage.sizeOf(outputPath);
      segments.push({
        number: planned.index + 1,
        filename,
        start: planned.start,
        end: planned.end,
        duration: planned.duration,
        sizeMb: roundTo2(sizeBytes / BYTES_PER_MB),
      });
    }

    if (segments.length === 0) {
      throw new ProcessingError("No segments could be extracted");
    }

    return segments;
  }
}
