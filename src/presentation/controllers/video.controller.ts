import { NextFunction, Request, Response } from "express";
import { UploadVideoUseCase } from "../../application/use-cases/upload-video.use-case";
import { SplitVideoUseCase } from "../../application/use-cases/split-video.use-case";
import { GetArchiveUseCase } from "../../application/use-cases/get-archive.use-case";
import { isAppError, errorMessage } from "../../domain/errors/app-error";
import { toUploadVideoResponse } from "../dto/upload-video.dto";
import { SplitVideoRequest, toSplitVideoResponse } from "../dto/split-video.dto";
import { ErrorResponse, HealthResponse, ServiceStatusResponse } from "../dto/service-status.dto";

export interface VideoControllerOptions {
  serviceName: string;
  version: string;
  archiveDownloadName: string;
}

export class VideoController {
  constructor(
    private uploadVideoUseCase: UploadVideoUseCase,
    private splitVideoUseCase: SplitVideoUseCase,
    private getArchiveUseCase: GetArchiveUseCase,
    private options: VideoControllerOptions
  ) {}

  getStatus(_req: Request, res: Response): void {
    const response: ServiceStatusResponse = {
      status: "online",
      service: this.options.serviceName,
      version: this.options.version,
      endpoints: {
        "POST /upload": "Upload and get video info",
        "POST /split": "Split video into reels",
        "GET /download/<job_id>": "Download zip file",
        "GET /health": "Health check",
      },
    };
    res.json(response);
  }

  health(_req: Request, res: Response): void {
    const response: HealthResponse = { status: "healthy" };
    res.status(200).json(response);
  }

  async sweepBeforeUpload(_req: Request, _res: Response, next: NextFunction): Promise<void> {
    await this.uploadVideoUseCase.sweepExpired();
    next();
  }

  async uploadVideo(req: Request, res: Response): Promise<void> {
    try {
      if (!req.file) {
        res.status(400).json({ error: "No video file provided" });
        return;
      }

      const { job, info } = await this.uploadVideoUseCase.execute({ file: req.file });

      res.status(200).json(toUploadVideoResponse(job.id, job.filename, info));
    } catch (error) {
      this.sendError(res, error, "Failed to process video");
    }
  }

  async splitVideo(req: Request, res: Response): Promise<void> {
    try {
      const body: SplitVideoRequest = typeof req.body === "object" && req.body !== null ? req.body : {};
      const { job_id: jobId, split_duration: splitDuration } = body;

      if (!jobId || typeof jobId !== "string") {
        res.status(400).json({ error: "job_id required" });
        return;
      }

      if (
        splitDuration !== undefined &&
        splitDuration !== null &&
        (typeof splitDuration !== "number" || !Number.isFinite(splitDuration) || splitDuration <= 0)
      ) {
        res.status(400).json({ error: "split_duration must be a positive number" });
        return;
      }

      const result = await this.splitVideoUseCase.execute({
        jobId,
        splitDuration: typeof splitDuration === "number" ? splitDuration : undefined,
      });

      res.status(200).json(toSplitVideoResponse(result.job.id, result.segments, result.archiveSizeBytes));
    } catch (error) {
      this.sendError(res, error, "Failed to split video");
    }
  }

  async downloadArchive(req: Request, res: Response): Promise<void> {
    try {
      const archive = await this.getArchiveUseCase.execute(req.params.jobId);

      res.download(archive.path, this.options.archiveDownloadName, (error) => {
        if (!error) {
          return;
        }
        console.error(`[VideoController] Failed to send archive for job ${archive.jobId}:`, error);
        if (!res.headersSent) {
          res.status(404).json({ error: "File not found or expired" });
        }
      });
    } catch (error) {
      this.sendError(res, error, "Failed to download archive");
    }
  }

  /**
   * Client errors keep their message; server errors are prefixed with what
   * the request was trying to do
   */
  private sendError(res: Response, error: unknown, failurePrefix: string): void {
    const statusCode = isAppError(error) ? error.statusCode : 500;
    const body: ErrorResponse = { error: errorMessage(error) };
    if (statusCode >= 500) {
      console.error(`[VideoController] ${failurePrefix}:`, error);
      body.error = `${failurePrefix}: ${body.error}`;
    }
    res.status(statusCode).json(body);
  }
}
