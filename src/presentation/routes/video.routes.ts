import { randomUUID } from "crypto";
import { Router } from "express";
import multer from "multer";
import { VideoController } from "../controllers/video.controller";
import { ValidationError } from "../../domain/errors/app-error";
import { ALLOWED_VIDEO_EXTENSIONS, isAllowedVideoFile } from "../../domain/utils/upload-file.validator";
import { invalidFileTypeMessage } from "../../application/use-cases/upload-video.use-case";

export interface VideoRoutesOptions {
  uploadDir: string;
  maxUploadSizeBytes: number;
  allowedExtensions?: readonly string[];
}

export function createVideoRoutes(videoController: VideoController, options: VideoRoutesOptions): Router {
  const allowedExtensions = options.allowedExtensions ?? ALLOWED_VIDEO_EXTENSIONS;

  const uploadVideo = multer({
    storage: multer.diskStorage({
      destination: options.uploadDir,
      // Renamed to <jobId>_<filename> once the job exists
      filename: (_req, _file, cb) => cb(null, `${randomUUID()}.upload`),
    }),
    limits: {
      fileSize: options.maxUploadSizeBytes,
      files: 1,
    },
    fileFilter: (_req, file, cb) => {
      // Parts with an empty filename never reach the filter, multer drops them
      if (isAllowedVideoFile(file.originalname, allowedExtensions)) {
        cb(null, true);
      } else {
        cb(new ValidationError(invalidFileTypeMessage(allowedExtensions)));
      }
    },
  });

  const router = Router();

  router.get("/", (req, res) => videoController.getStatus(req, res));

  router.get("/health", (req, res) => videoController.health(req, res));

  // Upload video and return probe info
  router.post(
    "/upload",
    (req, res, next) => videoController.sweepBeforeUpload(req, res, next),
    uploadVideo.single("video"),
    (req, res) => videoController.uploadVideo(req, res)
  );

  // Split an uploaded video into segments and zip them
  router.post("/split", (req, res) => videoController.splitVideo(req, res));

  // Download the zip of a split job
  router.get("/download/:jobId", (req, res) => videoController.downloadArchive(req, res));

  return router;
}
