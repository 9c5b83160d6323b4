import { Server } from "http";
import { config } from "./infrastructure/config/app.config";
import { connectToMongoDB, closeMongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { VideoJobRepository } from "./infrastructure/database/repositories/video-job.repository";
import { InMemoryVideoJobStore } from "./infrastructure/store/in-memory.video-job.store";
import { LocalFileStorage } from "./infrastructure/storage/local-file.storage";
import { FfprobeService } from "./infrastructure/video/ffprobe.service";
import { FfmpegSegmentExtractor } from "./infrastructure/video/ffmpeg-segment.extractor";
import { ZipArchiveService } from "./infrastructure/archive/zip-archive.service";
import { RetentionSweepCron } from "./infrastructure/cron/retention-sweep.cron";
import { IVideoJobStore } from "./domain/interfaces/ivideo-job.store";
import { SweepExpiredJobsUseCase } from "./application/use-cases/sweep-expired-jobs.use-case";
import { UploadVideoUseCase } from "./application/use-cases/upload-video.use-case";
import { SplitVideoUseCase } from "./application/use-cases/split-video.use-case";
import { GetArchiveUseCase } from "./application/use-cases/get-archive.use-case";
import { VideoController } from "./presentation/controllers/video.controller";
import { createApp } from "./app";

const SERVICE_NAME = "WhatsApp Reel Video Splitter API";
const SERVICE_VERSION = "1.0";

let server: Server | null = null;
let retentionSweepCron: RetentionSweepCron | null = null;

async function createJobStore(): Promise<IVideoJobStore> {
  if (config.jobStore === "mongodb") {
    const db = await connectToMongoDB(config.mongodb.uri, config.mongodb.dbName);
    const repository = new VideoJobRepository(db);
    await repository.ensureIndexes();
    return repository;
  }
  return new InMemoryVideoJobStore();
}

async function main() {
  try {
    // Initialize storage
    const storage = new LocalFileStorage(config.storage);
    await storage.ensureDirectories();
    const videoJobStore = await createJobStore();

    // Initialize infrastructure
    const prober = new FfprobeService(config.ffmpeg.ffprobePath);
    const extractor = new FfmpegSegmentExtractor(config.ffmpeg.ffmpegPath);
    const archiveBuilder = new ZipArchiveService();

    // Initialize use cases
    const sweepExpiredJobsUseCase = new SweepExpiredJobsUseCase(
      videoJobStore,
      storage,
      config.retention.maxAgeMs
    );
    const uploadVideoUseCase = new UploadVideoUseCase(
      videoJobStore,
      storage,
      prober,
      sweepExpiredJobsUseCase
    );
    const splitVideoUseCase = new SplitVideoUseCase(
      videoJobStore,
      storage,
      prober,
      extractor,
      archiveBuilder,
      {
        defaultDuration: config.split.defaultDuration,
        failurePolicy: config.split.failurePolicy,
      }
    );
    const getArchiveUseCase = new GetArchiveUseCase(videoJobStore, storage);

    // Initialize controllers
    const videoController = new VideoController(uploadVideoUseCase, splitVideoUseCase, getArchiveUseCase, {
      serviceName: SERVICE_NAME,
      version: SERVICE_VERSION,
      archiveDownloadName: config.split.archiveDownloadName,
    });

    const app = createApp(videoController, {
      uploadDir: storage.uploadDir,
      maxUploadSizeBytes: config.storage.maxUploadSizeBytes,
    });

    // Initialize and start cron job for the retention sweep
    retentionSweepCron = new RetentionSweepCron(sweepExpiredJobsUseCase, config.retention.cronSchedule);
    retentionSweepCron.start();

    // Start server
    server = app.listen(config.port, () => {
      console.log(`Reel splitter running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`Job store: ${config.jobStore}, uploads: ${storage.uploadDir}, outputs: ${storage.outputDir}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  retentionSweepCron?.stop();
  if (server) {
    await new Promise<void>((resolve) => server?.close(() => resolve()));
  }
  await closeMongoDBConnection();
  process.exit(0);
}

// Handle graceful shutdown
process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error) => {
    console.error("Error during shutdown:", error);
    process.exit(1);
  });
});

process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error) => {
    console.error("Error during shutdown:", error);
    process.exit(1);
  });
});

void main();
