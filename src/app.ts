import express, { Express } from "express";
import cors from "cors";
import { VideoController } from "./presentation/controllers/video.controller";
import { createVideoRoutes, VideoRoutesOptions } from "./presentation/routes/video.routes";
import { createErrorMiddleware, notFoundHandler } from "./presentation/middleware/error.middleware";

export function createApp(videoController: VideoController, options: VideoRoutesOptions): Express {
  const app = express();

  // Middleware
  // Enable CORS for all origins (mobile clients)
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use("/", createVideoRoutes(videoController, options));

  app.use(notFoundHandler);
  app.use(createErrorMiddleware(options.maxUploadSizeBytes));

  return app;
}
