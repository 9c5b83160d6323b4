import { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { isAppError, errorMessage } from "../../domain/errors/app-error";

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function createErrorMiddleware(maxUploadSizeBytes: number): ErrorRequestHandler {
  return (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof multer.MulterError) {
      const message =
        err.code === "LIMIT_FILE_SIZE"
          ? `File too large. Maximum size is ${Math.round(maxUploadSizeBytes / (1024 * 1024))}MB`
          : err.code === "LIMIT_UNEXPECTED_FILE"
            ? "No video file provided"
            : err.message;
      res.status(400).json({ error: message });
      return;
    }

    if (isAppError(err)) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    // body-parser marks malformed JSON and oversized bodies with a 4xx status
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: status === 400 ? "Invalid request body" : errorMessage(err) });
      return;
    }

    console.error("Error:", err);
    res.status(500).json({ error: errorMessage(err) || "Internal server error" });
  };
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Not found" });
};
