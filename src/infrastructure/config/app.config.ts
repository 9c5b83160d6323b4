/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { SegmentFailurePolicies, SegmentFailurePolicy } from "../../domain/enums/segment-failure.policy";
import { JobStoreTypes, JobStoreType } from "../../domain/enums/job-store.type";

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  // Server
  port: number;

  // Local storage
  storage: {
    uploadDir: string;
    outputDir: string;
    maxUploadSizeBytes: number;
  };

  // Retention sweep
  retention: {
    maxAgeMs: number; // Jobs and files untouched for longer are deleted
    cronSchedule: string;
  };

  // Splitting
  split: {
    defaultDuration: number; // seconds
    failurePolicy: SegmentFailurePolicy;
    archiveDownloadName: string;
  };

  // External binaries
  ffmpeg: {
    ffmpegPath: string;
    ffprobePath: string;
  };

  jobStore: JobStoreType;

  // MongoDB (only used when jobStore is "mongodb")
  mongodb: {
    uri: string;
    dbName: string;
  };
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readChoice<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function getConfig(): AppConfig {
  return {
    port: Math.floor(readNumber("PORT", 5000)),

    storage: {
      uploadDir: process.env.UPLOAD_DIR || "uploads",
      outputDir: process.env.OUTPUT_DIR || "outputs",
      maxUploadSizeBytes: readNumber("MAX_UPLOAD_SIZE_MB", 500) * 1024 * 1024,
    },

    retention: {
      maxAgeMs: readNumber("RETENTION_MINUTES", 60) * 60 * 1000,
      cronSchedule: process.env.CLEANUP_CRON || "*/10 * * * *",
    },

    split: {
      defaultDuration: readNumber("DEFAULT_SPLIT_DURATION", 30),
      failurePolicy: readChoice("SEGMENT_FAILURE_POLICY", SegmentFailurePolicies, "abort"),
      archiveDownloadName: process.env.ARCHIVE_DOWNLOAD_NAME || "whatsapp_reels.zip",
    },

    ffmpeg: {
      ffmpegPath: process.env.FFMPEG_PATH || "ffmpeg",
      ffprobePath: process.env.FFPROBE_PATH || "ffprobe",
    },

    jobStore: readChoice("JOB_STORE", JobStoreTypes, "memory"),

    mongodb: {
      uri: process.env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: process.env.MONGODB_DB_NAME || "reel-splitter",
    },
  };
}

export const config = getConfig();
