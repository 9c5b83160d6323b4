import { Segment } from "./segment";
import { VideoInfo } from "./video-info";

export type VideoJobStatus = "uploaded" | "splitting" | "split" | "failed";

export interface VideoJob {
  id: string;
  filename: string; // Sanitised original filename
  sourcePath: string;
  outputDir?: string; // Directory holding the segment files
  archivePath?: string;
  segments: Segment[]; // Segments of the latest split
  splitDuration?: number;
  info?: VideoInfo;
  status: VideoJobStatus;
  error?: string;
  createdAt: Date;
  updatedAt: Date; // Retention is measured from here
}
