import { Segment } from "../../domain/entities/segment";
import { roundTo2 } from "../../application/use-cases/split-video.use-case";

export interface SplitVideoRequest {
  job_id?: unknown;
  split_duration?: unknown;
}

export interface ClipResponse {
  number: number;
  filename: string;
  start: number;
  end: number;
  duration: number;
  size_mb: number;
}

export interface SplitVideoResponse {
  success: true;
  job_id: string;
  clips: ClipResponse[];
  total_clips: number;
  zip_size_mb: number;
  download_url: string;
}

export function toClipResponse(segment: Segment): ClipResponse {
  return {
    number: segment.number,
    filename: segment.filename,
    start: segment.start,
    end: segment.end,
    duration: segment.duration,
    size_mb: segment.sizeMb,
  };
}

export function toSplitVideoResponse(
  jobId: string,
  segments: Segment[],
  archiveSizeBytes: number
): SplitVideoResponse {
  return {
    success: true,
    job_id: jobId,
    clips: segments.map(toClipResponse),
    total_clips: segments.length,
    zip_size_mb: roundTo2(archiveSizeBytes / (1024 * 1024)),
    download_url: `/download/${jobId}`,
  };
}
