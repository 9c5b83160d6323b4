import { VideoInfo } from "../../domain/entities/video-info";

export interface UploadVideoResponse {
  duration: number;
  size_mb: number;
  width: number | null;
  height: number | null;
  codec: string | null;
  job_id: string;
  filename: string;
}

export function toUploadVideoResponse(jobId: string, filename: string, info: VideoInfo): UploadVideoResponse {
  return {
    duration: info.duration,
    size_mb: info.sizeMb,
    width: info.width,
    height: info.height,
    codec: info.codec,
    job_id: jobId,
    filename,
  };
}
