import { VideoInfo } from "../entities/video-info";

export interface IMediaProber {
  getVideoInfo(filePath: string): Promise<VideoInfo>;
  getDuration(filePath: string): Promise<number>;
}
