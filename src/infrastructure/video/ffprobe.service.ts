import { VideoInfo } from "../../domain/entities/video-info";
import { IMediaProber } from "../../domain/interfaces/imedia.prober";
import { ProcessingError } from "../../domain/errors/app-error";
import { CommandRunner, describeCommandError, runCommand } from "./command-runner";

const BYTES_PER_MB = 1024 * 1024;

interface ProbeStream {
  codec_type?: unknown;
  codec_name?: unknown;
  width?: unknown;
  height?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function parseJson(stdout: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    throw new ProcessingError("ffprobe returned invalid JSON");
  }
  if (!isRecord(data)) {
    throw new ProcessingError("ffprobe returned an unexpected payload");
  }
  return data;
}

function parseFormat(data: Record<string, unknown>): { duration: number; size: number | null } {
  const format = data.format;
  if (!isRecord(format)) {
    throw new ProcessingError("ffprobe output has no format section");
  }
  const duration = toNumber(format.duration);
  if (duration === null) {
    throw new ProcessingError("Could not determine video duration");
  }
  return { duration, size: toNumber(format.size) };
}

/**
 * Turn `ffprobe -of json` output into VideoInfo. Dimensions and codec come
 * from the first video stream; they are null for files without one.
 */
export function parseProbeOutput(stdout: string): VideoInfo {
  const data = parseJson(stdout);
  const { duration, size } = parseFormat(data);

  const streams: unknown[] = Array.isArray(data.streams) ? data.streams : [];
  const video = streams.find(
    (stream): stream is ProbeStream => isRecord(stream) && stream.codec_type === "video"
  );

  return {
    duration,
    sizeMb: (size ?? 0) / BYTES_PER_MB,
    width: video ? toNumber(video.width) : null,
    height: video ? toNumber(video.height) : null,
    codec: video && typeof video.codec_name === "string" ? video.codec_name : null,
  };
}

export function parseDurationOutput(stdout: string): number {
  return parseFormat(parseJson(stdout)).duration;
}

export class FfprobeService implements IMediaProber {
  constructor(
    private readonly ffprobePath: string = "ffprobe",
    private readonly run: CommandRunner = runCommand
  ) {}

  async getVideoInfo(filePath: string): Promise<VideoInfo> {
    const stdout = await this.probe([
      "-v", "error",
      "-show_entries", "format=size,duration:stream=codec_type,width,height,codec_name",
      "-of", "json",
      filePath,
    ]);
    return parseProbeOutput(stdout);
  }

  async getDuration(filePath: string): Promise<number> {
    const stdout = await this.probe([
      "-v", "error",
      "-show_entries", "format=duration",
      "-of", "json",
      filePath,
    ]);
    return parseDurationOutput(stdout);
  }

  private async probe(args: string[]): Promise<string> {
    try {
      const { stdout } = await this.run(this.ffprobePath, args);
      return stdout;
    } catch (error) {
      console.error("[FfprobeService] ffprobe failed:", error);
      throw new ProcessingError(`ffprobe failed: ${describeCommandError(error)}`, { cause: error });
    }
  }
}
