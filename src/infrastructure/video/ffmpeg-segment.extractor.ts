import { access } from "fs/promises";
import {
  ISegmentExtractor,
  SegmentExtractionRequest,
  SegmentExtractionResult,
} from "../../domain/interfaces/isegment.extractor";
import { CommandRunner, describeCommandError, runCommand } from "./command-runner";

/**
 * Arguments for a stream-copy cut. Seeking before `-i` jumps to the nearest
 * keyframe, and `-avoid_negative_ts 1` shifts the copied timestamps so the
 * segment starts at zero.
 */
export function buildSegmentArgs(request: SegmentExtractionRequest): string[] {
  return [
    "-ss", String(request.start),
    "-i", request.sourcePath,
    "-t", String(request.duration),
    "-c", "copy",
    "-avoid_negative_ts", "1",
    "-y",
    request.outputPath,
  ];
}

export class FfmpegSegmentExtractor implements ISegmentExtractor {
  constructor(
    private readonly ffmpegPath: string = "ffmpeg",
    private readonly run: CommandRunner = runCommand
  ) {}

  async extract(request: SegmentExtractionRequest): Promise<SegmentExtractionResult> {
    try {
      await this.run(this.ffmpegPath, buildSegmentArgs(request));
    } catch (error) {
      return { success: false, error: describeCommandError(error) };
    }

    try {
      await access(request.outputPath);
    } catch {
      return { success: false, error: "ffmpeg produced no output file" };
    }

    return { success: true };
  }
}
