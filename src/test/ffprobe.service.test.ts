import { describe, it, expect, vi, beforeEach } from "vitest";
import { FfprobeService, parseDurationOutput, parseProbeOutput } from "../infrastructure/video/ffprobe.service";
import { ProcessingError } from "../domain/errors/app-error";

const probeJson = JSON.stringify({
  streams: [
    { codec_type: "audio", codec_name: "aac" },
    { codec_type: "video", codec_name: "h264", width: 1080, height: 1920 },
    { codec_type: "video", codec_name: "mjpeg", width: 320, height: 240 },
  ],
  format: { duration: "95.040000", size: "5242880" },
});

describe("parseProbeOutput", () => {
  it("reads duration, size and the first video stream", () => {
    expect(parseProbeOutput(probeJson)).toEqual({
      duration: 95.04,
      sizeMb: 5,
      width: 1080,
      height: 1920,
      codec: "h264",
    });
  });

  it("reports nulls when there is no video stream", () => {
    const audioOnly = JSON.stringify({
      streams: [{ codec_type: "audio", codec_name: "mp3" }],
      format: { duration: "10.5", size: "1048576" },
    });

    expect(parseProbeOutput(audioOnly)).toEqual({
      duration: 10.5,
      sizeMb: 1,
      width: null,
      height: null,
      codec: null,
    });
  });

  it("fails when the duration is missing", () => {
    const noDuration = JSON.stringify({ streams: [], format: { size: "10" } });
    expect(() => parseProbeOutput(noDuration)).toThrow("Could not determine video duration");
  });

  it("fails on output that is not JSON", () => {
    expect(() => parseProbeOutput("moov atom not found")).toThrow(ProcessingError);
  });
});

describe("parseDurationOutput", () => {
  it("reads format.duration", () => {
    expect(parseDurationOutput('{"format":{"duration":"30.000000"}}')).toBe(30);
  });
});

describe("FfprobeService", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("invokes ffprobe with JSON output for the given file", async () => {
    const run = vi.fn().mockResolvedValue({ stdout: probeJson, stderr: "" });
    const service = new FfprobeService("/opt/bin/ffprobe", run);

    const info = await service.getVideoInfo("/data/in.mp4");

    expect(info.codec).toBe("h264");
    expect(run).toHaveBeenCalledWith("/opt/bin/ffprobe", [
      "-v", "error",
      "-show_entries", "format=size,duration:stream=codec_type,width,height,codec_name",
      "-of", "json",
      "/data/in.mp4",
    ]);
  });

  it("asks only for the duration when splitting", async () => {
    const run = vi.fn().mockResolvedValue({ stdout: '{"format":{"duration":"61.2"}}', stderr: "" });
    const service = new FfprobeService("ffprobe", run);

    await expect(service.getDuration("/data/in.mov")).resolves.toBe(61.2);
    expect(run).toHaveBeenCalledWith("ffprobe", [
      "-v", "error",
      "-show_entries", "format=duration",
      "-of", "json",
      "/data/in.mov",
    ]);
  });

  it("surfaces the last stderr line when ffprobe exits non-zero", async () => {
    const failure = Object.assign(new Error("Command failed"), {
      stderr: "[mov,mp4] some warning\n/data/bad.mp4: Invalid data found when processing input\n",
    });
    const service = new FfprobeService("ffprobe", vi.fn().mockRejectedValue(failure));

    await expect(service.getVideoInfo("/data/bad.mp4")).rejects.toThrow(
      "ffprobe failed: /data/bad.mp4: Invalid data found when processing input"
    );
  });

  it("explains a missing binary", async () => {
    const missing = Object.assign(new Error("spawn ffprobe ENOENT"), { code: "ENOENT" });
    const service = new FfprobeService("ffprobe", vi.fn().mockRejectedValue(missing));

    await expect(service.getDuration("/data/a.mp4")).rejects.toThrow("ffprobe failed: binary not found in PATH");
  });
});
