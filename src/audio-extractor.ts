// Speech Feedback Service - Audio extraction
// Pulls a mono 16 kHz PCM WAV track out of an uploaded video with ffmpeg.
//
// Every failure is raised as an ExtractionFailure with a cause the pipeline
// translates: timeout, tool_missing, non_zero_exit, empty_output,
// missing_output.

import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { stat } from "node:fs/promises";
import { ExtractionFailure } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface AudioExtractor {
  extract(videoPath: string, audioPath: string, timeoutMs: number): Promise<void>;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

/** Keep only the tail of ffmpeg's stderr for error messages. */
const MAX_STDERR_CHARS = 2000;

export function buildFfmpegArgs(videoPath: string, audioPath: string): string[] {
  return [
    "-y",
    "-i", videoPath,
    "-vn",
    "-acodec", "pcm_s16le",
    "-ar", "16000",
    "-ac", "1",
    "-hide_banner",
    "-loglevel", "error",
    "-nostats",
    audioPath,
  ];
}

export const quoteCliArg = (value: string): string => {
  if (value === "") return '""';
  if (/[^\w./:\\-]/.test(value)) {
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  return value;
};

export const formatCommand = (binaryPath: string, args: string[]): string =>
  [quoteCliArg(binaryPath), ...args.map((arg) => quoteCliArg(arg))].join(" ");

export interface FfmpegAudioExtractorOptions {
  ffmpegPath?: string;
  spawn?: SpawnFn;
  logger?: Logger;
}

export class FfmpegAudioExtractor implements AudioExtractor {
  private readonly ffmpegPath: string;
  private readonly spawnFn: SpawnFn;
  private readonly logger: Logger;

  constructor(options: FfmpegAudioExtractorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.spawnFn = options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.logger = options.logger ?? createLogger("AudioExtractor");
  }

  async extract(videoPath: string, audioPath: string, timeoutMs: number): Promise<void> {
    const args = buildFfmpegArgs(videoPath, audioPath);
    this.logger.debug(`Running ffmpeg: ${formatCommand(this.ffmpegPath, args)}`);

    await this.run(args, timeoutMs);
    const size = await this.outputSize(audioPath);

    this.logger.info(`Audio extracted successfully: ${audioPath} (${size} bytes)`);
  }

  private run(args: string[], timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let stderr = "";

      const child = this.spawnFn(this.ffmpegPath, args, {
        stdio: ["ignore", "ignore", "pipe"],
      });

      const finish = (failure?: ExtractionFailure) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (failure) {
          this.logger.error(failure.message);
          reject(failure);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(
          new ExtractionFailure(
            "timeout",
            `FFmpeg timeout (${Math.round(timeoutMs / 1000)} seconds)`,
          ),
        );
      }, timeoutMs);

      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-MAX_STDERR_CHARS);
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          finish(new ExtractionFailure("tool_missing", `FFmpeg not found at: ${this.ffmpegPath}`));
        } else {
          // Present but not runnable (EACCES, ENOEXEC).
          finish(new ExtractionFailure("tool_missing", `Failed to start ffmpeg: ${err.message}`));
        }
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          finish();
          return;
        }
        const status = code !== null ? `code ${code}` : `signal ${signal ?? "unknown"}`;
        const tail = stderr.trim();
        finish(
          new ExtractionFailure(
            "non_zero_exit",
            `FFmpeg failed with ${status}${tail ? `: ${tail}` : ""}`,
            code,
          ),
        );
      });
    });
  }

  private async outputSize(audioPath: string): Promise<number> {
    let size: number;
    try {
      size = (await stat(audioPath)).size;
    } catch {
      throw new ExtractionFailure("missing_output", "Audio file was not created");
    }
    if (size === 0) {
      throw new ExtractionFailure("empty_output", "Extracted audio file is empty");
    }
    return size;
  }
}
