// Speech Feedback Service - Temporary artifact manager
//
// Per-request scratch files: the uploaded video and the audio extracted from
// it. Paths are allocated without touching the disk; release() removes both
// and never throws.

import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import { pipeline } from "node:stream/promises";
import { v4 as uuidv4 } from "uuid";
import { createLogger, describeError, type Logger } from "./logger.js";
import type { UploadArtifact } from "./types.js";
import { UPLOAD_CHUNK_SIZE, type UploadFile } from "./upload-file.js";

const DEFAULT_VIDEO_EXTENSION = ".mp4";
const AUDIO_EXTENSION = ".wav";

export class TempArtifactManager {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(baseDir: string = tmpdir(), logger: Logger = createLogger("TempArtifacts")) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  /**
   * Allocate a video path carrying the original extension (".mp4" when none
   * can be inferred) and the paired ".wav" audio path.
   */
  allocate(filename: string | null): UploadArtifact {
    const ext = (filename ? extname(filename).toLowerCase() : "") || DEFAULT_VIDEO_EXTENSION;
    const stem = join(this.baseDir, `speech-${uuidv4()}`);
    return {
      videoPath: `${stem}${ext}`,
      audioPath: `${stem}${AUDIO_EXTENSION}`,
    };
  }

  /** Stream the upload from its start to the artifact's video path in bounded chunks. */
  async save(upload: UploadFile, artifact: UploadArtifact): Promise<void> {
    if (upload.seekable) {
      upload.seek(0);
    }
    await pipeline(
      upload.createReadStream(UPLOAD_CHUNK_SIZE),
      createWriteStream(artifact.videoPath, { highWaterMark: UPLOAD_CHUNK_SIZE }),
    );
    this.logger.info(`File saved to temporary location: ${artifact.videoPath}`);
  }

  /** Delete both paths. Missing files are fine; other failures are logged. */
  async release(artifact: UploadArtifact): Promise<void> {
    for (const path of [artifact.videoPath, artifact.audioPath]) {
      try {
        await rm(path, { force: true });
        this.logger.debug(`Deleted temp file: ${path}`);
      } catch (err) {
        this.logger.warn(`Failed to delete temp file ${path}: ${describeError(err)}`);
      }
    }
  }

  /**
   * Scoped acquisition: allocate, run `fn`, and release exactly once on
   * every exit path.
   */
  async use<T>(filename: string | null, fn: (artifact: UploadArtifact) => Promise<T>): Promise<T> {
    const artifact = this.allocate(filename);
    try {
      return await fn(artifact);
    } finally {
      await this.release(artifact);
    }
  }
}
