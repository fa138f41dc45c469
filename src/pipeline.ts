// Speech Feedback Service - Analysis pipeline
// Sequences one request through validation, artifact save, audio extraction,
// transcription, metric analysis and optional augmentation.
//
// State machine:
//   validating → saving → extracting → transcribing → analyzing
//     → augmenting (optional) → done
//   failed is reachable from every non-terminal state except augmenting.
//
// Temp artifacts are released exactly once on every exit path.

import { stat } from "node:fs/promises";
import { basename } from "node:path";
import type { AudioExtractor } from "./audio-extractor.js";
import type { AugmentationClient } from "./augmentation-client.js";
import {
  analysisError,
  internalError,
  isPipelineError,
  PipelineError,
  transcriptionError,
  translateExtractionFailure,
} from "./errors.js";
import { createLogger, describeError, type Logger } from "./logger.js";
import type { Analyzer } from "./speech-analyzer.js";
import type { TempArtifactManager } from "./temp-artifacts.js";
import type { Transcriber } from "./transcription-engine.js";
import {
  PipelineState,
  type AnalysisResult,
  type AugmentationOutcome,
  type Transcript,
  type UploadArtifact,
} from "./types.js";
import { UploadFile } from "./upload-file.js";
import type { UploadValidator } from "./upload-validator.js";

/** The slice of AugmentationClient the pipeline consumes. */
export type Augmenter = Pick<AugmentationClient, "enabled" | "augment">;

export interface PipelineDeps {
  validator: UploadValidator;
  artifacts: TempArtifactManager;
  extractor: AudioExtractor;
  transcriber: Transcriber;
  analyzer: Analyzer;
  /** Absent when augmentation is not configured. */
  augmenter?: Augmenter | null;
  extractionTimeoutMs: number;
  logger?: Logger;
  onStateChange?: (state: PipelineState, previous: PipelineState | null) => void;
}

const DEFAULT_EXTRACTION_TIMEOUT_MS = 300_000;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SpeechAnalysisPipeline {
  private readonly deps: PipelineDeps;
  private readonly logger: Logger;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("Pipeline");
  }

  get augmentationEnabled(): boolean {
    return this.deps.augmenter?.enabled ?? false;
  }

  /**
   * Run the full pipeline for one upload.
   *
   * @throws PipelineError. Non-domain failures surface as `internal`
   *   with a generic message; the detail is logged.
   */
  async analyzeUpload(upload: UploadFile): Promise<AnalysisResult> {
    const run = new PipelineRun(this.deps.onStateChange);
    const label = upload.filename ?? "unknown";
    this.logger.info(`Starting analysis pipeline for file: ${label}`);

    try {
      run.transition(PipelineState.VALIDATING);
      await this.deps.validator.validate(upload);

      const result = await this.deps.artifacts.use(upload.filename, (artifact) =>
        this.process(run, upload, artifact),
      );

      run.transition(PipelineState.DONE);
      this.logger.info(
        `Pipeline completed successfully: ${result.wordsTotal} words, ` +
          `${result.wordsPerMinute.toFixed(1)} WPM, augmentation ${result.augmentation ? "attached" : "absent"}`,
      );
      return result;
    } catch (err) {
      run.transition(PipelineState.FAILED);
      if (isPipelineError(err)) {
        this.logger.error(`Pipeline failed (${err.kind}) for ${label}: ${err.message}`);
        throw err;
      }
      this.logger.error(`Unexpected pipeline error for ${label}: ${describeError(err)}`);
      throw internalError();
    }
  }

  /** Run the pipeline for a video that is already on disk. */
  async analyzeLocalFile(path: string): Promise<AnalysisResult> {
    let size: number;
    try {
      size = (await stat(path)).size;
    } catch (err) {
      this.logger.error(`Cannot read local file ${path}: ${describeError(err)}`);
      throw internalError();
    }
    return this.analyzeUpload(UploadFile.fromPath(basename(path), path, size));
  }

  // ── Stages ─────────────────────────────────────────────────────────────────

  private async process(
    run: PipelineRun,
    upload: UploadFile,
    artifact: UploadArtifact,
  ): Promise<AnalysisResult> {
    run.transition(PipelineState.SAVING);
    await this.deps.artifacts.save(upload, artifact);

    run.transition(PipelineState.EXTRACTING);
    await this.extract(artifact);

    run.transition(PipelineState.TRANSCRIBING);
    const transcript = await this.transcribe(artifact.audioPath);

    run.transition(PipelineState.ANALYZING);
    const baseline = await this.analyze(transcript, artifact.audioPath);

    const augmenter = this.deps.augmenter;
    if (!augmenter?.enabled) {
      this.logger.debug("Augmentation not configured or disabled, returning baseline result");
      return baseline;
    }

    run.transition(PipelineState.AUGMENTING);
    const outcome = await this.augment(augmenter, baseline);
    if (outcome.status !== "succeeded") {
      return baseline;
    }
    return Object.freeze({ ...baseline, augmentation: outcome.augmentation });
  }

  private async extract(artifact: UploadArtifact): Promise<void> {
    const timeoutMs = this.deps.extractionTimeoutMs || DEFAULT_EXTRACTION_TIMEOUT_MS;
    try {
      await this.deps.extractor.extract(artifact.videoPath, artifact.audioPath, timeoutMs);
    } catch (err) {
      throw translateExtractionFailure(err);
    }
  }

  private async transcribe(audioPath: string): Promise<Transcript> {
    try {
      const transcript = await this.deps.transcriber.transcribe(audioPath);
      this.logger.info(`Transcription completed: ${transcript.text.length} characters`);
      return transcript;
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      this.logger.error(`Transcription failed: ${describeError(err)}`);
      throw transcriptionError(errorMessage(err));
    }
  }

  private async analyze(transcript: Transcript, audioPath: string): Promise<AnalysisResult> {
    try {
      return await this.deps.analyzer.analyze(transcript, audioPath);
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      this.logger.error(`Speech analysis failed: ${describeError(err)}`);
      throw analysisError(errorMessage(err));
    }
  }

  /** Soft stage: a rejection is logged and becomes a failed outcome. */
  private async augment(augmenter: Augmenter, baseline: AnalysisResult): Promise<AugmentationOutcome> {
    let outcome: AugmentationOutcome;
    try {
      outcome = await augmenter.augment(baseline);
    } catch (err) {
      this.logger.error(`Augmentation raised unexpectedly, continuing without it: ${describeError(err)}`);
      return { status: "failed", reason: "unexpected", message: errorMessage(err) };
    }

    switch (outcome.status) {
      case "succeeded":
        this.logger.info("Augmentation attached to the result");
        break;
      case "skipped":
        this.logger.info(`Augmentation skipped (${outcome.reason})`);
        break;
      case "failed":
        this.logger.warn(`Augmentation failed (${outcome.reason}), returning baseline result`);
        break;
    }
    return outcome;
  }
}

// ─── Per-request state tracking ─────────────────────────────────────────────────

const TERMINAL_STATES = new Set([PipelineState.DONE, PipelineState.FAILED]);

/** Tracks one invocation's state and reports transitions to the listener. */
class PipelineRun {
  private state: PipelineState | null = null;
  private readonly listener?: (state: PipelineState, previous: PipelineState | null) => void;

  constructor(listener?: (state: PipelineState, previous: PipelineState | null) => void) {
    this.listener = listener;
  }

  transition(next: PipelineState): void {
    if (this.state !== null && TERMINAL_STATES.has(this.state)) return;
    const previous = this.state;
    this.state = next;
    this.listener?.(next, previous);
  }
}
