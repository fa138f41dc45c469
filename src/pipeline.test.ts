// Unit tests for SpeechAnalysisPipeline
// Real validator and temp-artifact manager (in a scratch dir); fake extractor,
// transcriber, analyzer and augmenter.

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AudioExtractor } from "./audio-extractor.js";
import { ExtractionFailure, PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { SpeechAnalysisPipeline, type Augmenter, type PipelineDeps } from "./pipeline.js";
import { SpeechAnalyzer, type Analyzer } from "./speech-analyzer.js";
import { TempArtifactManager } from "./temp-artifacts.js";
import type { Transcriber } from "./transcription-engine.js";
import {
  PipelineState,
  type AnalysisResult,
  type Augmentation,
  type AugmentationOutcome,
  type Transcript,
} from "./types.js";
import { UploadFile } from "./upload-file.js";
import { UploadValidator } from "./upload-validator.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────────

const MB = 1024 * 1024;
const ALLOWED = [".mp4", ".mov", ".avi", ".mkv", ".webm"];

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const transcript: Transcript = {
  text: "Hello everyone",
  durationSec: 2,
  segments: [
    {
      text: "Hello everyone",
      startTime: 0,
      endTime: 1.2,
      words: [
        { word: "Hello", startTime: 0, endTime: 0.5, confidence: 0.99 },
        { word: "everyone", startTime: 0.6, endTime: 1.2, confidence: 0.98 },
      ],
    },
  ],
};

const baseline: AnalysisResult = Object.freeze<AnalysisResult>({
  durationSec: 2,
  speakingTimeSec: 1.1,
  speakingRatio: 0.55,
  wordsTotal: 2,
  wordsPerMinute: 60,
  fillerWords: { total: 0, per100Words: 0, items: [] },
  pauses: { count: 0, avgSec: 0, maxSec: 0, longPauses: [] },
  phrases: { count: 1, avgWords: 2, avgDurationSec: 1.2, lengthClassification: "short", rhythmVariation: "none" },
  advice: [],
  transcript: "Hello everyone",
});

const augmentation: Augmentation = {
  overallAssessment: "Short but clear.",
  strengths: ["Clear greeting"],
  areasForImprovement: [],
  recommendations: ["Say more"],
  insights: [],
  confidenceScore: 0.8,
};

interface Fakes {
  extractor: { extract: Mock<Parameters<AudioExtractor["extract"]>, Promise<void>> };
  transcriber: { transcribe: Mock<Parameters<Transcriber["transcribe"]>, Promise<Transcript>> };
  analyzer: { analyze: Mock<Parameters<Analyzer["analyze"]>, Promise<AnalysisResult>> };
  states: PipelineState[];
  logger: Logger;
}

/** Extractor that writes a small audio file, like ffmpeg would. */
function writingExtractor() {
  return vi.fn<Parameters<AudioExtractor["extract"]>, Promise<void>>(async (_video, audio) => {
    await writeFile(audio, Buffer.alloc(44));
  });
}

function augmenterReturning(outcome: AugmentationOutcome) {
  return { enabled: true, augment: vi.fn(async (_result: AnalysisResult) => outcome) } satisfies Augmenter;
}

describe("SpeechAnalysisPipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pipeline-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createPipeline(overrides: Partial<PipelineDeps> = {}): { pipeline: SpeechAnalysisPipeline } & Fakes {
    const logger = silentLogger();
    const states: PipelineState[] = [];
    const extractor = { extract: writingExtractor() };
    const transcriber = {
      transcribe: vi.fn<Parameters<Transcriber["transcribe"]>, Promise<Transcript>>(async () => transcript),
    };
    const analyzer = {
      analyze: vi.fn<Parameters<Analyzer["analyze"]>, Promise<AnalysisResult>>(async () => baseline),
    };
    const pipeline = new SpeechAnalysisPipeline({
      validator: new UploadValidator({ allowedExtensions: ALLOWED, maxFileSizeMb: 100 }, logger),
      artifacts: new TempArtifactManager(dir, logger),
      extractor,
      transcriber,
      analyzer,
      augmenter: null,
      extractionTimeoutMs: 300_000,
      logger,
      onStateChange: (state) => states.push(state),
      ...overrides,
    });
    return { pipeline, extractor, transcriber, analyzer, states, logger };
  }

  async function failure(promise: Promise<unknown>): Promise<PipelineError> {
    try {
      await promise;
    } catch (err) {
      if (err instanceof PipelineError) return err;
      throw err;
    }
    throw new Error("expected a PipelineError");
  }

  const leftovers = () => readdir(dir);

  // ── Happy path ─────────────────────────────────────────────────────────────

  it("returns the baseline for a 5 MB mp4 with augmentation disabled", async () => {
    const { pipeline, extractor, transcriber, analyzer, states } = createPipeline();

    const result = await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.alloc(5 * MB)));

    expect(result).toBe(baseline);
    expect(result.augmentation).toBeUndefined();
    expect(states).toEqual([
      PipelineState.VALIDATING,
      PipelineState.SAVING,
      PipelineState.EXTRACTING,
      PipelineState.TRANSCRIBING,
      PipelineState.ANALYZING,
      PipelineState.DONE,
    ]);

    const [videoPath, audioPath, timeoutMs] = extractor.extract.mock.calls[0];
    expect(videoPath.startsWith(dir)).toBe(true);
    expect(videoPath.endsWith(".mp4")).toBe(true);
    expect(audioPath.endsWith(".wav")).toBe(true);
    expect(timeoutMs).toBe(300_000);
    expect(transcriber.transcribe).toHaveBeenCalledWith(audioPath);
    expect(analyzer.analyze).toHaveBeenCalledWith(transcript, audioPath);
    expect(await leftovers()).toEqual([]);
  });

  it("runs the real analyzer over the transcript", async () => {
    const { pipeline } = createPipeline({ analyzer: new SpeechAnalyzer({ logger: silentLogger() }) });

    const result = await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.webm", Buffer.from("video")));

    // The 44-byte placeholder is not a WAV file, so the transcript duration is used.
    expect(result.durationSec).toBe(2);
    expect(result.wordsTotal).toBe(2);
    expect(result.wordsPerMinute).toBe(60);
    expect(result.transcript).toBe("Hello everyone");
  });

  it("attaches a successful augmentation to a copy of the baseline", async () => {
    const augmenter = augmenterReturning({ status: "succeeded", augmentation });
    const { pipeline, states } = createPipeline({ augmenter });

    const result = await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mov", Buffer.from("video")));

    expect(result).toEqual({ ...baseline, augmentation });
    expect(Object.isFrozen(result)).toBe(true);
    expect(baseline.augmentation).toBeUndefined();
    expect(augmenter.augment).toHaveBeenCalledWith(baseline);
    expect(states.slice(-2)).toEqual([PipelineState.AUGMENTING, PipelineState.DONE]);
  });

  it("skips the augmentation stage when the augmenter is disabled", async () => {
    const augmenter = { enabled: false, augment: vi.fn(async (_result: AnalysisResult): Promise<AugmentationOutcome> => ({ status: "skipped", reason: "disabled" })) };
    const { pipeline, states } = createPipeline({ augmenter });

    await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video")));

    expect(augmenter.augment).not.toHaveBeenCalled();
    expect(states).not.toContain(PipelineState.AUGMENTING);
    expect(pipeline.augmentationEnabled).toBe(false);
  });

  it("reports augmentationEnabled from the augmenter", () => {
    expect(createPipeline().pipeline.augmentationEnabled).toBe(false);
    const augmenter = augmenterReturning({ status: "skipped", reason: "disabled" });
    expect(createPipeline({ augmenter }).pipeline.augmentationEnabled).toBe(true);
  });

  // ── Augmentation never fails the request ───────────────────────────────────

  it("returns the unchanged baseline when augmentation auth is rate limited twice", async () => {
    const augmenter = augmenterReturning({
      status: "failed",
      reason: "rate_limited",
      message: "Authentication rate limit exceeded after retry",
    });
    const { pipeline, states, logger } = createPipeline({ augmenter });

    const result = await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video")));

    expect(result).toBe(baseline);
    expect(states.at(-1)).toBe(PipelineState.DONE);
    expect(logger.warn).toHaveBeenCalledWith("Augmentation failed (rate_limited), returning baseline result");
  });

  it("returns the unchanged baseline when the augmenter throws", async () => {
    const augmenter = {
      enabled: true,
      augment: vi.fn(async (_result: AnalysisResult): Promise<AugmentationOutcome> => {
        throw new Error("socket hang up");
      }),
    };
    const { pipeline, states } = createPipeline({ augmenter });

    const result = await pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video")));

    expect(result).toBe(baseline);
    expect(states).not.toContain(PipelineState.FAILED);
    expect(await leftovers()).toEqual([]);
  });

  // ── Validation ─────────────────────────────────────────────────────────────

  it("rejects notes.txt before writing anything", async () => {
    const { pipeline, extractor, states } = createPipeline();

    const err = await failure(pipeline.analyzeUpload(UploadFile.fromBuffer("notes.txt", Buffer.from("hi"))));

    expect(err.detail).toEqual({ kind: "unsupported_file_type", extension: ".txt", allowedExtensions: ALLOWED });
    expect(err.statusCode).toBe(400);
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(states).toEqual([PipelineState.VALIDATING, PipelineState.FAILED]);
    expect(await leftovers()).toEqual([]);
  });

  it("rejects a 150 MB upload against the 100 MB limit", async () => {
    const { pipeline, extractor } = createPipeline();

    const err = await failure(
      pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.alloc(16), 150 * MB)),
    );

    expect(err.detail).toEqual({ kind: "file_too_large", fileSizeMb: 150, maxSizeMb: 100 });
    expect(err.message).toBe("File size (150.0 MB) exceeds maximum allowed size (100 MB)");
    expect(err.statusCode).toBe(413);
    expect(extractor.extract).not.toHaveBeenCalled();
  });

  // ── Stage failures ─────────────────────────────────────────────────────────

  it("fails with an extraction timeout and removes the partial audio", async () => {
    const extract = vi.fn<Parameters<AudioExtractor["extract"]>, Promise<void>>(async (_video, audio) => {
      await writeFile(audio, Buffer.alloc(10));
      throw new ExtractionFailure("timeout", "FFmpeg timeout (300 seconds)");
    });
    const { pipeline, transcriber, states } = createPipeline({ extractor: { extract } });

    const err = await failure(pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video"))));

    expect(err.detail).toEqual({
      kind: "extraction",
      cause: "timeout",
      reason: "Audio extraction took too long. The video might be too long or corrupted.",
    });
    expect(err.statusCode).toBe(500);
    expect(transcriber.transcribe).not.toHaveBeenCalled();
    expect(states.slice(-2)).toEqual([PipelineState.EXTRACTING, PipelineState.FAILED]);
    expect(await leftovers()).toEqual([]);
  });

  it("keeps the message of an unrecognized extraction failure", async () => {
    const extract = vi.fn<Parameters<AudioExtractor["extract"]>, Promise<void>>(async () => {
      throw new Error("disk full");
    });
    const { pipeline } = createPipeline({ extractor: { extract } });

    const err = await failure(pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video"))));
    expect(err.detail).toEqual({ kind: "extraction", cause: "unknown", reason: "Failed to extract audio: disk full" });
  });

  it("wraps transcription failures", async () => {
    const transcribe = vi.fn<Parameters<Transcriber["transcribe"]>, Promise<Transcript>>(async () => {
      throw new Error("401 invalid api key");
    });
    const { pipeline, analyzer } = createPipeline({ transcriber: { transcribe } });

    const err = await failure(pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video"))));

    expect(err.kind).toBe("transcription");
    expect(err.name).toBe("TranscriptionError");
    expect(err.message).toBe("Failed to transcribe audio: 401 invalid api key");
    expect(analyzer.analyze).not.toHaveBeenCalled();
    expect(await leftovers()).toEqual([]);
  });

  it("wraps analysis failures", async () => {
    const analyze = vi.fn<Parameters<Analyzer["analyze"]>, Promise<AnalysisResult>>(async () => {
      throw new RangeError("bad timings");
    });
    const { pipeline } = createPipeline({ analyzer: { analyze } });

    const err = await failure(pipeline.analyzeUpload(UploadFile.fromBuffer("talk.mp4", Buffer.from("video"))));

    expect(err.kind).toBe("analysis");
    expect(err.message).toBe("Failed to analyze speech: bad timings");
    expect(await leftovers()).toEqual([]);
  });

  it("hides unexpected failures behind an internal error", async () => {
    const { pipeline, extractor, logger } = createPipeline();
    const upload = UploadFile.fromPath("talk.mp4", join(dir, "missing", "talk.mp4"), 1024);

    const err = await failure(pipeline.analyzeUpload(upload));

    expect(err.kind).toBe("internal");
    expect(err.message).toBe("Internal server error occurred while processing the file");
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("ENOENT"));
    expect(await leftovers()).toEqual([]);
  });

  // ── Local files ────────────────────────────────────────────────────────────

  describe("analyzeLocalFile", () => {
    let sourceDir: string;

    beforeEach(async () => {
      sourceDir = await mkdtemp(join(tmpdir(), "pipeline-source-"));
    });

    afterEach(async () => {
      await rm(sourceDir, { recursive: true, force: true });
    });

    it("analyzes a video already on disk and leaves it in place", async () => {
      const source = join(sourceDir, "Keynote.MKV");
      await writeFile(source, Buffer.from("video bytes"));
      const { pipeline, extractor } = createPipeline();

      expect(await pipeline.analyzeLocalFile(source)).toBe(baseline);

      const [videoPath] = extractor.extract.mock.calls[0];
      expect(videoPath.endsWith(".mkv")).toBe(true);
      expect(await readdir(sourceDir)).toEqual(["Keynote.MKV"]);
      expect(await leftovers()).toEqual([]);
    });

    it("fails with an internal error when the file does not exist", async () => {
      const { pipeline } = createPipeline();
      const err = await failure(pipeline.analyzeLocalFile(join(sourceDir, "nope.mp4")));
      expect(err.kind).toBe("internal");
    });

    it("validates the extension of a local file", async () => {
      const source = join(sourceDir, "slides.pdf");
      await writeFile(source, "pdf");
      const { pipeline } = createPipeline();
      const err = await failure(pipeline.analyzeLocalFile(source));
      expect(err.kind).toBe("unsupported_file_type");
    });
  });
});
