// Unit tests for the domain error taxonomy and extraction translation table

import { describe, it, expect } from "vitest";
import {
  analysisError,
  ExtractionFailure,
  fileTooLarge,
  internalError,
  isPipelineError,
  PipelineError,
  transcriptionError,
  translateExtractionFailure,
  unsupportedFileType,
} from "./errors.js";

describe("PipelineError", () => {
  it("formats unsupported file types with the allow-list", () => {
    const err = unsupportedFileType(".txt", [".mp4", ".mov"]);
    expect(err.kind).toBe("unsupported_file_type");
    expect(err.statusCode).toBe(400);
    expect(err.name).toBe("UnsupportedFileTypeError");
    expect(err.message).toBe("File type '.txt' is not supported. Allowed types: .mp4, .mov");
    expect(err.detail).toEqual({
      kind: "unsupported_file_type",
      extension: ".txt",
      allowedExtensions: [".mp4", ".mov"],
    });
  });

  it("rounds oversized files to one decimal MB", () => {
    const err = fileTooLarge(150 * 1024 * 1024, 100);
    expect(err.statusCode).toBe(413);
    expect(err.name).toBe("FileTooLargeError");
    expect(err.detail).toEqual({ kind: "file_too_large", fileSizeMb: 150, maxSizeMb: 100 });
    expect(err.message).toBe("File size (150.0 MB) exceeds maximum allowed size (100 MB)");
  });

  it("keeps a fraction of a megabyte", () => {
    const err = fileTooLarge(100 * 1024 * 1024 + 300 * 1024, 100);
    expect(err.detail).toEqual({ kind: "file_too_large", fileSizeMb: 100.3, maxSizeMb: 100 });
  });

  it("prefixes transcription and analysis reasons", () => {
    const t = transcriptionError("quota exceeded");
    expect(t.message).toBe("Failed to transcribe audio: quota exceeded");
    expect(t.statusCode).toBe(500);
    expect(t.name).toBe("TranscriptionError");

    const a = analysisError("bad header");
    expect(a.message).toBe("Failed to analyze speech: bad header");
    expect(a.name).toBe("AnalysisError");
  });

  it("reports internal errors generically", () => {
    const err = internalError();
    expect(err.message).toBe("Internal server error occurred while processing the file");
    expect(err.statusCode).toBe(500);
    expect(err.name).toBe("InternalError");
  });

  it("is recognized by isPipelineError and nothing else is", () => {
    expect(isPipelineError(internalError())).toBe(true);
    expect(isPipelineError(new Error("boom"))).toBe(false);
    expect(isPipelineError("boom")).toBe(false);
    expect(internalError()).toBeInstanceOf(Error);
  });
});

describe("translateExtractionFailure", () => {
  it("maps a timeout to a timeout-flavored extraction error", () => {
    const err = translateExtractionFailure(new ExtractionFailure("timeout", "FFmpeg timeout (300 seconds)"));
    expect(err).toBeInstanceOf(PipelineError);
    expect(err.detail).toEqual({
      kind: "extraction",
      cause: "timeout",
      reason: "Audio extraction took too long. The video might be too long or corrupted.",
    });
    expect(err.name).toBe("ExtractionError");
  });

  it("tells a missing tool apart from a corrupted input", () => {
    const missing = translateExtractionFailure(new ExtractionFailure("tool_missing", "not found"));
    expect(missing.detail).toEqual({
      kind: "extraction",
      cause: "tool_missing",
      reason: "FFmpeg is not installed or not in PATH",
    });

    const decode = translateExtractionFailure(new ExtractionFailure("non_zero_exit", "code 1", 1));
    expect(decode.detail).toMatchObject({ kind: "extraction", cause: "corrupted" });
    expect(decode.message).toBe(
      "The video file could not be decoded. It may be corrupted or use an unsupported codec.",
    );
  });

  it("treats empty and missing output as corrupted input", () => {
    const empty = translateExtractionFailure(new ExtractionFailure("empty_output", "empty"));
    expect(empty.detail).toMatchObject({ cause: "corrupted" });
    expect(empty.message).toBe(
      "No audio could be extracted. The video may have no audio track or be corrupted.",
    );

    const missing = translateExtractionFailure(new ExtractionFailure("missing_output", "missing"));
    expect(missing.message).toBe("Video file is corrupted or empty");
  });

  it("keeps the message of an unrecognized failure", () => {
    const err = translateExtractionFailure(new Error("disk full"));
    expect(err.detail).toEqual({
      kind: "extraction",
      cause: "unknown",
      reason: "Failed to extract audio: disk full",
    });
  });
});
