// Speech Feedback Service - Domain errors
//
// One tagged error type for everything the pipeline surfaces to callers,
// plus the failure type the audio extractor raises and the table that
// translates one into the other.

// ─── Extraction failures (raised by AudioExtractor implementations) ─────────────

export type ExtractionFailureCause =
  | "timeout"
  | "tool_missing"
  | "non_zero_exit"
  | "empty_output"
  | "missing_output";

export class ExtractionFailure extends Error {
  readonly kind: ExtractionFailureCause;
  readonly exitCode: number | null;

  constructor(kind: ExtractionFailureCause, message: string, exitCode: number | null = null) {
    super(message);
    this.name = "ExtractionFailure";
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

// ─── Pipeline errors ────────────────────────────────────────────────────────────

export type ExtractionErrorCause = "timeout" | "tool_missing" | "corrupted" | "unknown";

export type PipelineErrorDetail =
  | { kind: "unsupported_file_type"; extension: string; allowedExtensions: readonly string[] }
  | { kind: "file_too_large"; fileSizeMb: number; maxSizeMb: number }
  | { kind: "extraction"; cause: ExtractionErrorCause; reason: string }
  | { kind: "transcription"; reason: string }
  | { kind: "analysis"; reason: string }
  | { kind: "internal" };

export type PipelineErrorKind = PipelineErrorDetail["kind"];

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
  unsupported_file_type: 400,
  file_too_large: 413,
  extraction: 500,
  transcription: 500,
  analysis: 500,
  internal: 500,
};

/** Error name reported to HTTP clients as `error_type`. */
const TYPE_NAME_BY_KIND: Record<PipelineErrorKind, string> = {
  unsupported_file_type: "UnsupportedFileTypeError",
  file_too_large: "FileTooLargeError",
  extraction: "ExtractionError",
  transcription: "TranscriptionError",
  analysis: "AnalysisError",
  internal: "InternalError",
};

function messageFor(detail: PipelineErrorDetail): string {
  switch (detail.kind) {
    case "unsupported_file_type":
      return (
        `File type '${detail.extension}' is not supported. ` +
        `Allowed types: ${detail.allowedExtensions.join(", ")}`
      );
    case "file_too_large":
      return (
        `File size (${detail.fileSizeMb.toFixed(1)} MB) exceeds maximum allowed size ` +
        `(${detail.maxSizeMb} MB)`
      );
    case "extraction":
    case "transcription":
    case "analysis":
      return detail.reason;
    case "internal":
      return "Internal server error occurred while processing the file";
  }
}

export class PipelineError extends Error {
  readonly detail: PipelineErrorDetail;
  readonly statusCode: number;

  constructor(detail: PipelineErrorDetail) {
    super(messageFor(detail));
    this.name = TYPE_NAME_BY_KIND[detail.kind];
    this.detail = detail;
    this.statusCode = STATUS_BY_KIND[detail.kind];
  }

  get kind(): PipelineErrorKind {
    return this.detail.kind;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

// ─── Constructors ───────────────────────────────────────────────────────────────

export function unsupportedFileType(
  extension: string,
  allowedExtensions: readonly string[],
): PipelineError {
  return new PipelineError({ kind: "unsupported_file_type", extension, allowedExtensions });
}

/** Size is rounded to one decimal MB. */
export function fileTooLarge(fileSizeBytes: number, maxSizeMb: number): PipelineError {
  const fileSizeMb = Math.round((fileSizeBytes / (1024 * 1024)) * 10) / 10;
  return new PipelineError({ kind: "file_too_large", fileSizeMb, maxSizeMb });
}

export function transcriptionError(reason: string): PipelineError {
  return new PipelineError({ kind: "transcription", reason: `Failed to transcribe audio: ${reason}` });
}

export function analysisError(reason: string): PipelineError {
  return new PipelineError({ kind: "analysis", reason: `Failed to analyze speech: ${reason}` });
}

export function internalError(): PipelineError {
  return new PipelineError({ kind: "internal" });
}

// ─── Extraction translation table ───────────────────────────────────────────────

const EXTRACTION_TRANSLATION: Record<
  ExtractionFailureCause,
  { cause: ExtractionErrorCause; reason: string }
> = {
  timeout: {
    cause: "timeout",
    reason: "Audio extraction took too long. The video might be too long or corrupted.",
  },
  tool_missing: {
    cause: "tool_missing",
    reason: "FFmpeg is not installed or not in PATH",
  },
  non_zero_exit: {
    cause: "corrupted",
    reason: "The video file could not be decoded. It may be corrupted or use an unsupported codec.",
  },
  empty_output: {
    cause: "corrupted",
    reason: "No audio could be extracted. The video may have no audio track or be corrupted.",
  },
  missing_output: {
    cause: "corrupted",
    reason: "Video file is corrupted or empty",
  },
};

/**
 * Map any failure raised by the extraction collaborator onto an
 * `extraction` PipelineError. Unknown failures keep their message.
 */
export function translateExtractionFailure(err: unknown): PipelineError {
  if (err instanceof ExtractionFailure) {
    const entry = EXTRACTION_TRANSLATION[err.kind];
    return new PipelineError({ kind: "extraction", cause: entry.cause, reason: entry.reason });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new PipelineError({
    kind: "extraction",
    cause: "unknown",
    reason: `Failed to extract audio: ${message}`,
  });
}
