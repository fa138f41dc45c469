// Speech Feedback Service - Shared TypeScript interfaces and types
//
// Pure type barrel: runtime helpers live in their own modules so importing
// this file never pulls in code.

// ─── Pipeline State Machine ─────────────────────────────────────────────────────

export enum PipelineState {
  VALIDATING = "validating",
  SAVING = "saving",
  EXTRACTING = "extracting",
  TRANSCRIBING = "transcribing",
  ANALYZING = "analyzing",
  AUGMENTING = "augmenting",
  DONE = "done",
  FAILED = "failed",
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptWord {
  word: string;
  startTime: number; // seconds from start of audio
  endTime: number;
  confidence: number;
}

export interface TranscriptSegment {
  text: string;
  startTime: number;
  endTime: number;
  words: TranscriptWord[]; // empty when the engine only returned segment timing
}

export interface Transcript {
  text: string;
  segments: TranscriptSegment[];
  /** Audio duration reported by the engine, when it reports one. */
  durationSec: number | null;
  language?: string;
}

// ─── Analysis Result ────────────────────────────────────────────────────────────

export interface FillerWordItem {
  word: string;
  count: number;
}

export interface FillerWordsStats {
  total: number;
  per100Words: number;
  items: FillerWordItem[]; // sorted by count, highest first
}

export interface LongPause {
  start: number;
  end: number;
  duration: number;
}

export interface PausesStats {
  count: number;
  avgSec: number;
  maxSec: number;
  longPauses: LongPause[]; // longest first
}

export type PhraseLengthClassification = "short" | "medium" | "long" | "none";
export type RhythmVariation = "monotonous" | "moderate" | "varied" | "none";

export interface PhraseStats {
  count: number;
  avgWords: number;
  avgDurationSec: number;
  lengthClassification: PhraseLengthClassification;
  rhythmVariation: RhythmVariation;
}

export type AdviceCategory = "pace" | "fillers" | "pauses" | "phrasing" | "engagement";
export type AdviceSeverity = "info" | "suggestion" | "warning";

export interface AdviceItem {
  category: AdviceCategory;
  severity: AdviceSeverity;
  title: string;
  observation: string;
  recommendation: string;
}

/** Narrative assessment produced by the remote language-model service. */
export interface Augmentation {
  overallAssessment: string;
  strengths: string[];
  areasForImprovement: string[];
  recommendations: string[];
  insights: string[];
  confidenceScore: number; // [0, 1]
}

/**
 * Baseline metrics plus the optional augmentation. Treated as immutable:
 * the orchestrator replaces the object when attaching an augmentation.
 */
export interface AnalysisResult {
  readonly durationSec: number;
  readonly speakingTimeSec: number;
  readonly speakingRatio: number;
  readonly wordsTotal: number;
  readonly wordsPerMinute: number;
  readonly fillerWords: FillerWordsStats;
  readonly pauses: PausesStats;
  readonly phrases: PhraseStats;
  readonly advice: AdviceItem[];
  readonly transcript: string;
  readonly augmentation?: Augmentation;
}

// ─── Augmentation Outcome ───────────────────────────────────────────────────────

export type AugmentationSkipReason = "disabled" | "not_configured";

export type AugmentationFailureReason =
  | "rate_limited"
  | "auth_failed"
  | "network"
  | "empty_response"
  | "unexpected"
  | `http_${number}`;

export type AugmentationOutcome =
  | { status: "succeeded"; augmentation: Augmentation }
  | { status: "skipped"; reason: AugmentationSkipReason }
  | { status: "failed"; reason: AugmentationFailureReason; message: string };

// ─── Temporary Artifacts ────────────────────────────────────────────────────────

export interface UploadArtifact {
  videoPath: string;
  audioPath: string;
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export interface ValidationConfig {
  /** Lowercase, dot-prefixed (".mp4"). */
  allowedExtensions: readonly string[];
  maxFileSizeMb: number;
}
