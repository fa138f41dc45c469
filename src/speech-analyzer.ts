// Speech Feedback Service - Speech Analyzer
// Computes the baseline AnalysisResult from a transcript and the extracted
// audio: duration, speaking time, pace, filler words, pauses, phrase rhythm,
// and rule-based advice.

import { open } from "node:fs/promises";
import type {
  AdviceItem,
  AnalysisResult,
  FillerWordItem,
  FillerWordsStats,
  LongPause,
  PausesStats,
  PhraseLengthClassification,
  PhraseStats,
  RhythmVariation,
  Transcript,
} from "./types.js";
import { createLogger, describeError, type Logger } from "./logger.js";

export interface Analyzer {
  analyze(transcript: Transcript, audioPath: string): Promise<AnalysisResult>;
}

// ─── Known Filler Words ─────────────────────────────────────────────────────────

const KNOWN_FILLERS = new Set([
  "um",
  "uh",
  "ah",
  "er",
  "like",
  "you know",
  "basically",
  "literally",
  "actually",
  "so",
  "right",
]);

// Single-word fillers that need contextual analysis
const CONTEXTUAL_FILLERS = new Set(["like", "so", "right", "actually"]);

const VERBS_TAKING_LIKE = new Set([
  "would", "do", "dont", "did", "didnt", "really", "i", "you", "we", "they",
  "looks", "look", "feel", "feels", "sound", "sounds", "seem", "seems",
]);

// ─── Thresholds ─────────────────────────────────────────────────────────────────

const SLOW_PACE_WPM = 100;
const FAST_PACE_WPM = 170;
const HIGH_FILLER_PER_100 = 5;
const MANY_LONG_PAUSES = 3;
const LOW_SPEAKING_RATIO = 0.6;
const SHORT_PHRASE_WORDS = 5;
const LONG_PHRASE_WORDS = 15;
const MONOTONOUS_CV = 0.25;
const VARIED_CV = 0.6;
/** WAV header scan window; ffmpeg puts fmt/LIST/data well inside it. */
const WAV_HEADER_BYTES = 64 * 1024;

/** A timed stretch of speech: one word, or a whole segment without word timing. */
interface SpeechUnit {
  start: number;
  end: number;
  wordCount: number;
}

export interface SpeechAnalyzerOptions {
  /** Minimum gap between words counted as a pause (seconds). */
  pauseThresholdSec?: number;
  /** Minimum gap reported as a long pause (seconds). */
  longPauseThresholdSec?: number;
  logger?: Logger;
}

export class SpeechAnalyzer implements Analyzer {
  private readonly pauseThreshold: number;
  private readonly longPauseThreshold: number;
  private readonly logger: Logger;

  constructor(options: SpeechAnalyzerOptions = {}) {
    this.pauseThreshold = options.pauseThresholdSec ?? 0.5;
    this.longPauseThreshold = options.longPauseThresholdSec ?? 2.0;
    this.logger = options.logger ?? createLogger("SpeechAnalyzer");
  }

  async analyze(transcript: Transcript, audioPath: string): Promise<AnalysisResult> {
    let audioDurationSec: number | null = null;
    try {
      audioDurationSec = await readWavDuration(audioPath);
    } catch (err) {
      this.logger.warn(`Could not read audio duration from ${audioPath}: ${describeError(err)}`);
    }
    return this.compute(transcript, audioDurationSec);
  }

  /**
   * Pure metric computation. `audioDurationSec` wins over the engine's
   * reported duration, which wins over the transcript's last timestamp.
   */
  compute(transcript: Transcript, audioDurationSec: number | null): AnalysisResult {
    const units = this.speechUnits(transcript);
    const lastEnd = units.length > 0 ? units[units.length - 1].end : 0;
    const durationSec = Math.max(0, audioDurationSec ?? transcript.durationSec ?? lastEnd);

    const speakingTimeSec = units.reduce((sum, u) => sum + Math.max(0, u.end - u.start), 0);
    const speakingRatio = durationSec > 0 ? Math.min(1, speakingTimeSec / durationSec) : 0;
    const wordsTotal = units.reduce((sum, u) => sum + u.wordCount, 0);
    const wordsPerMinute = durationSec > 0 ? wordsTotal / (durationSec / 60) : 0;

    const fillerWords = this.fillerStats(transcript, wordsTotal);
    const gaps = this.gaps(units);
    const pauses = this.pauseStats(gaps);
    const phrases = this.phraseStats(units);

    const result: Omit<AnalysisResult, "advice"> = {
      durationSec: round(durationSec, 2),
      speakingTimeSec: round(speakingTimeSec, 2),
      speakingRatio: round(speakingRatio, 2),
      wordsTotal,
      wordsPerMinute: round(wordsPerMinute, 1),
      fillerWords,
      pauses,
      phrases,
      transcript: transcript.text,
    };

    return { ...result, advice: buildAdvice(result) };
  }

  // ── Units & gaps ───────────────────────────────────────────────────────────

  private speechUnits(transcript: Transcript): SpeechUnit[] {
    const units: SpeechUnit[] = [];
    for (const segment of transcript.segments) {
      if (segment.words.length > 0) {
        for (const w of segment.words) {
          units.push({ start: w.startTime, end: w.endTime, wordCount: 1 });
        }
      } else {
        const wordCount = countWords(segment.text);
        if (wordCount > 0) {
          units.push({ start: segment.startTime, end: segment.endTime, wordCount });
        }
      }
    }
    return units.sort((a, b) => a.start - b.start);
  }

  private gaps(units: SpeechUnit[]): LongPause[] {
    const gaps: LongPause[] = [];
    for (let i = 1; i < units.length; i++) {
      const start = units[i - 1].end;
      const end = units[i].start;
      const duration = end - start;
      if (duration >= this.pauseThreshold) {
        gaps.push({ start, end, duration });
      }
    }
    return gaps;
  }

  // ── Pauses ─────────────────────────────────────────────────────────────────

  private pauseStats(gaps: LongPause[]): PausesStats {
    if (gaps.length === 0) {
      return { count: 0, avgSec: 0, maxSec: 0, longPauses: [] };
    }
    const total = gaps.reduce((sum, g) => sum + g.duration, 0);
    const max = Math.max(...gaps.map((g) => g.duration));
    const longPauses = gaps
      .filter((g) => g.duration >= this.longPauseThreshold)
      .sort((a, b) => b.duration - a.duration)
      .map((g) => ({ start: round(g.start, 2), end: round(g.end, 2), duration: round(g.duration, 2) }));

    return {
      count: gaps.length,
      avgSec: round(total / gaps.length, 2),
      maxSec: round(max, 2),
      longPauses,
    };
  }

  // ── Phrases ────────────────────────────────────────────────────────────────

  private phraseStats(units: SpeechUnit[]): PhraseStats {
    const phrases: SpeechUnit[] = [];
    let current: SpeechUnit | null = null;

    for (const unit of units) {
      if (current && unit.start - current.end < this.pauseThreshold) {
        current.end = Math.max(current.end, unit.end);
        current.wordCount += unit.wordCount;
      } else {
        current = { ...unit };
        phrases.push(current);
      }
    }

    if (phrases.length === 0) {
      return {
        count: 0,
        avgWords: 0,
        avgDurationSec: 0,
        lengthClassification: "none",
        rhythmVariation: "none",
      };
    }

    const avgWords = phrases.reduce((sum, p) => sum + p.wordCount, 0) / phrases.length;
    const durations = phrases.map((p) => p.end - p.start);
    const avgDuration = durations.reduce((sum, d) => sum + d, 0) / durations.length;

    return {
      count: phrases.length,
      avgWords: round(avgWords, 1),
      avgDurationSec: round(avgDuration, 2),
      lengthClassification: classifyPhraseLength(avgWords),
      rhythmVariation: phrases.length < 2 ? "none" : classifyRhythm(coefficientOfVariation(durations)),
    };
  }

  // ── Fillers ────────────────────────────────────────────────────────────────

  private fillerStats(transcript: Transcript, wordsTotal: number): FillerWordsStats {
    const counts = new Map<string, number>();
    const add = (word: string) => counts.set(word, (counts.get(word) ?? 0) + 1);

    for (const segment of transcript.segments) {
      if (segment.words.length > 0) {
        const tokens = segment.words.map((w) => normalizeToken(w.word));
        detectFillers(tokens, true, add);
      } else {
        // Without word timing, contextual words can't be classified
        const tokens = segment.text.split(/\s+/).map(normalizeToken).filter((t) => t.length > 0);
        detectFillers(tokens, false, add);
      }
    }

    const items: FillerWordItem[] = [...counts.entries()]
      .map(([word, count]) => ({ word, count }))
      .sort((a, b) => b.count - a.count || a.word.localeCompare(b.word));
    const total = items.reduce((sum, i) => sum + i.count, 0);

    return {
      total,
      per100Words: wordsTotal > 0 ? round((total / wordsTotal) * 100, 1) : 0,
      items,
    };
  }
}

// ─── Filler detection ───────────────────────────────────────────────────────────

function normalizeToken(word: string): string {
  return word.toLowerCase().replace(/[^a-z]/g, "");
}

function detectFillers(tokens: string[], contextual: boolean, add: (word: string) => void): void {
  for (let i = 0; i < tokens.length; i++) {
    const word = tokens[i];
    if (!word) continue;

    // Two-word fillers first ("you know")
    if (i < tokens.length - 1) {
      const twoWord = `${word} ${tokens[i + 1]}`;
      if (KNOWN_FILLERS.has(twoWord)) {
        add(twoWord);
        i++;
        continue;
      }
    }

    if (!KNOWN_FILLERS.has(word)) continue;

    if (CONTEXTUAL_FILLERS.has(word)) {
      if (contextual && isFillerInContext(word, tokens, i)) {
        add(word);
      }
    } else {
      add(word);
    }
  }
}

function isFillerInContext(word: string, tokens: string[], index: number): boolean {
  switch (word) {
    case "like":
      // "I, like, went" vs "I like pizza"
      if (index === 0) return false;
      return !VERBS_TAKING_LIKE.has(tokens[index - 1]);
    case "so":
    case "actually":
      return index === 0;
    case "right":
      return index === 0 || index === tokens.length - 1;
    default:
      return false;
  }
}

// ─── Classification & advice ────────────────────────────────────────────────────

function classifyPhraseLength(avgWords: number): PhraseLengthClassification {
  if (avgWords < SHORT_PHRASE_WORDS) return "short";
  if (avgWords <= LONG_PHRASE_WORDS) return "medium";
  return "long";
}

function classifyRhythm(cv: number): RhythmVariation {
  if (cv < MONOTONOUS_CV) return "monotonous";
  if (cv < VARIED_CV) return "moderate";
  return "varied";
}

/** Rule-based recommendations derived from the computed metrics. */
export function buildAdvice(metrics: Omit<AnalysisResult, "advice">): AdviceItem[] {
  if (metrics.wordsTotal === 0) {
    return [
      {
        category: "engagement",
        severity: "warning",
        title: "No speech detected",
        observation: "The recording contains no recognizable speech.",
        recommendation: "Check that the microphone was on and the video has an audio track.",
      },
    ];
  }

  const advice: AdviceItem[] = [];
  const wpm = metrics.wordsPerMinute;

  if (wpm < SLOW_PACE_WPM) {
    advice.push({
      category: "pace",
      severity: "suggestion",
      title: "Pick up the pace",
      observation: `You spoke at ${wpm.toFixed(1)} words per minute, below the ${SLOW_PACE_WPM}-${FAST_PACE_WPM} range most audiences follow comfortably.`,
      recommendation: "Rehearse with a timer and aim for a slightly brisker delivery in the body of the talk.",
    });
  } else if (wpm > FAST_PACE_WPM) {
    advice.push({
      category: "pace",
      severity: "warning",
      title: "Slow down",
      observation: `You spoke at ${wpm.toFixed(1)} words per minute, above the ${SLOW_PACE_WPM}-${FAST_PACE_WPM} range most audiences follow comfortably.`,
      recommendation: "Pause after key points and let important sentences land before moving on.",
    });
  }

  if (metrics.fillerWords.per100Words > HIGH_FILLER_PER_100) {
    const top = metrics.fillerWords.items
      .slice(0, 3)
      .map((i) => `"${i.word}" (${i.count})`)
      .join(", ");
    advice.push({
      category: "fillers",
      severity: "warning",
      title: "Reduce filler words",
      observation: `${metrics.fillerWords.per100Words.toFixed(1)} filler words per 100 words. Most frequent: ${top}.`,
      recommendation: "Replace fillers with a short silent pause; record yourself and count them on playback.",
    });
  }

  if (metrics.pauses.longPauses.length >= MANY_LONG_PAUSES) {
    advice.push({
      category: "pauses",
      severity: "suggestion",
      title: "Shorten long pauses",
      observation: `${metrics.pauses.longPauses.length} pauses were longer than expected, the longest ${metrics.pauses.maxSec.toFixed(1)} s.`,
      recommendation: "Keep notes close at hand and rehearse the transitions between sections.",
    });
  }

  if (metrics.speakingRatio < LOW_SPEAKING_RATIO) {
    advice.push({
      category: "engagement",
      severity: "suggestion",
      title: "Keep the audience engaged",
      observation: `You were speaking ${(metrics.speakingRatio * 100).toFixed(0)}% of the time.`,
      recommendation: "Plan what fills each silence, such as a question to the audience or a visual.",
    });
  }

  if (metrics.phrases.rhythmVariation === "monotonous") {
    advice.push({
      category: "phrasing",
      severity: "suggestion",
      title: "Vary your rhythm",
      observation: "Your phrases were very uniform in length.",
      recommendation: "Mix short punchy sentences with longer explanations to hold attention.",
    });
  }

  if (advice.length === 0) {
    advice.push({
      category: "pace",
      severity: "info",
      title: "Solid delivery",
      observation: "Pace, pauses and filler words are all within comfortable ranges.",
      recommendation: "Keep practicing to make the delivery feel natural.",
    });
  }

  return advice;
}

// ─── Numeric helpers ────────────────────────────────────────────────────────────

function countWords(text: string): number {
  return text.trim().split(/\s+/).filter((w) => w.length > 0).length;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Population stddev / mean. 0 for fewer than two values or a zero mean. */
export function coefficientOfVariation(values: number[]): number {
  if (values.length <= 1) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  if (mean === 0) return 0;
  const variance = values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return Math.sqrt(variance) / mean;
}

// ─── WAV header ─────────────────────────────────────────────────────────────────

/**
 * Duration in seconds of a PCM WAV file from its RIFF header, or null when
 * the header is not a recognizable WAV. A data chunk size that is unset or
 * overruns the file is clamped to the bytes actually present.
 */
export function parseWavDuration(header: Buffer, fileSize: number): number | null {
  if (header.length < 12) return null;
  if (header.toString("ascii", 0, 4) !== "RIFF" || header.toString("ascii", 8, 12) !== "WAVE") {
    return null;
  }

  let byteRate: number | null = null;
  let offset = 12;

  while (offset + 8 <= header.length) {
    const id = header.toString("ascii", offset, offset + 4);
    const size = header.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt " && body + 12 <= header.length) {
      byteRate = header.readUInt32LE(body + 8);
    } else if (id === "data") {
      if (!byteRate) return null;
      const available = Math.max(0, fileSize - body);
      const dataSize = Math.min(size, available);
      return dataSize / byteRate;
    }

    // Chunks are word-aligned
    offset = body + size + (size % 2);
  }

  return null;
}

export async function readWavDuration(path: string): Promise<number | null> {
  const handle = await open(path, "r");
  try {
    const { size } = await handle.stat();
    const buffer = Buffer.alloc(Math.min(WAV_HEADER_BYTES, size));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    return parseWavDuration(buffer.subarray(0, bytesRead), size);
  } finally {
    await handle.close();
  }
}
