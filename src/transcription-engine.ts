// Speech Feedback Service - Transcription Engine
// Turns the extracted WAV file into a timestamped transcript.
//
// Two providers, both injected for testability:
//   1. OpenAI audio transcriptions (default). whisper-1 returns word and
//      segment timestamps via verbose_json; other models return text only.
//   2. Deepgram pre-recorded transcription, with word timestamps and
//      confidences.

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { File } from "node:buffer";
import type { Transcript, TranscriptSegment, TranscriptWord } from "./types.js";
import { createLogger, type Logger } from "./logger.js";

export interface Transcriber {
  transcribe(audioPath: string): Promise<Transcript>;
}

// ─── OpenAI transcription client interface (for dependency injection) ──────────

/**
 * Minimal surface of the OpenAI SDK's `audio.transcriptions.create()` we use,
 * so tests can inject a mock without the SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: string;
        timestamp_granularities?: Array<"word" | "segment">;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `text` is always present; `segments`, `words` and `duration` only with
 * verbose_json.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  segments?: Array<{
    id: number;
    start: number;
    end: number;
    text: string;
  }>;
  words?: Array<{
    word: string;
    start: number;
    end: number;
  }>;
}

// ─── Deepgram pre-recorded client interface ─────────────────────────────────────

export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: Record<string, string | number | boolean>,
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: unknown }>;
    };
  };
}

export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results: {
    channels: Array<{
      detected_language?: string;
      alternatives: Array<{
        transcript: string;
        confidence?: number;
        words?: Array<{
          word: string;
          punctuated_word?: string;
          start: number;
          end: number;
          confidence: number;
        }>;
      }>;
    }>;
  };
}

const DEFAULT_DEEPGRAM_OPTIONS = {
  model: "nova-2",
  smart_format: true,
  punctuate: true,
};

export type TranscriptionEngineOptions =
  | { provider: "openai"; client: OpenAITranscriptionClient; model?: string; language?: string | null; logger?: Logger }
  | { provider: "deepgram"; client: DeepgramPrerecordedClient; model?: string; language?: string | null; logger?: Logger };

/**
 * Whole-file transcription behind the Transcriber contract. The provider
 * response is normalized into Transcript segments with word timing when the
 * provider supplies it.
 */
export class TranscriptionEngine implements Transcriber {
  private readonly options: TranscriptionEngineOptions;
  private readonly logger: Logger;

  constructor(options: TranscriptionEngineOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("TranscriptionEngine");
  }

  get provider(): "openai" | "deepgram" {
    return this.options.provider;
  }

  async transcribe(audioPath: string): Promise<Transcript> {
    const audio = await readFile(audioPath);
    if (audio.length === 0) {
      throw new Error(`Audio file is empty: ${audioPath}`);
    }

    this.logger.info(`Transcribing ${basename(audioPath)} (${audio.length} bytes) via ${this.options.provider}`);

    const transcript =
      this.options.provider === "openai"
        ? await this.transcribeWithOpenAI(this.options.client, audio, basename(audioPath))
        : await this.transcribeWithDeepgram(this.options.client, audio);

    this.logger.info(
      `Transcription complete: ${transcript.segments.length} segments, ${transcript.text.length} chars`,
    );
    return transcript;
  }

  // ── OpenAI ─────────────────────────────────────────────────────────────────

  private async transcribeWithOpenAI(
    client: OpenAITranscriptionClient,
    audio: Buffer,
    filename: string,
  ): Promise<Transcript> {
    const model = this.options.model ?? "whisper-1";
    const audioFile = new File([audio], filename, { type: "audio/wav" });

    // Only whisper-1 supports verbose_json with timestamp granularities.
    const useVerboseJson = model === "whisper-1";
    const language = this.options.language ?? undefined;

    const response = await client.audio.transcriptions.create({
      file: audioFile,
      model,
      ...(language ? { language } : {}),
      ...(useVerboseJson
        ? {
            response_format: "verbose_json",
            timestamp_granularities: ["word", "segment"],
          }
        : {
            response_format: "json",
          }),
    });

    return parseOpenAIResponse(response);
  }

  // ── Deepgram ───────────────────────────────────────────────────────────────

  private async transcribeWithDeepgram(
    client: DeepgramPrerecordedClient,
    audio: Buffer,
  ): Promise<Transcript> {
    const language = this.options.language;
    const { result, error } = await client.listen.prerecorded.transcribeFile(audio, {
      ...DEFAULT_DEEPGRAM_OPTIONS,
      ...(this.options.model ? { model: this.options.model } : {}),
      ...(language ? { language } : { detect_language: true }),
    });

    if (error || !result) {
      const message = error instanceof Error ? error.message : String(error ?? "empty result");
      throw new Error(`Deepgram transcription failed: ${message}`);
    }

    return parseDeepgramResult(result);
  }
}

// ─── Response normalization ─────────────────────────────────────────────────────

/**
 * Three paths, most precise first:
 * 1. word timestamps (attached to segments when present),
 * 2. segment timestamps only,
 * 3. text only, as one segment spanning the reported duration.
 */
export function parseOpenAIResponse(response: OpenAITranscriptionResponse): Transcript {
  const text = response.text?.trim() ?? "";
  const durationSec = response.duration ?? null;
  const base = { text, durationSec, ...(response.language ? { language: response.language } : {}) };

  if (!text) {
    return { ...base, segments: [] };
  }

  if (response.words && response.words.length > 0) {
    return { ...base, segments: segmentsFromWords(response.words, response.segments) };
  }

  if (response.segments && response.segments.length > 0) {
    return {
      ...base,
      segments: response.segments
        .filter((seg) => seg.text.trim().length > 0)
        .map((seg) => ({
          text: seg.text.trim(),
          startTime: seg.start,
          endTime: seg.end,
          words: [],
        })),
    };
  }

  return {
    ...base,
    segments: [{ text, startTime: 0, endTime: durationSec ?? 0, words: [] }],
  };
}

function segmentsFromWords(
  words: Array<{ word: string; start: number; end: number }>,
  segments?: Array<{ id: number; start: number; end: number; text: string }>,
): TranscriptSegment[] {
  // OpenAI doesn't report per-word confidence in this format
  const allWords: TranscriptWord[] = words.map((w) => ({
    word: w.word,
    startTime: w.start,
    endTime: w.end,
    confidence: 1.0,
  }));

  if (segments && segments.length > 0) {
    return segments.map((seg) => ({
      text: seg.text.trim(),
      startTime: seg.start,
      endTime: seg.end,
      words: allWords.filter((w) => w.startTime >= seg.start && w.endTime <= seg.end),
    }));
  }

  return [
    {
      text: allWords.map((w) => w.word).join(" "),
      startTime: allWords[0].startTime,
      endTime: allWords[allWords.length - 1].endTime,
      words: allWords,
    },
  ];
}

/** Deepgram returns one alternative per channel; we read the first of each. */
export function parseDeepgramResult(result: DeepgramPrerecordedResult): Transcript {
  const channel = result.results.channels[0];
  const alternative = channel?.alternatives[0];
  const durationSec = result.metadata?.duration ?? null;
  const text = alternative?.transcript.trim() ?? "";

  if (!alternative || !text) {
    return { text: "", segments: [], durationSec };
  }

  const words: TranscriptWord[] = (alternative.words ?? []).map((w) => ({
    word: w.punctuated_word ?? w.word,
    startTime: w.start,
    endTime: w.end,
    confidence: w.confidence,
  }));

  const segment: TranscriptSegment =
    words.length > 0
      ? { text, startTime: words[0].startTime, endTime: words[words.length - 1].endTime, words }
      : { text, startTime: 0, endTime: durationSec ?? 0, words: [] };

  return {
    text,
    segments: [segment],
    durationSec,
    ...(channel.detected_language ? { language: channel.detected_language } : {}),
  };
}
