// Speech Feedback Service - Service composition
// Constructs every long-lived service once from AppConfig. The caller owns
// the returned Services and calls close() at shutdown.

import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { FfmpegAudioExtractor } from "./audio-extractor.js";
import { AugmentationClient } from "./augmentation-client.js";
import { ConfigError, type AppConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { SpeechAnalysisPipeline } from "./pipeline.js";
import { SpeechAnalyzer } from "./speech-analyzer.js";
import { TempArtifactManager } from "./temp-artifacts.js";
import {
  TranscriptionEngine,
  type DeepgramPrerecordedClient,
  type OpenAITranscriptionClient,
} from "./transcription-engine.js";
import { UploadValidator } from "./upload-validator.js";

export interface Services {
  pipeline: SpeechAnalysisPipeline;
  augmentationClient: AugmentationClient | null;
  /** Release network clients. */
  close(): void;
}

function createTranscriptionEngine(config: AppConfig): TranscriptionEngine {
  const { provider, openaiApiKey, openaiModel, deepgramApiKey, language } = config.transcription;

  if (provider === "deepgram") {
    if (!deepgramApiKey) {
      throw new ConfigError("DEEPGRAM_API_KEY", "required when TRANSCRIPTION_PROVIDER=deepgram");
    }
    const deepgramClient = createDeepgramClient(deepgramApiKey);
    return new TranscriptionEngine({
      provider: "deepgram",
      client: deepgramClient as unknown as DeepgramPrerecordedClient,
      language,
      logger: createLogger("TranscriptionEngine"),
    });
  }

  if (!openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY", "required when TRANSCRIPTION_PROVIDER=openai");
  }
  const openaiClient = new OpenAI({ apiKey: openaiApiKey });
  return new TranscriptionEngine({
    provider: "openai",
    client: openaiClient as unknown as OpenAITranscriptionClient,
    model: openaiModel,
    language,
    logger: createLogger("TranscriptionEngine"),
  });
}

function createAugmentationClient(config: AppConfig, logger: Logger): AugmentationClient | null {
  const augmentation = config.augmentation;
  if (!augmentation.enabled) {
    logger.info("Augmentation disabled");
    return null;
  }
  if (!augmentation.apiKey) {
    logger.warn("AUGMENTATION_ENABLED is set but AUGMENTATION_API_KEY is missing; augmentation disabled");
    return null;
  }
  return new AugmentationClient(augmentation, { logger: createLogger("AugmentationClient") });
}

export function createServices(config: AppConfig, logger: Logger = createLogger("Init")): Services {
  logger.info(`Initializing TranscriptionEngine (${config.transcription.provider})...`);
  const transcriber = createTranscriptionEngine(config);

  logger.info(`Initializing FfmpegAudioExtractor (${config.ffmpegPath})...`);
  const extractor = new FfmpegAudioExtractor({
    ffmpegPath: config.ffmpegPath,
    logger: createLogger("AudioExtractor"),
  });

  const augmentationClient = createAugmentationClient(config, logger);

  const pipeline = new SpeechAnalysisPipeline({
    validator: new UploadValidator(
      { allowedExtensions: config.allowedExtensions, maxFileSizeMb: config.maxFileSizeMb },
      createLogger("UploadValidator"),
    ),
    artifacts: new TempArtifactManager(undefined, createLogger("TempArtifacts")),
    extractor,
    transcriber,
    analyzer: new SpeechAnalyzer({ logger: createLogger("SpeechAnalyzer") }),
    augmenter: augmentationClient,
    extractionTimeoutMs: config.extractionTimeoutMs,
    logger: createLogger("Pipeline"),
  });

  return {
    pipeline,
    augmentationClient,
    close() {
      augmentationClient?.close();
    },
  };
}
