// Speech Feedback Service - Configuration
//
// Reads process environment (populated from .env by dotenv in index.ts) into a
// typed, read-only AppConfig. Invalid values fail fast with the variable name.

import { isLogLevel, type LogLevel } from "./logger.js";

export type TranscriptionProvider = "openai" | "deepgram";

export interface AugmentationConfig {
  enabled: boolean;
  /** Pre-encoded Basic credentials for the auth endpoint. */
  apiKey: string | null;
  authUrl: string;
  apiUrl: string;
  model: string;
  scope: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  verifyTls: boolean;
  /** Opt-in: rebuild the transport without TLS verification after a certificate failure. */
  allowInsecureTlsFallback: boolean;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  ffmpegPath: string;
  extractionTimeoutMs: number;
  maxFileSizeMb: number;
  allowedExtensions: string[];
  transcription: {
    provider: TranscriptionProvider;
    openaiApiKey: string | null;
    openaiModel: string;
    deepgramApiKey: string | null;
    language: string | null;
  };
  augmentation: AugmentationConfig;
}

export const DEFAULT_ALLOWED_EXTENSIONS = [
  ".mp4",
  ".mov",
  ".avi",
  ".mkv",
  ".webm",
  ".flv",
  ".wmv",
  ".m4v",
];

const MAX_FILE_SIZE_CEILING_MB = 1024;

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

// ─── Parsers ────────────────────────────────────────────────────────────────────

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;
  throw new ConfigError(name, `expected a boolean, got "${raw}"`);
}

/** Lowercase and dot-prefix an extension: "MP4" → ".mp4". */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Accepts a JSON array (`[".mp4", "mov"]`) or a comma-separated list
 * (`mp4, .MOV`). Entries are normalized; blanks dropped.
 */
export function parseExtensionList(raw: string): string[] {
  let entries: string[] | null = null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      entries = parsed.filter((e): e is string => typeof e === "string");
    }
  } catch {
    // not JSON, fall through to comma-separated
  }
  entries ??= raw.split(",");
  return entries
    .map((e) => e.trim())
    .filter((e) => e.length > 0)
    .map(normalizeExtension);
}

// Windows absolute paths configured on another platform are ignored.
const windowsAbsolutePathPattern = /^[a-zA-Z]:\\/;

export function resolveBinaryPath(
  configured: string | null,
  fallback: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (!configured) return fallback;
  if (platform !== "win32" && windowsAbsolutePathPattern.test(configured)) {
    return fallback;
  }
  return configured;
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = readInteger(env, "PORT", 3000);
  if (port < 0 || port > 65535) {
    throw new ConfigError("PORT", `out of range: ${port}`);
  }

  const maxFileSizeMb = readInteger(env, "MAX_FILE_SIZE_MB", 100);
  if (maxFileSizeMb <= 0) {
    throw new ConfigError("MAX_FILE_SIZE_MB", "must be positive");
  }
  if (maxFileSizeMb > MAX_FILE_SIZE_CEILING_MB) {
    throw new ConfigError("MAX_FILE_SIZE_MB", `cannot exceed ${MAX_FILE_SIZE_CEILING_MB} (1GB)`);
  }

  const rawExtensions = readString(env, "ALLOWED_VIDEO_EXTENSIONS");
  const allowedExtensions = rawExtensions
    ? parseExtensionList(rawExtensions)
    : [...DEFAULT_ALLOWED_EXTENSIONS];
  if (allowedExtensions.length === 0) {
    throw new ConfigError("ALLOWED_VIDEO_EXTENSIONS", "must list at least one extension");
  }

  const extractionTimeoutSeconds = readInteger(env, "EXTRACTION_TIMEOUT_SECONDS", 300);
  if (extractionTimeoutSeconds <= 0) {
    throw new ConfigError("EXTRACTION_TIMEOUT_SECONDS", "must be positive");
  }

  const rawLogLevel = (readString(env, "LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(rawLogLevel)) {
    throw new ConfigError("LOG_LEVEL", `unknown level "${rawLogLevel}"`);
  }

  const provider = (readString(env, "TRANSCRIPTION_PROVIDER") ?? "openai").toLowerCase();
  if (provider !== "openai" && provider !== "deepgram") {
    throw new ConfigError("TRANSCRIPTION_PROVIDER", `expected "openai" or "deepgram", got "${provider}"`);
  }

  const augmentationTimeoutSeconds = readInteger(env, "AUGMENTATION_TIMEOUT_SECONDS", 30);
  const maxTokens = readInteger(env, "AUGMENTATION_MAX_TOKENS", 2000);
  if (augmentationTimeoutSeconds <= 0) {
    throw new ConfigError("AUGMENTATION_TIMEOUT_SECONDS", "must be positive");
  }
  if (maxTokens <= 0) {
    throw new ConfigError("AUGMENTATION_MAX_TOKENS", "must be positive");
  }

  return {
    port,
    logLevel: rawLogLevel,
    ffmpegPath: resolveBinaryPath(
      readString(env, "FFMPEG_PATH") ?? readString(env, "FFMPEG_BIN"),
      "ffmpeg",
    ),
    extractionTimeoutMs: extractionTimeoutSeconds * 1000,
    maxFileSizeMb,
    allowedExtensions,
    transcription: {
      provider,
      openaiApiKey: readString(env, "OPENAI_API_KEY"),
      openaiModel: readString(env, "OPENAI_TRANSCRIPTION_MODEL") ?? "whisper-1",
      deepgramApiKey: readString(env, "DEEPGRAM_API_KEY"),
      language: readString(env, "TRANSCRIPTION_LANGUAGE"),
    },
    augmentation: {
      enabled: readBoolean(env, "AUGMENTATION_ENABLED", false),
      apiKey: readString(env, "AUGMENTATION_API_KEY"),
      authUrl:
        readString(env, "AUGMENTATION_AUTH_URL") ??
        "https://ngw.devices.sberbank.ru:9443/api/v2/oauth",
      apiUrl:
        readString(env, "AUGMENTATION_API_URL") ??
        "https://gigachat.devices.sberbank.ru/api/v1",
      model: readString(env, "AUGMENTATION_MODEL") ?? "GigaChat",
      scope: readString(env, "AUGMENTATION_SCOPE") ?? "GIGACHAT_API_PERS",
      timeoutMs: augmentationTimeoutSeconds * 1000,
      maxTokens,
      temperature: 0.7,
      verifyTls: readBoolean(env, "AUGMENTATION_VERIFY_TLS", true),
      allowInsecureTlsFallback: readBoolean(env, "AUGMENTATION_ALLOW_INSECURE_TLS_FALLBACK", false),
    },
  };
}
