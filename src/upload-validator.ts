// Speech Feedback Service - Upload validation
// Checks an upload's extension against the allow-list and its size against
// the configured maximum, before anything touches the disk.

import { extname } from "node:path";
import { fileTooLarge, unsupportedFileType } from "./errors.js";
import { createLogger, describeError, type Logger } from "./logger.js";
import type { ValidationConfig } from "./types.js";
import type { UploadFile } from "./upload-file.js";

const BYTES_PER_MB = 1024 * 1024;

export type SizeSource = "reported" | "measured" | "read";

export interface ResolvedSize {
  bytes: number;
  source: SizeSource;
}

/**
 * Extension of `filename`, lowercased with its leading dot, or "" when the
 * name has none. Dotfiles like ".mp4" count as having no extension.
 */
export function fileExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * @throws PipelineError(unsupported_file_type) for a missing filename, a
 *   missing extension, or one outside the allow-list.
 */
export function validateExtension(filename: string | null, config: ValidationConfig): string {
  if (!filename) {
    throw unsupportedFileType("unknown", config.allowedExtensions);
  }
  const ext = fileExtension(filename);
  if (!ext) {
    throw unsupportedFileType("no extension", config.allowedExtensions);
  }
  if (!config.allowedExtensions.includes(ext)) {
    throw unsupportedFileType(ext, config.allowedExtensions);
  }
  return ext;
}

/**
 * Resolve the upload size using the cheapest method that works:
 * reported size, then seek-to-end, then a full read (which leaves the
 * content buffered and the cursor at the start). Null when nothing works.
 */
export async function resolveUploadSize(
  upload: UploadFile,
  logger: Logger,
): Promise<ResolvedSize | null> {
  if (upload.size !== null && Number.isFinite(upload.size) && upload.size >= 0) {
    logger.debug(`File size from attribute: ${upload.size} bytes`);
    return { bytes: upload.size, source: "reported" };
  }

  if (upload.seekable) {
    try {
      const measured = await upload.measure();
      if (measured !== null) {
        logger.debug(`File size from seek/tell: ${measured} bytes`);
        return { bytes: measured, source: "measured" };
      }
    } catch (err) {
      logger.warn(`Could not determine file size via seek/tell: ${describeError(err)}`);
    }
  }

  logger.warn("File size unknown, reading file to determine size...");
  try {
    const content = await upload.readAll();
    logger.debug(`File size from reading content: ${content.length} bytes`);
    return { bytes: content.length, source: "read" };
  } catch (err) {
    logger.error(`Failed to read file for size check: ${describeError(err)}`);
    return null;
  }
}

export class UploadValidator {
  private readonly config: ValidationConfig;
  private readonly logger: Logger;

  constructor(config: ValidationConfig, logger: Logger = createLogger("UploadValidator")) {
    this.config = config;
    this.logger = logger;
  }

  async validate(upload: UploadFile): Promise<void> {
    await validateUpload(upload, this.config, this.logger);
  }
}

/**
 * Validate extension, then size. An undeterminable size skips the size
 * check with a warning.
 *
 * @throws PipelineError(unsupported_file_type | file_too_large)
 */
export async function validateUpload(
  upload: UploadFile,
  config: ValidationConfig,
  logger: Logger,
): Promise<void> {
  validateExtension(upload.filename, config);

  const maxBytes = config.maxFileSizeMb * BYTES_PER_MB;
  const size = await resolveUploadSize(upload, logger);

  if (size === null) {
    logger.warn("Could not determine file size, skipping size validation");
    return;
  }

  if (size.bytes > maxBytes) {
    throw fileTooLarge(size.bytes, config.maxFileSizeMb);
  }

  logger.info(`File size OK: ${(size.bytes / BYTES_PER_MB).toFixed(2)} MB`);
}
