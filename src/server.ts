// Speech Feedback Service - Express Server
// HTTP surface over the analysis pipeline:
//   GET  /                 service description
//   GET  /health           liveness
//   POST /api/v1/analyze   multipart upload (field "file") → AnalysisResult
//
// Any origin may call the API (CORS, with the OPTIONS preflight answered).
// Multer rejects an unsupported extension before writing anything, then
// spools the upload to its own temp directory; that file is removed after
// every request regardless of outcome.

import cors, { type CorsOptions } from "cors";
import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import multer from "multer";
import { createServer, type Server as HttpServer } from "node:http";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { fileTooLarge, internalError, isPipelineError, PipelineError } from "./errors.js";
import { createLogger, describeError, type Logger } from "./logger.js";
import type { SpeechAnalysisPipeline } from "./pipeline.js";
import { UploadFile } from "./upload-file.js";
import { validateExtension } from "./upload-validator.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const SERVICE_NAME = "Speech Feedback Service";
export const UPLOAD_FIELD = "file";

const BYTES_PER_MB = 1024 * 1024;

const CORS_OPTIONS: CorsOptions = {
  origin: "*",
  methods: ["GET", "POST", "OPTIONS"],
  maxAge: 86400,
  optionsSuccessStatus: 204,
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface ServerConfig {
  maxFileSizeMb: number;
  allowedExtensions: readonly string[];
}

export interface CreateServerOptions {
  pipeline: Pick<SpeechAnalysisPipeline, "analyzeUpload" | "augmentationEnabled">;
  config: ServerConfig;
  /** Reported by GET /. */
  version?: string;
  logger?: Logger;
  /** Where multer spools uploads. Defaults to a directory under the OS temp dir. */
  uploadDir?: string;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Stop accepting connections and drop idle keep-alive sockets. */
  close(): Promise<void>;
}

export interface ErrorBody {
  detail: string;
  error_type: string;
}

function sendError(res: Response, status: number, body: ErrorBody): void {
  res.status(status).json(body);
}

function sendPipelineError(res: Response, err: PipelineError): void {
  sendError(res, err.statusCode, { detail: err.message, error_type: err.name });
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    pipeline,
    config,
    version = "0.1.0",
    logger = createLogger("Server"),
    uploadDir = path.join(tmpdir(), "speech-feedback-uploads"),
  } = options;

  const maxBytes = config.maxFileSizeMb * BYTES_PER_MB;

  const upload = multer({
    storage: multer.diskStorage({
      destination: uploadDir,
      filename: (_req, file, cb) => {
        const ext = path.extname(file.originalname || "").toLowerCase();
        cb(null, `upload-${uuidv4()}${ext}`);
      },
    }),
    // One byte over the limit so an exactly-at-limit file still passes
    limits: { fileSize: maxBytes + 1, files: 1 },
    fileFilter: (_req, file, cb) => {
      try {
        validateExtension(file.originalname || null, config);
        cb(null, true);
      } catch (err) {
        cb(err instanceof Error ? err : new Error(describeError(err)));
      }
    },
  }).single(UPLOAD_FIELD);

  const app = express();
  const httpServer = createServer(app);

  app.use(cors(CORS_OPTIONS));
  app.options("*", cors(CORS_OPTIONS));

  app.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version,
      endpoints: {
        analyze: "POST /api/v1/analyze",
        health: "GET /health",
      },
      features: {
        augmentation: pipeline.augmentationEnabled,
        max_file_size_mb: config.maxFileSizeMb,
        supported_formats: [...config.allowedExtensions],
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/v1/analyze", (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err) {
        handleUploadError(req, res, err);
        return;
      }
      handleAnalyze(req, res).catch(next);
    });
  });

  const handleUploadError = (req: Request, res: Response, err: unknown): void => {
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        const declared = Number(req.headers["content-length"]);
        const bytes = Number.isFinite(declared) && declared > maxBytes ? declared : maxBytes + 1;
        const tooLarge = fileTooLarge(bytes, config.maxFileSizeMb);
        logger.warn(`Upload rejected: ${tooLarge.message}`);
        sendPipelineError(res, tooLarge);
        return;
      }
      logger.warn(`Upload rejected: ${err.message}`);
      sendError(res, 400, { detail: err.message, error_type: "BadRequestError" });
      return;
    }
    if (isPipelineError(err)) {
      logger.warn(`Upload rejected: ${err.message}`);
      sendPipelineError(res, err);
      return;
    }
    logger.error(`Upload failed: ${describeError(err)}`);
    sendPipelineError(res, internalError());
  };

  const handleAnalyze = async (req: Request, res: Response): Promise<void> => {
    const file = req.file;
    if (!file) {
      sendError(res, 400, {
        detail: `No file uploaded. Send the video in the '${UPLOAD_FIELD}' form field.`,
        error_type: "BadRequestError",
      });
      return;
    }

    logger.info(`Received file: ${file.originalname} (${file.size} bytes)`);
    try {
      const result = await pipeline.analyzeUpload(
        UploadFile.fromPath(file.originalname || null, file.path, file.size),
      );
      res.json(result);
    } catch (err) {
      sendPipelineError(res, isPipelineError(err) ? err : internalError());
    } finally {
      await rm(file.path, { force: true }).catch((rmErr: unknown) => {
        logger.warn(`Failed to delete upload ${file.path}: ${describeError(rmErr)}`);
      });
    }
  };

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    logger.error(`Unhandled request error: ${describeError(err)}`);
    if (res.headersSent) return;
    sendPipelineError(res, internalError());
  };
  app.use(errorHandler);

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        httpServer.closeIdleConnections();
      });
    },
  };
}
