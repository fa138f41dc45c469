// Speech Feedback Service - AI Augmentation Client
// Layers a narrative assessment from a remote language-model service onto a
// baseline AnalysisResult.
//
// Owns:
//   - the cached bearer token (shared by every request using this client),
//   - the HTTP transport and its TLS verification mode,
//   - tolerant parsing of the completion reply.
//
// augment() never rejects: every failure comes back as an
// AugmentationOutcome value.

import https from "node:https";
import axios, { type AxiosAdapter } from "axios";
import { v4 as uuidv4 } from "uuid";
import type { AugmentationConfig } from "./config.js";
import { createLogger, describeError, type Logger } from "./logger.js";
import type {
  AnalysisResult,
  Augmentation,
  AugmentationFailureReason,
  AugmentationOutcome,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** A token this close to expiry is refreshed before use. */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;
export const AUTH_RETRY_DELAY_MS = 30_000;
export const MAX_PROMPT_TRANSCRIPT_CHARS = 3000;
export const TRUNCATION_MARKER = "... [transcript truncated]";
export const DEGRADED_CONFIDENCE = 0.3;

const DEGRADED_ASSESSMENT_CHARS = 500;
const DEGRADED_RECOMMENDATION_CHARS = 1000;
/** expires_at values above this are epoch milliseconds, not seconds. */
const EPOCH_MS_THRESHOLD = 1e12;

const TLS_VERIFICATION_CODES = new Set([
  "SELF_SIGNED_CERT_IN_CHAIN",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "CERT_SIGNATURE_FAILURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const SYSTEM_PROMPT = `You are an expert coach in public speaking and rhetoric.
Analyze the speech using the metrics and transcript provided.
Give a detailed, personalized assessment.
Reply with JSON only, using exactly this structure:
{
  "overall_assessment": "string - overall assessment",
  "strengths": ["array of strings - strengths"],
  "areas_for_improvement": ["array of strings - areas to work on"],
  "detailed_recommendations": ["array of strings - concrete recommendations"],
  "key_insights": ["array of strings - key insights"],
  "confidence_score": number between 0 and 1
}`;

// ─── HTTP transport ─────────────────────────────────────────────────────────────

export type TlsMode = "verified" | "unverified";

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * The one HTTP seam of the client. Non-2xx statuses resolve; only
 * connection-level failures reject.
 */
export interface HttpTransport {
  post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse>;
  close(): void;
}

export interface AxiosTransportOptions {
  timeoutMs: number;
  tlsMode: TlsMode;
  /** Replaces axios' network adapter (tests). */
  adapter?: AxiosAdapter;
}

export function createAxiosTransport(options: AxiosTransportOptions): HttpTransport {
  const agent = new https.Agent({
    keepAlive: true,
    rejectUnauthorized: options.tlsMode === "verified",
  });
  const client = axios.create({
    timeout: options.timeoutMs,
    httpsAgent: agent,
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  return {
    async post(url, body, headers) {
      const response = await client.post<unknown>(url, body, { headers });
      return { status: response.status, data: response.data };
    },
    close() {
      agent.destroy();
    },
  };
}

function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

/** True when `err` (or its cause) carries a certificate-verification error code. */
export function isTlsVerificationError(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== null && TLS_VERIFICATION_CODES.has(code)) return true;
  if (typeof err === "object" && err !== null && "cause" in err) {
    const causeCode = errorCode(err.cause);
    return causeCode !== null && TLS_VERIFICATION_CODES.has(causeCode);
  }
  return false;
}

// ─── Authentication ─────────────────────────────────────────────────────────────

export type AuthenticationErrorKind =
  | "rate_limited"
  | "rejected"
  | "missing_token"
  | "network"
  | "not_configured";

export class AuthenticationError extends Error {
  readonly kind: AuthenticationErrorKind;
  readonly status: number | null;
  readonly body: string | null;

  constructor(
    kind: AuthenticationErrorKind,
    message: string,
    status: number | null = null,
    body: string | null = null,
  ) {
    super(message);
    this.name = "AuthenticationError";
    this.kind = kind;
    this.status = status;
    this.body = body;
  }
}

interface TokenState {
  accessToken: string;
  /** Null when the auth endpoint reported no expiry: good for one call. */
  expiresAtMs: number | null;
}

function describeBody(data: unknown): string {
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data) ?? "";
  } catch {
    return String(data);
  }
}

function toExpiryMs(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return null;
  return value > EPOCH_MS_THRESHOLD ? value : value * 1000;
}

function parseTokenResponse(data: unknown): TokenState | null {
  if (typeof data !== "object" || data === null || !("access_token" in data)) return null;
  const accessToken = data.access_token;
  if (typeof accessToken !== "string" || accessToken.length === 0) return null;
  const expiresAt = "expires_at" in data ? data.expires_at : undefined;
  return { accessToken, expiresAtMs: toExpiryMs(expiresAt) };
}

// ─── Prompt ─────────────────────────────────────────────────────────────────────

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/** The user message sent with every augmentation request. */
export function buildAnalysisPrompt(result: AnalysisResult): string {
  const transcript =
    result.transcript.length > MAX_PROMPT_TRANSCRIPT_CHARS
      ? `${result.transcript.slice(0, MAX_PROMPT_TRANSCRIPT_CHARS)}${TRUNCATION_MARKER}`
      : result.transcript;

  const fillerItems = result.fillerWords.items
    .filter((item) => item.count > 0)
    .slice(0, 5)
    .map((item) => `- ${item.word}: ${item.count} times`);

  const longPauses = result.pauses.longPauses
    .slice(0, 3)
    .map((p) => `- ${p.duration.toFixed(1)} s (from ${p.start.toFixed(1)} to ${p.end.toFixed(1)})`);

  const advice = result.advice.map((a) => `- ${a.title}: ${a.observation}`);

  const lines = [
    "Analyze this public speech:",
    "",
    "=== TRANSCRIPT ===",
    transcript,
    "",
    "=== METRICS ===",
    `Duration: ${result.durationSec.toFixed(1)} seconds`,
    `Speaking time: ${result.speakingTimeSec.toFixed(1)} seconds`,
    `Speaking ratio: ${percent(result.speakingRatio)}`,
    `Pace: ${result.wordsPerMinute.toFixed(1)} words per minute`,
    `Total words: ${result.wordsTotal}`,
    "",
    `Filler words: ${result.fillerWords.total} (${result.fillerWords.per100Words.toFixed(1)} per 100 words)`,
    ...(fillerItems.length > 0 ? ["Most frequent:", ...fillerItems] : []),
    "",
    `Pauses: ${result.pauses.count}`,
    `Average pause: ${result.pauses.avgSec.toFixed(1)} seconds`,
    `Longest pause: ${result.pauses.maxSec.toFixed(1)} seconds`,
    ...(longPauses.length > 0 ? ["Long pauses:", ...longPauses] : []),
    "",
    `Phrases: ${result.phrases.count}`,
    `Average phrase length: ${result.phrases.avgWords.toFixed(1)} words`,
    `Phrase length classification: ${result.phrases.lengthClassification}`,
    `Rhythm variation: ${result.phrases.rhythmVariation}`,
    "",
    "=== STANDARD RECOMMENDATIONS ===",
    ...advice,
    "",
    "Give a detailed assessment in the context of public speaking. Consider:",
    "1. Clarity and structure of the argument",
    "2. Emotional coloring of the speech",
    "3. Persuasiveness",
    "4. Engagement with the audience (based on pauses and pace)",
    "5. Vocabulary and terminology",
    "6. Overall impression",
    "",
    "Return the answer strictly as JSON, as described in the system message.",
  ];

  return lines.join("\n");
}

// ─── Reply parsing ──────────────────────────────────────────────────────────────

export type AugmentationParseMode = "strict" | "extracted" | "degraded";

export interface ParsedAugmentation {
  augmentation: Augmentation;
  mode: AugmentationParseMode;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function stringList(value: unknown): string[] | null {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return null;
  return value.filter((v): v is string => typeof v === "string");
}

/** Shape check of a parsed reply; null when it is not an augmentation. */
function toAugmentation(value: unknown): Augmentation | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;

  const record: Record<string, unknown> = { ...value };
  const overall = record.overall_assessment;
  const confidence = record.confidence_score;
  if (typeof overall !== "string" || typeof confidence !== "number" || !Number.isFinite(confidence)) {
    return null;
  }

  const strengths = stringList(record.strengths);
  const areas = stringList(record.areas_for_improvement);
  const recommendations = stringList(record.detailed_recommendations ?? record.recommendations);
  const insights = stringList(record.key_insights ?? record.insights);
  if (!strengths || !areas || !recommendations || !insights) return null;

  return {
    overallAssessment: overall,
    strengths,
    areasForImprovement: areas,
    recommendations,
    insights,
    confidenceScore: Math.min(1, Math.max(0, confidence)),
  };
}

/**
 * Three branches, never throws:
 * 1. the whole reply as JSON,
 * 2. the span from the first "{" to the last "}" (greedy; a reply with
 *    several JSON fragments may yield a span that fails to parse),
 * 3. a degraded augmentation carrying the raw text.
 */
export function parseAugmentation(content: string): ParsedAugmentation {
  const strict = toAugmentation(tryParseJson(content.trim()));
  if (strict) return { augmentation: strict, mode: "strict" };

  const first = content.indexOf("{");
  const last = content.lastIndexOf("}");
  if (first !== -1 && last > first) {
    const extracted = toAugmentation(tryParseJson(content.slice(first, last + 1)));
    if (extracted) return { augmentation: extracted, mode: "extracted" };
  }

  return {
    mode: "degraded",
    augmentation: {
      overallAssessment: content.slice(0, DEGRADED_ASSESSMENT_CHARS),
      strengths: ["Analysis completed, but returned as plain text"],
      areasForImprovement: [],
      recommendations: [`Full analysis text: ${content.slice(0, DEGRADED_RECOMMENDATION_CHARS)}`],
      insights: ["The assessment service did not reply in JSON"],
      confidenceScore: DEGRADED_CONFIDENCE,
    },
  };
}

/** First choice's message content, or null when the reply has none. */
function completionContent(data: unknown): string | null {
  const body = typeof data === "string" ? tryParseJson(data) : data;
  if (typeof body !== "object" || body === null || !("choices" in body)) return null;
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;

  const choice: unknown = choices[0];
  if (typeof choice !== "object" || choice === null || !("message" in choice)) return null;
  const message = choice.message;
  if (typeof message !== "object" || message === null || !("content" in message)) return null;
  const content = message.content;
  return typeof content === "string" && content.trim().length > 0 ? content : null;
}

// ─── Client ─────────────────────────────────────────────────────────────────────

export interface AugmentationClientDeps {
  logger?: Logger;
  /** Backoff between rate-limited auth attempts. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  transportFactory?: (mode: TlsMode) => HttpTransport;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function failureReasonFor(err: AuthenticationError): AugmentationFailureReason {
  switch (err.kind) {
    case "rate_limited":
      return "rate_limited";
    case "network":
      return "network";
    default:
      return "auth_failed";
  }
}

export class AugmentationClient {
  private readonly config: AugmentationConfig;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly transportFactory: (mode: TlsMode) => HttpTransport;

  private transport: HttpTransport;
  private mode: TlsMode;
  private token: TokenState | null = null;
  /** Requests still running on each transport. */
  private readonly inFlight = new Map<HttpTransport, number>();
  /** Replaced transports waiting for their last request before closing. */
  private readonly retired = new Set<HttpTransport>();

  constructor(config: AugmentationConfig, deps: AugmentationClientDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger("AugmentationClient");
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.transportFactory =
      deps.transportFactory ??
      ((mode) => createAxiosTransport({ timeoutMs: config.timeoutMs, tlsMode: mode }));

    this.mode = config.verifyTls ? "verified" : "unverified";
    if (this.mode === "unverified") {
      this.logger.warn("TLS certificate verification is DISABLED for the augmentation service");
    }
    this.transport = this.transportFactory(this.mode);
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get tlsMode(): TlsMode {
    return this.mode;
  }

  // ── Authentication ─────────────────────────────────────────────────────────

  /**
   * Returns a bearer token, reusing the cached one while it is more than
   * TOKEN_REFRESH_MARGIN_MS from expiry.
   *
   * @throws AuthenticationError
   */
  async authenticate(): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new AuthenticationError("not_configured", "Augmentation API key is not configured");
    }

    const cached = this.token;
    if (cached && cached.expiresAtMs !== null && cached.expiresAtMs - this.now() > TOKEN_REFRESH_MARGIN_MS) {
      return cached.accessToken;
    }

    this.logger.info("Authenticating with the augmentation service...");
    let response = await this.postAuth(apiKey);

    if (response.status === 429) {
      this.logger.warn(
        `Authentication rate limited (429), retrying in ${AUTH_RETRY_DELAY_MS / 1000}s`,
      );
      await this.sleep(AUTH_RETRY_DELAY_MS);
      response = await this.postAuth(apiKey);
      if (response.status === 429) {
        throw new AuthenticationError(
          "rate_limited",
          "Authentication rate limit exceeded after retry",
          429,
          describeBody(response.data),
        );
      }
    }

    if (response.status !== 200) {
      const body = describeBody(response.data);
      throw new AuthenticationError(
        "rejected",
        `Authentication failed with status ${response.status}: ${body}`,
        response.status,
        body,
      );
    }

    const token = parseTokenResponse(response.data);
    if (!token) {
      throw new AuthenticationError(
        "missing_token",
        "Authentication response contains no access token",
        200,
        describeBody(response.data),
      );
    }

    this.token = token;
    this.logger.info(
      token.expiresAtMs !== null
        ? `Authenticated; token expires at ${new Date(token.expiresAtMs).toISOString()}`
        : "Authenticated; token carries no expiry and will not be reused",
    );
    return token.accessToken;
  }

  private async postAuth(apiKey: string): Promise<HttpResponse> {
    const send = (transport: HttpTransport) =>
      this.post(transport, this.config.authUrl, new URLSearchParams({ scope: this.config.scope }).toString(), {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
        Authorization: `Basic ${apiKey}`,
        RqUID: uuidv4(),
      });

    const transport = this.transport;
    const mode = this.mode;
    try {
      return await send(transport);
    } catch (err) {
      if (mode !== "verified" || !isTlsVerificationError(err)) {
        throw new AuthenticationError("network", `Authentication request failed: ${describeError(err)}`);
      }
      if (!this.config.allowInsecureTlsFallback) {
        throw new AuthenticationError(
          "network",
          `TLS certificate verification failed: ${describeError(err)}`,
        );
      }
    }

    // A concurrent login may already have replaced the transport.
    if (this.transport === transport) {
      this.downgradeTls();
    }
    try {
      return await send(this.transport);
    } catch (err) {
      throw new AuthenticationError(
        "network",
        `Authentication request failed without TLS verification: ${describeError(err)}`,
      );
    }
  }

  /** One-way verified → unverified transition for the rest of this client's life. */
  private downgradeTls(): void {
    this.logger.warn(
      "SECURITY: TLS certificate verification failed for the augmentation service; " +
        "rebuilding the transport WITHOUT verification for the rest of this process",
    );
    this.retire(this.transport);
    this.mode = "unverified";
    this.transport = this.transportFactory(this.mode);
  }

  // ── Transport bookkeeping ──────────────────────────────────────────────────

  private async post(
    transport: HttpTransport,
    url: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<HttpResponse> {
    this.inFlight.set(transport, (this.inFlight.get(transport) ?? 0) + 1);
    try {
      return await transport.post(url, body, headers);
    } finally {
      const left = (this.inFlight.get(transport) ?? 1) - 1;
      if (left > 0) {
        this.inFlight.set(transport, left);
      } else {
        this.inFlight.delete(transport);
        if (this.retired.delete(transport)) {
          transport.close();
        }
      }
    }
  }

  /** Close a replaced transport now, or once its running requests settle. */
  private retire(transport: HttpTransport): void {
    if (this.inFlight.has(transport)) {
      this.retired.add(transport);
    } else {
      transport.close();
    }
  }

  // ── Augmentation ───────────────────────────────────────────────────────────

  async augment(result: AnalysisResult): Promise<AugmentationOutcome> {
    if (!this.config.enabled) {
      return { status: "skipped", reason: "disabled" };
    }
    if (!this.config.apiKey) {
      return { status: "skipped", reason: "not_configured" };
    }

    let accessToken: string;
    try {
      accessToken = await this.authenticate();
    } catch (err) {
      if (err instanceof AuthenticationError) {
        if (err.kind === "rate_limited") {
          this.logger.warn(`Augmentation skipped: authentication throttled (429): ${err.message}`);
        } else {
          this.logger.error(`Augmentation skipped: authentication failed (${err.kind}): ${err.message}`);
        }
        return { status: "failed", reason: failureReasonFor(err), message: err.message };
      }
      this.logger.error(`Augmentation skipped: unexpected authentication error: ${describeError(err)}`);
      return { status: "failed", reason: "unexpected", message: describeError(err) };
    }

    try {
      return await this.requestAugmentation(accessToken, result);
    } catch (err) {
      this.logger.error(`Error processing augmentation response: ${describeError(err)}`);
      return { status: "failed", reason: "unexpected", message: describeError(err) };
    }
  }

  private async requestAugmentation(
    accessToken: string,
    result: AnalysisResult,
  ): Promise<AugmentationOutcome> {
    const body = JSON.stringify({
      model: this.config.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildAnalysisPrompt(result) },
      ],
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    });

    this.logger.info("Sending analysis request to the augmentation service...");

    let response: HttpResponse;
    try {
      response = await this.post(this.transport, `${this.config.apiUrl}/chat/completions`, body, {
        "Content-Type": "application/json",
        Accept: "application/json",
        Authorization: `Bearer ${accessToken}`,
      });
    } catch (err) {
      const message = `Augmentation request failed: ${describeError(err)}`;
      this.logger.error(message);
      return { status: "failed", reason: "network", message };
    }

    if (response.status === 429) {
      const message = "Augmentation request rate limited (429)";
      this.logger.warn(message);
      return { status: "failed", reason: "rate_limited", message };
    }

    if (response.status !== 200) {
      if (response.status === 401) {
        this.token = null;
      }
      const message = `Augmentation service error ${response.status}: ${describeBody(response.data)}`;
      this.logger.error(message);
      return { status: "failed", reason: `http_${response.status}`, message };
    }

    const content = completionContent(response.data);
    if (content === null) {
      const message = "No choices in augmentation response";
      this.logger.error(message);
      return { status: "failed", reason: "empty_response", message };
    }

    const { augmentation, mode } = parseAugmentation(content);
    if (mode === "degraded") {
      this.logger.warn("Augmentation reply was not JSON; returning a degraded assessment");
    } else if (mode === "extracted") {
      this.logger.warn("Augmentation reply contained extra text around the JSON object");
    }
    this.logger.info("Augmentation received successfully");

    return { status: "succeeded", augmentation };
  }

  /** Release the pooled sockets of the current and any retired transport. */
  close(): void {
    for (const transport of this.retired) {
      transport.close();
    }
    this.retired.clear();
    this.transport.close();
  }
}
