// Property-Based Tests for the augmentation client
// Properties: a cached token is reused exactly while it is more than the
// refresh margin from expiry; any reply that is not JSON degrades instead of
// failing.

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import {
  AugmentationClient,
  DEGRADED_CONFIDENCE,
  parseAugmentation,
  TOKEN_REFRESH_MARGIN_MS,
  type HttpTransport,
} from "./augmentation-client.js";
import type { Logger } from "./logger.js";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const START = Date.UTC(2026, 5, 1);

describe("AugmentationClient token cache properties", () => {
  it("re-authenticates exactly when the remaining lifetime drops to the margin", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 7200 }),
        fc.integer({ min: 0, max: 7200 }),
        async (lifetimeSec, elapsedSec) => {
          let now = START;
          const post = vi.fn(async () => ({
            status: 200,
            data: { access_token: "tok", expires_at: START / 1000 + lifetimeSec },
          }));
          const transport: HttpTransport = { post, close: vi.fn() };
          const client = new AugmentationClient(
            {
              enabled: true,
              apiKey: "test-secret",
              authUrl: "https://auth.test/oauth",
              apiUrl: "https://llm.test/v1",
              model: "test-model",
              scope: "TEST_SCOPE",
              timeoutMs: 1000,
              maxTokens: 100,
              temperature: 0.7,
              verifyTls: true,
              allowInsecureTlsFallback: false,
            },
            { logger: silentLogger(), sleep: async () => {}, now: () => now, transportFactory: () => transport },
          );

          await client.authenticate();
          now = START + elapsedSec * 1000;
          await client.authenticate();

          const remainingMs = (lifetimeSec - elapsedSec) * 1000;
          expect(post).toHaveBeenCalledTimes(remainingMs > TOKEN_REFRESH_MARGIN_MS ? 1 : 2);
        },
      ),
      { numRuns: 100 },
    );
  });
});

describe("parseAugmentation properties", () => {
  it("degrades any brace-free reply, keeping its leading text", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 2000 }).filter((s) => !s.includes("{") && !s.includes("}")), (content) => {
        const parsed = parseAugmentation(content);
        expect(parsed.mode).toBe("degraded");
        expect(parsed.augmentation.confidenceScore).toBe(DEGRADED_CONFIDENCE);
        expect(parsed.augmentation.overallAssessment).toBe(content.slice(0, 500));
      }),
    );
  });

  it("recovers a valid object wrapped in brace-free prose", () => {
    const prose = fc.string({ maxLength: 200 }).filter((s) => !s.includes("{") && !s.includes("}"));
    fc.assert(
      fc.property(prose, prose, fc.integer({ min: 0, max: 100 }).map((n) => n / 100), (before, after, confidence) => {
        const reply = JSON.stringify({ overall_assessment: "ok", strengths: ["a"], confidence_score: confidence });
        const parsed = parseAugmentation(`${before}${reply}${after}`);
        expect(parsed.mode === "strict" || parsed.mode === "extracted").toBe(true);
        expect(parsed.augmentation.strengths).toEqual(["a"]);
        expect(parsed.augmentation.confidenceScore).toBe(confidence);
      }),
    );
  });
});
