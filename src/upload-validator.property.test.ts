// Property-Based Tests for UploadValidator
// Property: extensions outside the allow-list are rejected by name; sizes
// above the limit are rejected with the size rounded to one decimal MB.

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { isPipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { UploadFile } from "./upload-file.js";
import { UploadValidator, validateExtension } from "./upload-validator.js";

const MB = 1024 * 1024;
const allowed = [".mp4", ".mov", ".avi", ".mkv"];

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Mixed-case rendering of a lowercase string. */
function arbitraryCasing(value: string): fc.Arbitrary<string> {
  return fc
    .array(fc.boolean(), { minLength: value.length, maxLength: value.length })
    .map((flags) => [...value].map((ch, i) => (flags[i] ? ch.toUpperCase() : ch)).join(""));
}

const arbitraryStem = fc.stringMatching(/^[a-z0-9_-]{1,12}$/);
const arbitraryForeignExtension = fc
  .stringMatching(/^[a-z0-9]{1,5}$/)
  .filter((ext) => !allowed.includes(`.${ext}`));

describe("UploadValidator properties", () => {
  it("rejects any extension outside the allow-list, naming it in lowercase", () => {
    fc.assert(
      fc.property(
        arbitraryStem,
        arbitraryForeignExtension.chain((ext) => arbitraryCasing(ext)),
        (stem, ext) => {
          let caught: unknown;
          try {
            validateExtension(`${stem}.${ext}`, { allowedExtensions: allowed, maxFileSizeMb: 100 });
          } catch (err) {
            caught = err;
          }
          expect(isPipelineError(caught)).toBe(true);
          if (isPipelineError(caught)) {
            expect(caught.detail).toEqual({
              kind: "unsupported_file_type",
              extension: `.${ext.toLowerCase()}`,
              allowedExtensions: allowed,
            });
          }
        },
      ),
    );
  });

  it("accepts every allowed extension in any casing", () => {
    fc.assert(
      fc.property(
        arbitraryStem,
        fc.constantFrom(...allowed).chain((ext) => arbitraryCasing(ext)),
        (stem, ext) => {
          expect(
            validateExtension(`${stem}${ext}`, { allowedExtensions: allowed, maxFileSizeMb: 100 }),
          ).toBe(ext.toLowerCase());
        },
      ),
    );
  });

  it("accepts sizes at or below the limit and rejects sizes above it", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 1024 }),
        fc.integer({ min: 0, max: 2048 * MB }),
        async (maxFileSizeMb, bytes) => {
          const validator = new UploadValidator(
            { allowedExtensions: allowed, maxFileSizeMb },
            silentLogger(),
          );
          const upload = UploadFile.fromBuffer("speech.mp4", Buffer.alloc(0), bytes);

          if (bytes <= maxFileSizeMb * MB) {
            await expect(validator.validate(upload)).resolves.toBeUndefined();
            return;
          }

          const err = await validator.validate(upload).then(
            () => null,
            (e: unknown) => e,
          );
          expect(isPipelineError(err)).toBe(true);
          if (isPipelineError(err)) {
            expect(err.detail).toEqual({
              kind: "file_too_large",
              fileSizeMb: Math.round((bytes / MB) * 10) / 10,
              maxSizeMb: maxFileSizeMb,
            });
          }
        },
      ),
    );
  });
});
