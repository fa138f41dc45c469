// Speech Feedback Service - Upload file abstraction
//
// An uploaded file as the pipeline sees it: a filename, the size the client
// (or multer) reported, and a byte source with a read cursor. Sources backed
// by memory or disk are seekable; a one-shot stream is not, until it has been
// buffered by readAll().

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { Readable } from "node:stream";

/** Default chunk size for streaming reads (1 MiB). */
export const UPLOAD_CHUNK_SIZE = 1024 * 1024;

type UploadSource =
  | { type: "buffer"; data: Buffer }
  | { type: "path"; path: string }
  | { type: "stream"; stream: Readable };

export class UploadFile {
  readonly filename: string | null;
  /** Size as reported by the transport; null when unknown. */
  readonly size: number | null;
  private source: UploadSource;
  private position = 0;

  private constructor(filename: string | null, size: number | null, source: UploadSource) {
    this.filename = filename;
    this.size = size;
    this.source = source;
  }

  static fromBuffer(filename: string | null, data: Buffer, size: number | null = null): UploadFile {
    return new UploadFile(filename, size, { type: "buffer", data });
  }

  static fromPath(filename: string | null, path: string, size: number | null = null): UploadFile {
    return new UploadFile(filename, size, { type: "path", path });
  }

  static fromStream(filename: string | null, stream: Readable, size: number | null = null): UploadFile {
    return new UploadFile(filename, size, { type: "stream", stream });
  }

  get seekable(): boolean {
    return this.source.type !== "stream";
  }

  /** Current read cursor, in bytes. */
  tell(): number {
    return this.position;
  }

  /** Move the read cursor. Throws on a non-seekable source. */
  seek(offset: number): void {
    if (!this.seekable) {
      throw new Error("Upload stream is not seekable");
    }
    this.position = Math.max(0, offset);
  }

  /**
   * Seek-to-end measurement: total byte length of a seekable source, with
   * the read cursor left where it was. Null for a one-shot stream.
   */
  async measure(): Promise<number | null> {
    const original = this.tell();
    try {
      switch (this.source.type) {
        case "buffer":
          return this.source.data.length;
        case "path":
          return (await stat(this.source.path)).size;
        case "stream":
          return null;
      }
    } finally {
      this.position = original;
    }
  }

  /**
   * Read the whole content into memory and reset the cursor to the start.
   * A stream source is replaced by the buffered copy, so later readers see
   * the complete content.
   */
  async readAll(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.chunks()) {
      chunks.push(chunk);
    }
    const data = Buffer.concat(chunks);
    if (this.source.type === "stream") {
      this.source = { type: "buffer", data };
    }
    this.position = 0;
    return data;
  }

  /** Readable over the content from the current cursor, in bounded chunks. */
  createReadStream(chunkSize: number = UPLOAD_CHUNK_SIZE): Readable {
    switch (this.source.type) {
      case "buffer": {
        const data = this.source.data.subarray(this.position);
        return Readable.from(splitBuffer(data, chunkSize), { objectMode: false });
      }
      case "path":
        return createReadStream(this.source.path, {
          start: this.position,
          highWaterMark: chunkSize,
        });
      case "stream":
        return this.source.stream;
    }
  }

  async *chunks(chunkSize: number = UPLOAD_CHUNK_SIZE): AsyncGenerator<Buffer> {
    for await (const chunk of this.createReadStream(chunkSize)) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }
}

function* splitBuffer(data: Buffer, chunkSize: number): Generator<Buffer> {
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    yield data.subarray(offset, offset + chunkSize);
  }
}
