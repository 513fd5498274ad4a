/**
 * Chunk Readers
 *
 * ChunkReader implementations for loading code incrementally.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import type { ChunkReader } from '../core/functions.js';

const DEFAULT_CHUNK_SIZE = 4096;

/**
 * Reads a file in fixed-size pieces.
 * The file is opened on the first read, so a missing file surfaces as a
 * ReadError from the load rather than from the constructor.
 */
export class FileChunkReader implements ChunkReader {
  private fd: number | null = null;
  private done = false;

  constructor(
    readonly path: string,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE
  ) {}

  read(): Uint8Array | null {
    if (this.done) return null;

    const buffer = new Uint8Array(this.chunkSize);
    let bytesRead: number;
    try {
      if (this.fd === null) this.fd = openSync(this.path, 'r');
      bytesRead = readSync(this.fd, buffer, 0, this.chunkSize, null);
    } catch (err) {
      this.close();
      throw err;
    }
    if (bytesRead === 0) {
      this.close();
      return null;
    }
    return buffer.subarray(0, bytesRead);
  }

  /** Release the file descriptor; further reads return null */
  close(): void {
    this.done = true;
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/** Serves a string in pieces of at most `chunkSize` characters */
export function stringChunks(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): ChunkReader {
  let offset = 0;
  return {
    read() {
      if (offset >= text.length) return null;
      const piece = text.slice(offset, offset + chunkSize);
      offset += chunkSize;
      return piece;
    },
  };
}
