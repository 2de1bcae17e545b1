// File-backed byte source

import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import { ByteSource } from './byte-source.js';
import { NotFoundError } from '../../core/errors.js';

export interface FileSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly chunkSize?: number;
}

/**
 * Streams a local file with `createReadStream`. Each call to `read()` opens the file again.
 */
export class FileSource implements ByteSource {
  private readonly filePath: string;
  private readonly chunkSize: number;

  constructor(filePath: string, options?: FileSourceOptions) {
    this.filePath = filePath;
    this.chunkSize = options?.chunkSize ?? 65536;
  }

  async *read(): AsyncIterable<Uint8Array> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.chunkSize });

    for await (const chunk of stream) {
      if (chunk instanceof Uint8Array) {
        yield chunk;
      }
    }
  }

  describe(): string {
    return this.filePath;
  }

  /**
   * Fail fast with NotFoundError when the path is missing or not a regular file
   */
  async ensureReadable(): Promise<void> {
    try {
      const stats = await fs.stat(this.filePath);
      if (!stats.isFile()) {
        throw new NotFoundError('file', this.filePath);
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError('file', this.filePath);
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
