// In-memory byte source

import { ByteSource } from './byte-source.js';

export interface BufferSourceOptions {
  /** Split the data into chunks of this many bytes. Default: whole buffer in one chunk. */
  readonly chunkSize?: number;
  /** Label used in reports. Default: 'buffer-input'. */
  readonly name?: string;
}

/**
 * Byte source over a string (UTF-8 encoded) or a byte array
 */
export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private readonly chunkSize: number;
  private readonly name: string;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.chunkSize = Math.max(1, options?.chunkSize ?? this.bytes.length);
    this.name = options?.name ?? 'buffer-input';
  }

  async *read(): AsyncIterable<Uint8Array> {
    for (const chunk of this.chunks()) {
      yield await Promise.resolve(chunk);
    }
  }

  /**
   * Synchronous view of the same chunks, for `validateSync`
   */
  *chunks(): Iterable<Uint8Array> {
    for (let start = 0; start < this.bytes.length; start += this.chunkSize) {
      yield this.bytes.subarray(start, start + this.chunkSize);
    }
  }

  describe(): string {
    return this.name;
  }
}
