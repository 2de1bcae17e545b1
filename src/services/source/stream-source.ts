// Stream-backed byte source

import { ByteSource } from './byte-source.js';
import { InputError } from '../../core/errors.js';

/**
 * Wraps any async iterable of bytes or strings, such as `process.stdin`.
 * Streams can only be read once.
 */
export class StreamSource implements ByteSource {
  private readonly stream: AsyncIterable<Uint8Array | string>;
  private readonly name: string;
  private consumed = false;

  constructor(stream: AsyncIterable<Uint8Array | string>, name = 'stream-input') {
    this.stream = stream;
    this.name = name;
  }

  async *read(): AsyncIterable<Uint8Array> {
    if (this.consumed) {
      throw new InputError(`${this.name}: stream has already been consumed. Streams can only be read once.`);
    }
    this.consumed = true;

    const encoder = new TextEncoder();
    for await (const chunk of this.stream) {
      yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
    }
  }

  describe(): string {
    return this.name;
  }
}
