// Streaming CSV tokenizer

import { LineEnding } from '../../models/types.js';
import { Malformation, ScannedField, ScannedRecord } from '../../models/record.js';
import { ConfigurationError } from '../../core/errors.js';
import { Utf8Checker } from './utf8.js';

const QUOTE = 0x22;
const CR = 0x0d;
const LF = 0x0a;

/**
 * Tokenizer settings. Field-count and strictness rules belong to the validator.
 */
export interface ScannerOptions {
  /** Single ASCII delimiter character */
  delimiter: string;
  lazyQuotes: boolean;
}

type ScanState = 'field-start' | 'unquoted' | 'quoted' | 'quote-pending' | 'skip';

/**
 * Growable byte buffer for the field being read
 */
class FieldBuffer {
  private bytes = new Uint8Array(64);
  private length = 0;

  push(byte: number): void {
    if (this.length === this.bytes.length) {
      const next = new Uint8Array(this.bytes.length * 2);
      next.set(this.bytes);
      this.bytes = next;
    }
    this.bytes[this.length++] = byte;
  }

  view(): Uint8Array {
    return this.bytes.subarray(0, this.length);
  }

  clear(): void {
    this.length = 0;
  }
}

/**
 * Push-driven state machine that turns bytes into records.
 *
 * Bytes are checked as UTF-8 before they are tokenized; the first invalid
 * sequence attaches an encoding fault to the record in progress and the
 * scanner stops accepting input.
 */
export class RecordScanner {
  private readonly delimiter: number;
  private readonly lazyQuotes: boolean;
  private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true });
  private readonly utf8 = new Utf8Checker();
  private readonly buffer = new FieldBuffer();

  private state: ScanState = 'field-start';
  private fields: ScannedField[] = [];
  private malformations: Malformation[] = [];
  private fieldQuoted = false;
  private fieldRecovered = false;
  private bareQuoteReported = false;
  private quoteOffset = 0;
  private pendingCR = false;
  private recordOpen = false;
  private recordCount = 0;
  private offset = 0;
  private finished = false;

  constructor(options: ScannerOptions) {
    if (options.delimiter.length !== 1 || options.delimiter.charCodeAt(0) > 0x7f) {
      throw new ConfigurationError(`Delimiter must be a single ASCII character, got '${options.delimiter}'`, 'delimiter');
    }
    this.delimiter = options.delimiter.charCodeAt(0);
    this.lazyQuotes = options.lazyQuotes;
  }

  /**
   * Number of records produced so far
   */
  get recordsScanned(): number {
    return this.recordCount;
  }

  isFinished(): boolean {
    return this.finished;
  }

  /**
   * Feed a chunk, yielding every record it completes
   */
  *push(chunk: Uint8Array): Generator<ScannedRecord> {
    for (let i = 0; i < chunk.length; i++) {
      if (this.finished) {
        return;
      }

      const byte = chunk[i];
      const offset = this.offset++;

      // A CR is only known to be bare once the following byte is seen
      if (this.pendingCR) {
        this.pendingCR = false;
        if (byte === LF) {
          yield this.closeRecord('\r\n');
          continue;
        }
        yield this.closeRecord('\r');
      }

      if (!this.utf8.accept(byte)) {
        yield this.fail(offset, `invalid UTF-8 sequence at byte offset ${offset}`);
        return;
      }

      const record = this.consume(byte, offset);
      if (record) {
        yield record;
      }
    }
  }

  /**
   * Signal end of input and flush the record in progress, if any
   */
  finish(): ScannedRecord | null {
    if (this.finished) {
      return null;
    }

    if (this.pendingCR) {
      this.pendingCR = false;
      this.finished = true;
      return this.closeRecord('\r');
    }

    if (!this.utf8.isComplete()) {
      return this.fail(this.offset, `incomplete UTF-8 sequence at end of input (byte offset ${this.offset})`);
    }

    this.finished = true;
    if (!this.recordOpen) {
      return null;
    }

    switch (this.state) {
      case 'quoted':
        this.malformations.push({
          kind: 'unterminated-quote',
          field: this.fields.length + 1,
          byteOffset: this.quoteOffset
        });
        this.endField();
        break;
      case 'skip':
        break;
      default:
        this.endField();
    }

    return this.closeRecord(null);
  }

  private consume(byte: number, offset: number): ScannedRecord | null {
    this.recordOpen = true;

    switch (this.state) {
      case 'field-start':
        if (byte === this.delimiter) {
          this.endField();
        } else if (byte === QUOTE) {
          this.fieldQuoted = true;
          this.quoteOffset = offset;
          this.state = 'quoted';
        } else if (byte === CR || byte === LF) {
          return this.endLine(byte, true);
        } else {
          this.buffer.push(byte);
          this.state = 'unquoted';
        }
        return null;

      case 'unquoted':
        if (byte === this.delimiter) {
          this.endField();
        } else if (byte === CR || byte === LF) {
          return this.endLine(byte, true);
        } else {
          if (byte === QUOTE) {
            this.bareQuote(offset);
          }
          this.buffer.push(byte);
        }
        return null;

      case 'quoted':
        if (byte === QUOTE) {
          this.state = 'quote-pending';
        } else {
          this.buffer.push(byte);
        }
        return null;

      case 'quote-pending':
        if (byte === QUOTE) {
          // doubled quote escape
          this.buffer.push(QUOTE);
          this.state = 'quoted';
        } else if (byte === this.delimiter) {
          this.endField();
        } else if (byte === CR || byte === LF) {
          return this.endLine(byte, true);
        } else if (this.lazyQuotes) {
          this.buffer.push(QUOTE);
          this.buffer.push(byte);
          this.fieldRecovered = true;
          this.state = 'unquoted';
        } else {
          this.malformations.push({ kind: 'malformed-escape', field: this.fields.length + 1, byteOffset: offset });
          this.endField();
          this.state = 'skip';
        }
        return null;

      case 'skip':
        if (byte === this.delimiter) {
          this.state = 'field-start';
        } else if (byte === CR || byte === LF) {
          return this.endLine(byte, false);
        }
        return null;
    }
  }

  private bareQuote(offset: number): void {
    if (this.lazyQuotes) {
      this.fieldRecovered = true;
      return;
    }
    if (!this.bareQuoteReported) {
      this.malformations.push({ kind: 'bare-quote', field: this.fields.length + 1, byteOffset: offset });
      this.bareQuoteReported = true;
    }
  }

  private endField(): void {
    this.fields.push({
      value: this.decoder.decode(this.buffer.view()),
      quoted: this.fieldQuoted,
      recovered: this.fieldRecovered
    });
    this.buffer.clear();
    this.fieldQuoted = false;
    this.fieldRecovered = false;
    this.bareQuoteReported = false;
    this.state = 'field-start';
  }

  private endLine(byte: number, closeField: boolean): ScannedRecord | null {
    if (closeField) {
      this.endField();
    }
    this.state = 'field-start';

    if (byte === CR) {
      this.pendingCR = true;
      return null;
    }
    return this.closeRecord('\n');
  }

  private closeRecord(lineEnding: LineEnding | null): ScannedRecord {
    const record: ScannedRecord = {
      recordNumber: ++this.recordCount,
      fields: this.fields,
      lineEnding,
      malformations: this.malformations,
      malformed: this.malformations.length > 0
    };
    this.fields = [];
    this.malformations = [];
    this.recordOpen = false;
    this.state = 'field-start';
    return record;
  }

  private fail(byteOffset: number, message: string): ScannedRecord {
    this.finished = true;
    this.buffer.clear();
    const record = this.closeRecord(null);
    record.encodingFault = { byteOffset, message };
    return record;
  }
}

/**
 * Lazily scan records from synchronous chunks
 */
export function* scanRecords(chunks: Iterable<Uint8Array>, options: ScannerOptions): Generator<ScannedRecord> {
  const scanner = new RecordScanner(options);

  for (const chunk of chunks) {
    yield* scanner.push(chunk);
    if (scanner.isFinished()) {
      return;
    }
  }

  const last = scanner.finish();
  if (last) {
    yield last;
  }
}

/**
 * Lazily scan records from an async byte stream. String chunks are UTF-8 encoded.
 */
export async function* scanRecordsAsync(
  chunks: AsyncIterable<Uint8Array | string>,
  options: ScannerOptions
): AsyncGenerator<ScannedRecord> {
  const scanner = new RecordScanner(options);
  const encoder = new TextEncoder();

  for await (const chunk of chunks) {
    yield* scanner.push(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
    if (scanner.isFinished()) {
      return;
    }
  }

  const last = scanner.finish();
  if (last) {
    yield last;
  }
}
