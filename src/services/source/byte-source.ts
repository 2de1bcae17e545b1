// Byte source port

/**
 * Sequential, forward-only byte input for a validation run.
 *
 * The validator does not care whether the bytes come from a file, a pipe or
 * memory; it only pulls chunks until the iterable ends. A rejected read is
 * reported as an I/O defect.
 */
export interface ByteSource {
  /** Yield raw chunks in file order */
  read(): AsyncIterable<Uint8Array>;
  /** Short label for logs and reports (file path, "stdin", ...) */
  describe(): string;
}

/**
 * Type guard separating a ByteSource from a bare async iterable
 */
export function isByteSource(value: ByteSource | AsyncIterable<Uint8Array | string>): value is ByteSource {
  return 'read' in value && typeof value.read === 'function';
}
