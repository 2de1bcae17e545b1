// Incremental UTF-8 well-formedness check

/**
 * Byte-at-a-time UTF-8 checker following the WHATWG decoder rules:
 * rejects overlong forms, surrogates and code points above U+10FFFF.
 */
export class Utf8Checker {
  private needed = 0;
  private lower = 0x80;
  private upper = 0xbf;

  /**
   * Feed one byte. Returns false when the byte makes the sequence invalid.
   */
  accept(byte: number): boolean {
    if (this.needed === 0) {
      if (byte <= 0x7f) {
        return true;
      }
      if (byte >= 0xc2 && byte <= 0xdf) {
        this.needed = 1;
        return true;
      }
      if (byte >= 0xe0 && byte <= 0xef) {
        if (byte === 0xe0) this.lower = 0xa0;
        if (byte === 0xed) this.upper = 0x9f;
        this.needed = 2;
        return true;
      }
      if (byte >= 0xf0 && byte <= 0xf4) {
        if (byte === 0xf0) this.lower = 0x90;
        if (byte === 0xf4) this.upper = 0x8f;
        this.needed = 3;
        return true;
      }
      return false;
    }

    if (byte < this.lower || byte > this.upper) {
      this.reset();
      return false;
    }

    this.lower = 0x80;
    this.upper = 0xbf;
    this.needed--;
    return true;
  }

  /**
   * True when no multi-byte sequence is left open
   */
  isComplete(): boolean {
    return this.needed === 0;
  }

  reset(): void {
    this.needed = 0;
    this.lower = 0x80;
    this.upper = 0xbf;
  }
}
