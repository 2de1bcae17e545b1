// Per-record structural rules

import { ScannedRecord, Malformation } from '../../models/record.js';
import { FinalLineEndingPolicy, ValidationMode, assertNever } from '../../models/types.js';
import {
  FieldCountDefect,
  LineEndingDefect,
  QuoteDefect,
  UnescapedCharacterDefect
} from '../../models/validation.js';

/**
 * Makes control characters visible in messages
 */
export function printable(character: string): string {
  switch (character) {
    case '\r':
      return '\\r';
    case '\n':
      return '\\n';
    case '\t':
      return '\\t';
    default:
      return character;
  }
}

/**
 * Rule 1: every data record has the header's field count
 */
export function checkFieldCount(record: ScannedRecord, expected: number): FieldCountDefect[] {
  const actual = record.fields.length;
  if (actual === expected) {
    return [];
  }

  return [{
    category: 'field-count-mismatch',
    recordNumber: record.recordNumber,
    message: `wrong number of fields: expected ${expected}, found ${actual}`,
    expected,
    actual,
    fields: record.fields.map(f => f.value)
  }];
}

/**
 * Whether a last line without terminator passes under the given policy
 */
export function isMissingFinalLineEndingAllowed(policy: FinalLineEndingPolicy, record: ScannedRecord): boolean {
  switch (policy) {
    case 'allow':
      return true;
    case 'header-only':
      return record.recordNumber === 1;
    case 'reject':
      return false;
    default:
      return assertNever(policy);
  }
}

/**
 * Rule 2: strict mode requires CRLF on every record
 */
export function checkLineEnding(record: ScannedRecord, mode: ValidationMode): LineEndingDefect[] {
  if (!mode.rfc4180 || record.lineEnding === '\r\n') {
    return [];
  }

  if (record.lineEnding === null) {
    if (isMissingFinalLineEndingAllowed(mode.missingFinalLineEnding, record)) {
      return [];
    }
    return [{
      category: 'line-ending',
      recordNumber: record.recordNumber,
      message: 'missing line ending on final record (RFC 4180 requires CRLF)',
      found: null
    }];
  }

  const found = record.lineEnding;
  return [{
    category: 'line-ending',
    recordNumber: record.recordNumber,
    message: `invalid line ending (RFC 4180 requires CRLF): found ${found === '\n' ? 'LF' : 'CR'}`,
    found
  }];
}

function describeMalformation(malformation: Malformation): string {
  switch (malformation.kind) {
    case 'bare-quote':
      return `bare " in non-quoted field #${malformation.field}`;
    case 'malformed-escape':
      return `extraneous " in quoted field #${malformation.field} (quotes inside a quoted field must be doubled)`;
    case 'unterminated-quote':
      return `unterminated quote in field #${malformation.field}`;
    default:
      return assertNever(malformation.kind);
  }
}

/**
 * Rule 4: scanner malformations become quote defects, in detection order
 */
export function forwardMalformations(record: ScannedRecord): QuoteDefect[] {
  return record.malformations.map((m): QuoteDefect => ({
    category: 'quote',
    recordNumber: record.recordNumber,
    message: describeMalformation(m),
    kind: m.kind,
    field: m.field
  }));
}

/**
 * Rule 5: fields rebuilt by lazy-quote recovery must not carry special characters
 */
export function checkUnescapedCharacters(record: ScannedRecord, delimiter: string): UnescapedCharacterDefect[] {
  const specials = [delimiter, '"', '\r', '\n'];
  const defects: UnescapedCharacterDefect[] = [];

  record.fields.forEach((field, index) => {
    if (!field.recovered) {
      return;
    }
    const characters = specials.filter(c => field.value.includes(c));
    if (characters.length === 0) {
      return;
    }
    const list = characters.map(c => `'${printable(c)}'`).join(', ');
    defects.push({
      category: 'unescaped-special-character',
      recordNumber: record.recordNumber,
      message: `field #${index + 1} contains unescaped special characters: ${list}`,
      field: index + 1,
      characters
    });
  });

  return defects;
}
