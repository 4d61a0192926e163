/**
 * Header fields: an ordered multi-map from case-insensitive names to raw byte values.
 */

import { createHeaderError } from './errors.js';

export type FieldValue = string | Uint8Array;

/** RFC 9110 token characters */
const TOKEN_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Hop-by-hop and connection-level headers the transport manages itself */
const FORBIDDEN_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
  'host',
  'http2-settings',
]);

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

function toBytes(value: FieldValue): Uint8Array {
  return typeof value === 'string' ? encoder.encode(value) : Uint8Array.from(value);
}

function isValidValue(value: Uint8Array): boolean {
  for (const byte of value) {
    // Control characters other than horizontal tab, and DEL
    if ((byte < 0x20 && byte !== 0x09) || byte === 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Decodes header bytes as UTF-8, or returns undefined when they are not valid UTF-8
 */
export function decodeFieldValue(value: Uint8Array): string | undefined {
  try {
    return strictDecoder.decode(value);
  } catch {
    return undefined;
  }
}

/**
 * Ordered header multi-map.
 *
 * Lookups are case-insensitive and return values in insertion order. Outgoing
 * fields are validated on every insert; fields received from a transport are
 * immutable and reject every mutation.
 *
 * @example
 * ```typescript
 * const fields = Fields.fromList([
 *   ['Accept', 'application/vnd.api+json'],
 *   ['X-Trace', new Uint8Array([0x61, 0x62])],
 * ]);
 * fields.append('accept', 'application/json');
 * fields.get('ACCEPT').length; // 2
 * ```
 */
export class Fields {
  private entries: Array<[string, Uint8Array]> = [];
  private immutable = false;

  private static create(entries: Array<[string, Uint8Array]>, immutable: boolean): Fields {
    const fields = new Fields();
    fields.entries = entries;
    fields.immutable = immutable;
    return fields;
  }

  /**
   * Builds mutable fields from name/value pairs, validating each pair
   */
  static fromList(list: Iterable<readonly [string, FieldValue]>): Fields {
    const fields = new Fields();
    for (const [name, value] of list) {
      fields.append(name, value);
    }
    return fields;
  }

  /**
   * Wraps headers received from a transport. The result is immutable.
   */
  static fromIncoming(list: Iterable<readonly [string, FieldValue]>): Fields {
    const entries: Array<[string, Uint8Array]> = [];
    for (const [name, value] of list) {
      entries.push([name, toBytes(value)]);
    }
    return Fields.create(entries, true);
  }

  /** Whether mutations are rejected */
  get isImmutable(): boolean {
    return this.immutable;
  }

  /** Number of name/value pairs */
  get size(): number {
    return this.entries.length;
  }

  /**
   * All values for a name, in insertion order
   */
  get(name: string): Uint8Array[] {
    const key = name.toLowerCase();
    return this.entries.filter(([entryName]) => entryName.toLowerCase() === key).map(([, value]) => value.slice());
  }

  /**
   * The earliest inserted value for a name
   */
  first(name: string): Uint8Array | undefined {
    return this.get(name)[0];
  }

  /**
   * The earliest inserted value for a name, decoded as UTF-8.
   * Returns undefined when absent or not valid UTF-8.
   */
  firstText(name: string): string | undefined {
    const value = this.first(name);
    return value === undefined ? undefined : decodeFieldValue(value);
  }

  has(name: string): boolean {
    const key = name.toLowerCase();
    return this.entries.some(([entryName]) => entryName.toLowerCase() === key);
  }

  /**
   * Appends a value, keeping any existing values for the same name
   * @throws {TidewireHttpError} `header_error` when the name or value is rejected
   */
  append(name: string, value: FieldValue): void {
    const bytes = toBytes(value);
    this.assertWritable(name);
    if (!isValidValue(bytes)) {
      throw createHeaderError(name, 'invalid_syntax');
    }
    this.entries.push([name, bytes]);
  }

  /**
   * Replaces all values for a name
   * @throws {TidewireHttpError} `header_error` when the name or any value is rejected
   */
  set(name: string, values: FieldValue | FieldValue[]): void {
    const list = Array.isArray(values) ? values : [values];
    const bytes = list.map(toBytes);
    this.assertWritable(name);
    if (!bytes.every(isValidValue)) {
      throw createHeaderError(name, 'invalid_syntax');
    }
    this.removeAll(name);
    for (const value of bytes) {
      this.entries.push([name, value]);
    }
  }

  /**
   * Removes every value for a name
   * @throws {TidewireHttpError} `header_error` when the fields are immutable
   */
  delete(name: string): void {
    if (this.immutable) {
      throw createHeaderError(name, 'immutable');
    }
    this.removeAll(name);
  }

  /**
   * Name/value pairs in insertion order. Names keep their original case.
   */
  toList(): Array<[string, Uint8Array]> {
    return this.entries.map(([name, value]) => [name, value.slice()]);
  }

  /**
   * Lowercased names mapped to values joined with ", ", for logging
   */
  toRecord(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of this.entries) {
      const key = name.toLowerCase();
      const text = lossyDecoder.decode(value);
      const existing = result[key];
      result[key] = existing === undefined ? text : `${existing}, ${text}`;
    }
    return result;
  }

  /**
   * Returns a mutable deep copy
   */
  clone(): Fields {
    return Fields.create(this.toList(), false);
  }

  private assertWritable(name: string): void {
    if (this.immutable) {
      throw createHeaderError(name, 'immutable');
    }
    if (!TOKEN_PATTERN.test(name)) {
      throw createHeaderError(name, 'invalid_syntax');
    }
    if (FORBIDDEN_NAMES.has(name.toLowerCase())) {
      throw createHeaderError(name, 'forbidden');
    }
  }

  private removeAll(name: string): void {
    const key = name.toLowerCase();
    for (let index = this.entries.length - 1; index >= 0; index--) {
      const entry = this.entries[index];
      if (entry && entry[0].toLowerCase() === key) {
        this.entries.splice(index, 1);
      }
    }
  }
}
