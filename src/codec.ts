/**
 * Canonical binary encoding of configuration trees.
 *
 * The grammar is bencode restricted to a single canonical form:
 *
 *   int    = "i" ["-"] digits "e"     no leading zeros, no "-0", signed 64-bit
 *   bytes  = length ":" octets        length in decimal, no leading zeros
 *   set    = "l" bytes* "e"           members strictly ascending by byte value
 *   dict   = "d" (bytes value)* "e"   keys strictly ascending by byte value
 *
 * Equal trees always encode to identical bytes, and the decoder rejects any
 * input that is not in this form: merge bookkeeping hashes these encodings.
 */

import { concatBytes } from "@noble/hashes/utils.js";
import type { ByteKey, ConfigValue } from "./types";
import { DecodeError } from "./types";
import {
  ConfigDict,
  bytesToKey,
  compareBytes,
  compareKeys,
  isEmptyValue,
  keyToBytes,
} from "./value";

const CHAR_I = 0x69; // i
const CHAR_L = 0x6c; // l
const CHAR_D = 0x64; // d
const CHAR_E = 0x65; // e
const CHAR_COLON = 0x3a;
const CHAR_0 = 0x30;
const CHAR_9 = 0x39;

const ascii = new TextEncoder();

export class BtWriter {
  private chunks: Uint8Array[] = [];

  int(value: bigint): this {
    if (BigInt.asIntN(64, value) !== value) {
      throw new RangeError(`Integer out of 64-bit range: ${value}`);
    }
    this.chunks.push(ascii.encode(`i${value.toString()}e`));
    return this;
  }

  bytes(value: Uint8Array): this {
    this.chunks.push(ascii.encode(`${value.length}:`), value);
    return this;
  }

  key(key: ByteKey): this {
    return this.bytes(keyToBytes(key));
  }

  /** Appends an already-encoded value verbatim. */
  raw(encoded: Uint8Array): this {
    this.chunks.push(encoded);
    return this;
  }

  beginDict(): this {
    this.chunks.push(Uint8Array.of(CHAR_D));
    return this;
  }

  beginList(): this {
    this.chunks.push(Uint8Array.of(CHAR_L));
    return this;
  }

  end(): this {
    this.chunks.push(Uint8Array.of(CHAR_E));
    return this;
  }

  value(value: ConfigValue): this {
    switch (value.type) {
      case "int":
        return this.int(value.value);
      case "bytes":
        return this.bytes(value.value);
      case "set": {
        this.beginList();
        for (const member of [...value.value].sort(compareKeys)) {
          this.key(member);
        }
        return this.end();
      }
      case "dict":
        return this.dict(value.value);
    }
  }

  /**
   * Writes recognized entries and vault entries interleaved in key order; vault
   * entries are re-emitted byte for byte.
   */
  dict(dict: ConfigDict): this {
    this.beginDict();
    for (const key of dict.keys()) {
      this.key(key);
      const entry = dict.entries.get(key);
      if (entry) {
        this.value(entry);
        continue;
      }
      const unknown = dict.unknown.get(key);
      if (unknown) this.raw(unknown.raw);
    }
    return this.end();
  }

  finish(): Uint8Array {
    const out = concatBytes(...this.chunks);
    this.chunks = [];
    return out;
  }
}

export class BtReader {
  private pos: number;

  constructor(
    private readonly data: Uint8Array,
    offset = 0,
  ) {
    this.pos = offset;
  }

  get offset(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.data.length;
  }

  peek(): number {
    if (this.atEnd()) throw new DecodeError("Unexpected end of input", this.pos);
    return this.data[this.pos];
  }

  isDict(): boolean {
    return this.peek() === CHAR_D;
  }

  isList(): boolean {
    return this.peek() === CHAR_L;
  }

  isInt(): boolean {
    return this.peek() === CHAR_I;
  }

  isBytes(): boolean {
    const c = this.peek();
    return c >= CHAR_0 && c <= CHAR_9;
  }

  beginDict(): void {
    this.expect(CHAR_D, "dict");
  }

  /** True (and consumes it) if the next byte closes the current container. */
  consumeEnd(): boolean {
    if (this.peek() !== CHAR_E) return false;
    this.pos++;
    return true;
  }

  expect(char: number, what: string): void {
    if (this.peek() !== char) {
      throw new DecodeError(`Expected ${what}`, this.pos);
    }
    this.pos++;
  }

  readInt(): bigint {
    const start = this.pos;
    this.expect(CHAR_I, "integer");
    const end = this.data.indexOf(CHAR_E, this.pos);
    if (end < 0) throw new DecodeError("Unterminated integer", start);
    const digits = new TextDecoder().decode(this.data.subarray(this.pos, end));
    if (!/^-?(0|[1-9][0-9]*)$/.test(digits) || digits === "-0") {
      throw new DecodeError("Non-canonical integer", start);
    }
    const value = BigInt(digits);
    if (BigInt.asIntN(64, value) !== value) {
      throw new DecodeError("Integer out of 64-bit range", start);
    }
    this.pos = end + 1;
    return value;
  }

  readBytes(): Uint8Array {
    const start = this.pos;
    if (!this.isBytes()) throw new DecodeError("Expected byte string", start);
    const colon = this.data.indexOf(CHAR_COLON, this.pos);
    if (colon < 0) throw new DecodeError("Unterminated string length", start);
    const digits = new TextDecoder().decode(this.data.subarray(this.pos, colon));
    if (!/^(0|[1-9][0-9]*)$/.test(digits)) {
      throw new DecodeError("Invalid string length", start);
    }
    const length = Number(digits);
    const begin = colon + 1;
    if (begin + length > this.data.length) {
      throw new DecodeError("Truncated byte string", start);
    }
    this.pos = begin + length;
    return this.data.slice(begin, this.pos);
  }

  readKey(): ByteKey {
    return bytesToKey(this.readBytes());
  }

  /**
   * Reads the next dict key, enforcing strictly ascending order against the
   * previous key of the same dict.
   */
  readDictKey(previous: ByteKey | undefined): ByteKey {
    const at = this.pos;
    const key = this.readKey();
    if (previous !== undefined && compareKeys(previous, key) >= 0) {
      throw new DecodeError("Dict keys out of order or duplicated", at);
    }
    return key;
  }

  readSet(): ReadonlySet<ByteKey> {
    this.expect(CHAR_L, "list");
    const members = new Set<ByteKey>();
    let previous: Uint8Array | undefined;
    while (!this.consumeEnd()) {
      const at = this.pos;
      if (!this.isBytes()) {
        throw new DecodeError("Lists may only hold byte strings", at);
      }
      const member = this.readBytes();
      if (previous && compareBytes(previous, member) >= 0) {
        throw new DecodeError("Set members out of order or duplicated", at);
      }
      members.add(bytesToKey(member));
      previous = member;
    }
    return members;
  }

  /** Reads a dict without a schema: every key becomes a recognized entry. */
  readDict(): ConfigDict {
    this.beginDict();
    const dict = new ConfigDict();
    let previous: ByteKey | undefined;
    while (!this.consumeEnd()) {
      const key = this.readDictKey(previous);
      const at = this.pos;
      const value = this.readValue();
      if (isEmptyValue(value)) {
        throw new DecodeError("Empty value stored in dict", at);
      }
      dict.entries.set(key, value);
      previous = key;
    }
    return dict;
  }

  readValue(): ConfigValue {
    const c = this.peek();
    if (c === CHAR_I) return { type: "int", value: this.readInt() };
    if (c === CHAR_L) return { type: "set", value: this.readSet() };
    if (c === CHAR_D) return { type: "dict", value: this.readDict() };
    if (c >= CHAR_0 && c <= CHAR_9) {
      return { type: "bytes", value: this.readBytes() };
    }
    throw new DecodeError(`Unexpected byte 0x${c.toString(16)}`, this.pos);
  }

  /** Validates the next value and returns its exact encoding. */
  readRaw(): Uint8Array {
    const start = this.pos;
    const value = this.readValue();
    if (isEmptyValue(value)) {
      throw new DecodeError("Empty value stored in dict", start);
    }
    return this.data.slice(start, this.pos);
  }

  finish(): void {
    if (!this.atEnd()) {
      throw new DecodeError("Trailing bytes after value", this.pos);
    }
  }
}

export function encodeValue(value: ConfigValue): Uint8Array {
  return new BtWriter().value(value).finish();
}

export function encodeDict(dict: ConfigDict): Uint8Array {
  return new BtWriter().dict(dict).finish();
}

export function decodeValue(data: Uint8Array): ConfigValue {
  const reader = new BtReader(data);
  const value = reader.readValue();
  reader.finish();
  return value;
}

export function decodeDict(data: Uint8Array): ConfigDict {
  const reader = new BtReader(data);
  const dict = reader.readDict();
  reader.finish();
  return dict;
}
