import { utf8ToBytes } from "@noble/hashes/utils.js";
import type { ByteKey, ConfigValue, UnknownField } from "./types";

/**
 * One node of a configuration tree.
 *
 * `entries` holds the keys the schema interprets, `stamps` the history stamp
 * of every non-dict entry, and `unknown` the vault of keys carried verbatim
 * for newer software. `tombstones` holds the stamp of each last-writer-wins
 * leaf that was erased; it travels in the stamp tree only, never in the data.
 * A key lives in at most one of `entries`, `unknown` and `tombstones`.
 */
export class ConfigDict {
  readonly entries = new Map<ByteKey, ConfigValue>();
  readonly stamps = new Map<ByteKey, Uint8Array>();
  readonly unknown = new Map<ByteKey, UnknownField>();
  readonly tombstones = new Map<ByteKey, Uint8Array>();

  get size(): number {
    return this.entries.size + this.unknown.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  has(key: ByteKey): boolean {
    return this.entries.has(key) || this.unknown.has(key);
  }

  /** All keys, recognized and unknown, in ascending byte order. */
  keys(): ByteKey[] {
    return [...this.entries.keys(), ...this.unknown.keys()].sort(compareKeys);
  }

  clone(): ConfigDict {
    const copy = new ConfigDict();
    for (const [key, value] of this.entries) {
      copy.entries.set(key, cloneValue(value));
    }
    for (const [key, stamp] of this.stamps) {
      copy.stamps.set(key, stamp.slice());
    }
    for (const [key, field] of this.unknown) {
      copy.unknown.set(key, { raw: field.raw.slice(), stamp: field.stamp.slice() });
    }
    for (const [key, stamp] of this.tombstones) {
      copy.tombstones.set(key, stamp.slice());
    }
    return copy;
  }
}

export function intValue(value: number | bigint): ConfigValue {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`Not a safe integer: ${value}`);
  }
  return { type: "int", value: BigInt(value) };
}

export function bytesValue(value: Uint8Array | string): ConfigValue {
  return {
    type: "bytes",
    value: typeof value === "string" ? utf8ToBytes(value) : value,
  };
}

export function setValue(members: Iterable<ByteKey>): ConfigValue {
  return { type: "set", value: new Set(members) };
}

export function dictValue(dict: ConfigDict): ConfigValue {
  return { type: "dict", value: dict };
}

/** Empty bytes, sets and dicts are never stored; writing one erases. */
export function isEmptyValue(value: ConfigValue): boolean {
  switch (value.type) {
    case "int":
      return false;
    case "bytes":
      return value.value.length === 0;
    case "set":
      return value.value.size === 0;
    case "dict":
      return value.value.isEmpty();
  }
}

export function cloneValue(value: ConfigValue): ConfigValue {
  switch (value.type) {
    case "int":
      return value;
    case "bytes":
      return { type: "bytes", value: value.value.slice() };
    case "set":
      return { type: "set", value: new Set(value.value) };
    case "dict":
      return { type: "dict", value: value.value.clone() };
  }
}

export function compareKeys(a: ByteKey, b: ByteKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

// Binary-string helpers

export function bytesToKey(bytes: Uint8Array): ByteKey {
  let key = "";
  // Chunked so large values don't overflow the argument limit
  for (let i = 0; i < bytes.length; i += 4096) {
    key += String.fromCharCode(...bytes.subarray(i, i + 4096));
  }
  return key;
}

export function keyToBytes(key: ByteKey): Uint8Array {
  const bytes = new Uint8Array(key.length);
  for (let i = 0; i < key.length; i++) {
    const code = key.charCodeAt(i);
    if (code > 0xff) {
      throw new RangeError(`Byte key has a non-byte char at ${i}`);
    }
    bytes[i] = code;
  }
  return bytes;
}

export function textToKey(text: string): ByteKey {
  return bytesToKey(utf8ToBytes(text));
}

/**
 * Decodes a byte key holding UTF-8 text. Throws a TypeError if the bytes are
 * not valid UTF-8.
 */
export function keyToText(key: ByteKey): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(keyToBytes(key));
}
