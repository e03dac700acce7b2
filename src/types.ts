// src/types.ts
import type { ConfigDict } from "./value";

/**
 * Keys and set members are byte strings held as binary strings: one char per
 * byte, every char code in 0..255. Native string ordering is then byte order.
 */
export type ByteKey = string;

export type ConfigValue =
  | { readonly type: "int"; readonly value: bigint }
  | { readonly type: "bytes"; readonly value: Uint8Array }
  | { readonly type: "set"; readonly value: ReadonlySet<ByteKey> }
  | { readonly type: "dict"; readonly value: ConfigDict };

export type ValueType = ConfigValue["type"];

/**
 * A key present in decoded data that the running schema does not interpret.
 * `raw` is the exact canonical encoding of the value as it was received.
 */
export interface UnknownField {
  raw: Uint8Array;
  stamp: Uint8Array;
}

export type MergePolicy = "counter" | "lww";

export interface LeafSchema {
  kind: "leaf";
  type: Exclude<ValueType, "dict">;
  merge: MergePolicy;
}

export interface DictSchema {
  kind: "dict";
  /** Fixed keys this node interprets. */
  fields?: Record<string, NodeSchema>;
  /** Schema applied to every key not listed in `fields` (namespaces keyed by id). */
  entries?: NodeSchema;
}

export type NodeSchema = LeafSchema | DictSchema;

export interface StoreDescriptor {
  /** Storage namespace the transport files blobs of this type under. */
  namespace: number;
  /** Associated data for every blob of this type. */
  encryptionDomain: string;
  schema: DictSchema;
}

export interface PushResult {
  seqno: number;
  namespace: number;
  ciphertext: Uint8Array;
}

export interface MergeResult {
  merged: ConfigDict;
  changed: boolean;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LibrarySettings {
  logLevel: LogLevel;
  maxSeenHashes: number;
}

export interface ValidationOptions {
  allowEmpty?: boolean;
  minLength?: number;
  maxLength?: number;
}

export type ConfigErrorCode =
  | "INVALID_SECRET_KEY"
  | "INVALID_DUMP"
  | "DESTROYED"
  | "ALLOC_FAILED"
  | "VALIDATION_ERROR"
  | "DECODE_ERROR";

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(message: string, code: ConfigErrorCode) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

export class ValidationError extends ConfigError {
  readonly field: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    field: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.field = field;
    this.details = details;
  }
}

export class DecodeError extends ConfigError {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`, "DECODE_ERROR");
    this.name = "DecodeError";
    this.offset = offset;
  }
}
