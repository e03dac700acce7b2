import type { ByteKey, ConfigValue, DictSchema } from "./types";
import { ValidationError } from "./types";
import { ERRORS } from "./constants";
import { encodeValue } from "./codec";
import { PENDING_STAMP, stampAll } from "./history";
import { matchesSchema, schemaAt } from "./schema";
import {
  ConfigDict,
  bytesEqual,
  bytesValue,
  dictValue,
  intValue,
  isEmptyValue,
  setValue,
} from "./value";

export type FieldPath = readonly ByteKey[];

/** Value at `path`, or undefined if any step is missing or not a dict. */
export function readPath(
  root: ConfigDict,
  path: FieldPath,
): ConfigValue | undefined {
  let node = root;
  for (let i = 0; i < path.length; i++) {
    const value = node.entries.get(path[i]);
    if (!value) return undefined;
    if (i === path.length - 1) return value;
    if (value.type !== "dict") return undefined;
    node = value.value;
  }
  return dictValue(root);
}

/**
 * Writes `value` at `path`, creating intermediate dicts. Writing an empty
 * value erases. The path and value type must be interpreted by `schema`.
 */
export function writePath(
  root: ConfigDict,
  path: FieldPath,
  value: ConfigValue,
  stamp: Uint8Array,
  schema: DictSchema,
): void {
  if (path.length === 0) {
    throw new ValidationError("Cannot replace the root dict", "path");
  }
  const target = schemaAt(schema, path);
  if (!target) {
    throw new ValidationError(ERRORS.UNKNOWN_SCHEMA_PATH, "path", {
      path: path.join("/"),
    });
  }
  if (!matchesSchema(target, value)) {
    throw new ValidationError(ERRORS.WRONG_VALUE_TYPE, "value", {
      path: path.join("/"),
      type: value.type,
    });
  }
  if (isEmptyValue(value)) {
    erasePath(root, path, schema, stamp);
    return;
  }

  let node = root;
  for (const key of path.slice(0, -1)) {
    const existing = node.entries.get(key);
    if (existing?.type === "dict") {
      node = existing.value;
      continue;
    }
    const created = new ConfigDict();
    node.entries.set(key, dictValue(created));
    node.stamps.delete(key);
    node.tombstones.delete(key);
    node = created;
  }

  const key = path[path.length - 1];
  node.entries.set(key, value);
  node.tombstones.delete(key);
  if (value.type === "dict") {
    node.stamps.delete(key);
    stampAll(value.value, stamp);
  } else {
    node.stamps.set(key, stamp);
  }
}

/**
 * Removes the value at `path` and prunes dicts left empty above it (never the
 * root). Vault entries are untouched, so a dict still holding some is kept.
 *
 * With a schema, erasing a last-writer-wins leaf leaves a tombstone stamped
 * `stamp`, so the erase can win a later merge against an older value. Counters
 * and whole dicts leave none. A pruned dict takes its tombstones with it.
 */
export function erasePath(
  root: ConfigDict,
  path: FieldPath,
  schema?: DictSchema,
  stamp: Uint8Array = PENDING_STAMP,
): boolean {
  if (path.length === 0) return false;
  const target = schema && schemaAt(schema, path);
  const tombstone =
    target?.kind === "leaf" && target.merge === "lww" ? stamp : undefined;
  return eraseFrom(root, path, 0, tombstone);
}

function eraseFrom(
  node: ConfigDict,
  path: FieldPath,
  depth: number,
  tombstone: Uint8Array | undefined,
): boolean {
  const key = path[depth];
  if (depth === path.length - 1) {
    const removed = node.entries.get(key);
    if (!removed) return false;
    node.entries.delete(key);
    node.stamps.delete(key);
    if (tombstone && removed.type !== "dict") node.tombstones.set(key, tombstone);
    return true;
  }
  const child = node.entries.get(key);
  if (child?.type !== "dict") return false;
  const removed = eraseFrom(child.value, path, depth + 1, tombstone);
  if (removed && child.value.isEmpty()) node.entries.delete(key);
  return removed;
}

export interface FieldHost {
  root(): ConfigDict;
  readonly schema: DictSchema;
  onLocalWrite(): void;
}

type Assignable = ConfigValue | number | bigint | string | Uint8Array;

/**
 * A cursor on one location of a store's tree. Reads never throw for missing
 * data; writes go through the store so they are stamped and flagged for push.
 */
export class FieldCursor {
  constructor(
    private readonly host: FieldHost,
    readonly path: FieldPath,
  ) {}

  child(...keys: ByteKey[]): FieldCursor {
    return new FieldCursor(this.host, [...this.path, ...keys]);
  }

  get(): ConfigValue | undefined {
    return readPath(this.host.root(), this.path);
  }

  exists(): boolean {
    return this.get() !== undefined;
  }

  bigint(): bigint | undefined {
    const value = this.get();
    return value?.type === "int" ? value.value : undefined;
  }

  /** Integer value as a number; undefined when absent or outside the safe range. */
  int(): number | undefined {
    const value = this.bigint();
    if (value === undefined) return undefined;
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : undefined;
  }

  bytes(): Uint8Array | undefined {
    const value = this.get();
    return value?.type === "bytes" ? value.value : undefined;
  }

  /** Byte value decoded as UTF-8; undefined if absent or not valid UTF-8. */
  string(): string | undefined {
    const bytes = this.bytes();
    if (!bytes) return undefined;
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
      return undefined;
    }
  }

  set(): ReadonlySet<ByteKey> | undefined {
    const value = this.get();
    return value?.type === "set" ? value.value : undefined;
  }

  dict(): ConfigDict | undefined {
    const value = this.get();
    return value?.type === "dict" ? value.value : undefined;
  }

  assign(value: Assignable): void {
    const next = toConfigValue(value);
    if (isEmptyValue(next)) {
      this.erase();
      return;
    }
    const current = this.get();
    if (
      current &&
      current.type !== "dict" &&
      next.type !== "dict" &&
      bytesEqual(encodeValue(current), encodeValue(next))
    ) {
      return;
    }
    writePath(this.host.root(), this.path, next, PENDING_STAMP, this.host.schema);
    this.host.onLocalWrite();
  }

  erase(): boolean {
    const removed = erasePath(this.host.root(), this.path, this.host.schema);
    if (removed) this.host.onLocalWrite();
    return removed;
  }

  setAdd(member: ByteKey): void {
    const members = new Set(this.set());
    if (members.has(member)) return;
    members.add(member);
    this.assign(setValue(members));
  }

  setRemove(member: ByteKey): void {
    const members = new Set(this.set());
    if (!members.delete(member)) return;
    this.assign(setValue(members));
  }
}

function toConfigValue(value: Assignable): ConfigValue {
  if (typeof value === "number" || typeof value === "bigint") {
    return intValue(value);
  }
  if (typeof value === "string" || value instanceof Uint8Array) {
    return bytesValue(value);
  }
  return value;
}

// Conventions for optional fields

/** Stores 1 when true, removes the field when false. */
export function setFlag(field: FieldCursor, value: boolean): void {
  if (value) field.assign(1);
  else field.erase();
}

/** Stores a string if non-empty, removes the field otherwise. */
export function setNonemptyString(field: FieldCursor, value: string): void {
  if (value.length > 0) field.assign(value);
  else field.erase();
}

/** Stores an integer if non-zero, removes the field otherwise. */
export function setNonzeroInt(field: FieldCursor, value: number): void {
  if (value !== 0) field.assign(value);
  else field.erase();
}

/** Stores an integer if positive, removes the field otherwise. */
export function setPositiveInt(field: FieldCursor, value: number): void {
  if (value > 0) field.assign(value);
  else field.erase();
}

/** Sets both fields when `condition` holds, clears both otherwise. */
export function setPairIf(
  condition: boolean,
  first: FieldCursor,
  firstValue: Assignable,
  second: FieldCursor,
  secondValue: Assignable,
): void {
  if (condition) {
    first.assign(firstValue);
    second.assign(secondValue);
  } else {
    first.erase();
    second.erase();
  }
}
