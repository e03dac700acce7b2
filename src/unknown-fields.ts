import type { ByteKey, DictSchema, UnknownField } from "./types";
import { DecodeError } from "./types";
import { BtReader } from "./codec";
import { ZERO_STAMP } from "./history";
import { childSchema } from "./schema";
import { ConfigDict, dictValue, isEmptyValue } from "./value";

/**
 * Reads a dict against `schema`. Interpreted keys are decoded and
 * type-checked; every other key is validated and kept in the node's vault as
 * its exact encoding. Stamps start at zero until a stamp tree is applied.
 */
export function loadDict(reader: BtReader, schema: DictSchema): ConfigDict {
  const dict = new ConfigDict();
  reader.beginDict();
  let previous: ByteKey | undefined;
  while (!reader.consumeEnd()) {
    const key = reader.readDictKey(previous);
    previous = key;
    const child = childSchema(schema, key);
    const at = reader.offset;

    if (!child) {
      dict.unknown.set(key, { raw: reader.readRaw(), stamp: ZERO_STAMP });
      continue;
    }

    if (child.kind === "dict") {
      if (!reader.isDict()) {
        throw new DecodeError(`Expected a dict for ${printable(key)}`, at);
      }
      const sub = loadDict(reader, child);
      if (sub.isEmpty()) throw new DecodeError("Empty value stored in dict", at);
      dict.entries.set(key, dictValue(sub));
      continue;
    }

    const value = reader.readValue();
    if (value.type !== child.type) {
      throw new DecodeError(
        `Expected ${child.type} for ${printable(key)}, got ${value.type}`,
        at,
      );
    }
    if (isEmptyValue(value)) {
      throw new DecodeError("Empty value stored in dict", at);
    }
    dict.entries.set(key, value);
    dict.stamps.set(key, ZERO_STAMP);
  }
  return dict;
}

/** Decodes a complete buffer holding one dict; trailing bytes are an error. */
export function decodeWithSchema(
  data: Uint8Array,
  schema: DictSchema,
): ConfigDict {
  const reader = new BtReader(data);
  const dict = loadDict(reader, schema);
  reader.finish();
  return dict;
}

/** Vault entries of every node in the tree, keyed by their path. */
export function collectUnknown(
  dict: ConfigDict,
  path: readonly ByteKey[] = [],
): Array<{ path: ByteKey[]; field: UnknownField }> {
  const found: Array<{ path: ByteKey[]; field: UnknownField }> = [];
  for (const [key, field] of dict.unknown) {
    found.push({ path: [...path, key], field });
  }
  for (const [key, value] of dict.entries) {
    if (value.type === "dict") {
      found.push(...collectUnknown(value.value, [...path, key]));
    }
  }
  return found;
}

function printable(key: ByteKey): string {
  return JSON.stringify(key);
}
