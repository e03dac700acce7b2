/**
 * Merge engine.
 *
 * Trees are merged key by key over the union of all inputs. Every leaf carries
 * the stamp (history token) of the write that produced it, and the merged tree
 * keeps the winner's stamp, so merging is a join: the result does not depend
 * on input order or grouping, and merging a result again changes nothing.
 *
 *   dict entries      merged recursively
 *   counter leaves    largest integer wins (then stamp, then encoding)
 *   other leaves      highest stamp wins; equal stamps fall back to the
 *                     higher encoded value
 *   vault entries     same as other leaves, payload kept byte for byte
 *   tombstones        compete with other leaves by stamp and lose ties;
 *                     a winning tombstone keeps the key out of the data
 *
 * A key missing from some inputs is kept from the ones that have it. Only
 * erased last-writer-wins leaves leave tombstones, so removing a record is
 * not replicated while switching a field off is.
 */

import type { ByteKey, ConfigValue, DictSchema, MergeResult } from "./types";
import { encodeDict, encodeValue } from "./codec";
import { ZERO_STAMP } from "./history";
import { childSchema, dictSchema } from "./schema";
import { ConfigDict, bytesEqual, cloneValue, compareBytes, dictValue } from "./value";

interface Candidate {
  stamp: Uint8Array;
  encoded: Uint8Array;
  /** Decoded value for interpreted keys; vault entries have none. */
  value?: ConfigValue;
  erased?: boolean;
}

const NOTHING = new Uint8Array(0);

const OPAQUE = dictSchema();

export function mergeTrees(
  local: ConfigDict,
  remotes: readonly ConfigDict[],
  schema: DictSchema,
): MergeResult {
  const merged = mergeDicts([local, ...remotes], schema);
  const changed = !bytesEqual(encodeDict(merged), encodeDict(local));
  return { merged, changed };
}

export function mergeDicts(
  inputs: readonly ConfigDict[],
  schema: DictSchema,
): ConfigDict {
  const out = new ConfigDict();
  const keys = new Set<ByteKey>();
  for (const input of inputs) {
    for (const key of input.keys()) keys.add(key);
    for (const key of input.tombstones.keys()) keys.add(key);
  }

  for (const key of keys) {
    const child = childSchema(schema, key);
    const dicts: ConfigDict[] = [];
    const candidates: Candidate[] = [];

    for (const input of inputs) {
      const entry = input.entries.get(key);
      if (entry?.type === "dict") {
        dicts.push(entry.value);
      } else if (entry) {
        candidates.push({
          stamp: input.stamps.get(key) ?? ZERO_STAMP,
          encoded: encodeValue(entry),
          value: entry,
        });
      } else {
        const unknown = input.unknown.get(key);
        const erased = input.tombstones.get(key);
        if (unknown) {
          candidates.push({ stamp: unknown.stamp, encoded: unknown.raw });
        } else if (erased) {
          candidates.push({ stamp: erased, encoded: NOTHING, erased: true });
        }
      }
    }

    if (dicts.length > 0) {
      const sub = mergeDicts(dicts, child?.kind === "dict" ? child : OPAQUE);
      if (!sub.isEmpty()) out.entries.set(key, dictValue(sub));
      continue;
    }

    const counter = child?.kind === "leaf" && child.merge === "counter";
    const winner = candidates.reduce((best, next) =>
      (counter ? compareCounter(next, best) : compareLww(next, best)) > 0
        ? next
        : best,
    );
    if (winner.erased) {
      out.tombstones.set(key, winner.stamp.slice());
    } else if (winner.value) {
      out.entries.set(key, cloneValue(winner.value));
      out.stamps.set(key, winner.stamp.slice());
    } else {
      out.unknown.set(key, {
        raw: winner.encoded.slice(),
        stamp: winner.stamp.slice(),
      });
    }
  }
  return out;
}

/** Last-writer-wins order: stamp, then encoded value. */
export function compareLww(a: Candidate, b: Candidate): number {
  return compareBytes(a.stamp, b.stamp) || compareBytes(a.encoded, b.encoded);
}

function compareCounter(a: Candidate, b: Candidate): number {
  const x = a.value?.type === "int" ? a.value.value : undefined;
  const y = b.value?.type === "int" ? b.value.value : undefined;
  if (x !== undefined && y !== undefined && x !== y) return x > y ? 1 : -1;
  if (x !== undefined && y === undefined) return 1;
  if (x === undefined && y !== undefined) return -1;
  return compareLww(a, b);
}
