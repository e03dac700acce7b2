import { bytesToHex, hexToBytes } from "@noble/hashes/utils.js";
import type { ConfigValue } from "./types";
import { STAMP_HASH_LENGTH, STAMP_LENGTH } from "./constants";
import { Settings } from "./config";
import { encodeDict } from "./codec";
import { hash } from "./crypto";
import { ConfigDict, bytesValue, compareBytes, dictValue } from "./value";

/** Stamp of data whose origin is unknown; sorts below every real token. */
export const ZERO_STAMP = new Uint8Array(STAMP_LENGTH);

/** Stamp of a local write that has not been sealed with a token yet. */
export const PENDING_STAMP = new Uint8Array(0);

export function isPending(stamp: Uint8Array): boolean {
  return stamp.length === 0;
}

/**
 * A history token: big-endian seqno followed by the hash of the data it
 * sealed. Comparing tokens as bytes orders them by seqno, then hash.
 */
export function makeStamp(seqno: number, data: ConfigDict): Uint8Array {
  const stamp = new Uint8Array(STAMP_LENGTH);
  new DataView(stamp.buffer).setBigUint64(0, BigInt(seqno));
  stamp.set(hash(encodeDict(data), STAMP_HASH_LENGTH), 8);
  return stamp;
}

export function hasPending(dict: ConfigDict): boolean {
  for (const stamp of [...dict.stamps.values(), ...dict.tombstones.values()]) {
    if (isPending(stamp)) return true;
  }
  for (const value of dict.entries.values()) {
    if (value.type === "dict" && hasPending(value.value)) return true;
  }
  return false;
}

/** Replaces every pending stamp in the tree with `stamp`. */
export function sealPending(dict: ConfigDict, stamp: Uint8Array): void {
  for (const [key, current] of dict.stamps) {
    if (isPending(current)) dict.stamps.set(key, stamp);
  }
  for (const [key, current] of dict.tombstones) {
    if (isPending(current)) dict.tombstones.set(key, stamp);
  }
  for (const value of dict.entries.values()) {
    if (value.type === "dict") sealPending(value.value, stamp);
  }
}

/** Sets `stamp` on every leaf of a freshly written subtree. */
export function stampAll(dict: ConfigDict, stamp: Uint8Array): void {
  for (const [key, value] of dict.entries) {
    if (value.type === "dict") {
      dict.stamps.delete(key);
      stampAll(value.value, stamp);
    } else {
      dict.stamps.set(key, stamp);
    }
  }
}

/**
 * Builds the stamp tree shipped next to the data: the same shape as `data`,
 * with each leaf and vault entry replaced by its stamp. Tombstones appear as
 * stamps under keys the data lacks. Zero stamps and subtrees without stamps
 * are left out.
 */
export function stampTree(data: ConfigDict): ConfigDict {
  const tree = new ConfigDict();
  for (const key of data.keys()) {
    const entry = data.entries.get(key);
    if (entry?.type === "dict") {
      const sub = stampTree(entry.value);
      if (!sub.isEmpty()) tree.entries.set(key, dictValue(sub));
      continue;
    }
    const stamp = entry ? data.stamps.get(key) : data.unknown.get(key)?.stamp;
    if (!stamp) continue;
    if (isPending(stamp)) {
      throw new Error("Cannot encode stamps while local writes are unsealed");
    }
    if (stamp.some((b) => b !== 0)) tree.entries.set(key, bytesValue(stamp));
  }
  for (const [key, stamp] of data.tombstones) {
    if (isPending(stamp)) {
      throw new Error("Cannot encode stamps while local writes are unsealed");
    }
    tree.entries.set(key, bytesValue(stamp));
  }
  return tree;
}

/**
 * Applies a received stamp tree to freshly decoded data. A stamp found on a
 * dict node applies to everything beneath it; anything left unstamped gets
 * `inherited`. A stamp under a key the data lacks is a tombstone.
 */
export function applyStamps(
  data: ConfigDict,
  stamps: ConfigValue | undefined,
  inherited: Uint8Array = ZERO_STAMP,
): void {
  const tree = stamps?.type === "dict" ? stamps.value : undefined;
  for (const key of data.keys()) {
    const node = tree?.entries.get(key);
    const own =
      node?.type === "bytes" && node.value.length === STAMP_LENGTH
        ? node.value
        : undefined;
    const entry = data.entries.get(key);
    if (entry?.type === "dict") {
      applyStamps(
        entry.value,
        node?.type === "dict" ? node : undefined,
        own ?? inherited,
      );
      continue;
    }
    if (entry) {
      data.stamps.set(key, own ?? inherited);
      continue;
    }
    const unknown = data.unknown.get(key);
    if (unknown) {
      // Vault entries are compared whole: newest stamp beneath wins
      const nested = node?.type === "dict" ? newestStamp(node.value) : undefined;
      unknown.stamp = own ?? nested ?? inherited;
    }
  }

  for (const [key, node] of tree?.entries ?? []) {
    if (data.has(key)) continue;
    if (node.type === "bytes" && node.value.length === STAMP_LENGTH) {
      data.tombstones.set(key, node.value.slice());
    }
  }
}

function newestStamp(tree: ConfigDict): Uint8Array | undefined {
  let newest: Uint8Array | undefined;
  for (const node of tree.entries.values()) {
    const candidate =
      node.type === "dict"
        ? newestStamp(node.value)
        : node.type === "bytes" && node.value.length === STAMP_LENGTH
          ? node.value
          : undefined;
    if (candidate && (!newest || compareBytes(candidate, newest) > 0)) {
      newest = candidate;
    }
  }
  return newest;
}

/**
 * Hashes of blobs this store already pushed or merged, oldest first. Bounded
 * by the `maxSeenHashes` setting.
 */
export class SeenHashes {
  private hashes = new Set<string>();

  has(hash: Uint8Array): boolean {
    return this.hashes.has(bytesToHex(hash));
  }

  add(hash: Uint8Array): void {
    const id = bytesToHex(hash);
    // Re-adding moves the hash to the newest position
    this.hashes.delete(id);
    this.hashes.add(id);

    const max = Settings.get().maxSeenHashes;
    if (this.hashes.size > max) {
      const ids = Array.from(this.hashes);
      this.hashes = new Set(ids.slice(-max));
    }
  }

  get size(): number {
    return this.hashes.size;
  }

  /** All hashes concatenated in insertion order. */
  serialize(): Uint8Array {
    return hexToBytes(Array.from(this.hashes).join(""));
  }

  static deserialize(bytes: Uint8Array): SeenHashes {
    if (bytes.length % STAMP_HASH_LENGTH !== 0) {
      throw new RangeError("Seen hash list has a partial entry");
    }
    const seen = new SeenHashes();
    for (let i = 0; i < bytes.length; i += STAMP_HASH_LENGTH) {
      seen.add(bytes.subarray(i, i + STAMP_HASH_LENGTH));
    }
    return seen;
  }
}

export function messageHash(message: Uint8Array): Uint8Array {
  return hash(message, STAMP_HASH_LENGTH);
}
