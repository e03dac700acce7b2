import type { ByteKey, PushResult, StoreDescriptor } from "./types";
import { ConfigError, DecodeError } from "./types";
import { CONTEXT_STORE_KEY, DUMP_VERSION, ERRORS } from "./constants";
import { Logger } from "./logger";
import { BtReader, encodeDict } from "./codec";
import { decryptBlob, deriveKey, encryptBlob, pad, unpad } from "./crypto";
import { FieldCursor } from "./field";
import {
  SeenHashes,
  ZERO_STAMP,
  applyStamps,
  hasPending,
  makeStamp,
  messageHash,
  sealPending,
  stampTree,
} from "./history";
import { mergeTrees } from "./merge";
import { SecureBuffer } from "./secure-buffer";
import { collectUnknown, loadDict } from "./unknown-fields";
import { validateSecretKey, validateUint8Array } from "./validator";
import {
  ConfigDict,
  bytesEqual,
  bytesValue,
  dictValue,
  intValue,
} from "./value";

// Keys of the blob message
const MSG_SEQNO = "#";
const MSG_DATA = "c";
const MSG_STAMPS = "t";

// Keys of the dump snapshot
const DUMP_SEQNO = "#";
const DUMP_DATA = "$";
const DUMP_NEEDS_PUSH = "P";
const DUMP_SEEN = "s";
const DUMP_STAMPS = "t";
const DUMP_VERSION_KEY = "v";

interface RemoteConfig {
  seqno: number;
  data: ConfigDict;
  hash: Uint8Array;
}

/**
 * Base of every synced config type: owns the tree, the key it is encrypted
 * under and the bookkeeping needed to push, pull and persist it.
 *
 * Local writes are stamped as pending and sealed with a fresh history token
 * (next seqno + hash of the data) on the next push, pull or dump.
 */
export abstract class ConfigStore {
  private data = new ConfigDict();
  private readonly key: SecureBuffer;
  private currentSeqno = 0;
  private pushNeeded = false;
  private dumpNeeded = false;
  // Set by any local write, including erases that leave no pending stamp
  private unsealed = false;
  private seen = new SeenHashes();
  // Snapshot keys written by newer versions, carried through dump()
  private dumpExtras = new Map<ByteKey, Uint8Array>();

  protected constructor(
    secretKey: Uint8Array,
    dumped: Uint8Array | undefined,
    readonly descriptor: StoreDescriptor,
  ) {
    const seed = validateSecretKey(secretKey);
    const derived = deriveKey(seed, CONTEXT_STORE_KEY);
    this.key = SecureBuffer.from(derived);
    seed.fill(0);
    derived.fill(0);

    if (dumped !== undefined) {
      try {
        this.restore(validateUint8Array(dumped, "dumped"));
      } catch (error) {
        this.key.destroy();
        Logger.error(this.component, "Failed to restore from dump", error);
        throw new ConfigError(
          `${ERRORS.INVALID_DUMP}: ${error instanceof Error ? error.message : String(error)}`,
          "INVALID_DUMP",
        );
      }
    }

    Logger.log(this.component, "Config store ready", {
      namespace: descriptor.namespace,
      seqno: this.currentSeqno,
      restored: dumped !== undefined,
    });
  }

  get storageNamespace(): number {
    return this.descriptor.namespace;
  }

  get encryptionDomain(): string {
    return this.descriptor.encryptionDomain;
  }

  get seqno(): number {
    return this.currentSeqno;
  }

  get destroyed(): boolean {
    return this.key.destroyed;
  }

  private get component(): string {
    return `Config:${this.descriptor.encryptionDomain}`;
  }

  /** True when local state has changes the swarm has not confirmed. */
  needsPush(): boolean {
    this.assertAlive();
    return this.pushNeeded || this.hasUnsealed();
  }

  /** True when state changed since the last dump(). */
  needsDump(): boolean {
    this.assertAlive();
    return this.dumpNeeded;
  }

  /**
   * Raw cursor on a location of the tree, for reads and stamped writes. Paths
   * and values are checked against the schema only; keys are written as given.
   * Typed stores such as Conversations validate identifiers in their own
   * accessors, and a key they cannot parse is skipped when read back.
   */
  field(...path: ByteKey[]): FieldCursor {
    this.assertAlive();
    return new FieldCursor(
      {
        root: () => this.data,
        schema: this.descriptor.schema,
        onLocalWrite: () => {
          this.unsealed = true;
          this.dumpNeeded = true;
        },
      },
      path,
    );
  }

  /**
   * Encrypts the current state for the swarm. Pushing the same state twice
   * yields the same blob; the blob is remembered so pulling it back is a no-op.
   */
  push(): PushResult {
    this.assertAlive();
    this.seal();

    const message = new ConfigDict();
    message.entries.set(MSG_SEQNO, intValue(this.currentSeqno));
    message.entries.set(MSG_DATA, bytesValue(encodeDict(this.data)));
    const stamps = stampTree(this.data);
    if (!stamps.isEmpty()) message.entries.set(MSG_STAMPS, dictValue(stamps));

    const plaintext = encodeDict(message);
    const ciphertext = encryptBlob(
      this.key.bytes,
      pad(plaintext),
      this.descriptor.encryptionDomain,
    );
    this.seen.add(messageHash(plaintext));

    Logger.log(this.component, "Pushing config", {
      seqno: this.currentSeqno,
      size: ciphertext.length,
    });

    return {
      seqno: this.currentSeqno,
      namespace: this.descriptor.namespace,
      ciphertext,
    };
  }

  /** Marks the push of `seqno` as stored; later local changes still need pushing. */
  confirmPushed(seqno: number): void {
    this.assertAlive();
    if (seqno === this.currentSeqno && !this.hasUnsealed()) {
      this.pushNeeded = false;
      this.dumpNeeded = true;
    }
  }

  /**
   * Decrypts and merges blobs fetched from the swarm. Blobs that fail to
   * decrypt or decode are logged and skipped, as are blobs already merged.
   * Returns how many blobs were merged.
   */
  pull(blobs: Uint8Array | readonly Uint8Array[]): number {
    this.assertAlive();
    const list = blobs instanceof Uint8Array ? [blobs] : blobs;
    const remotes: RemoteConfig[] = [];
    const batch = new SeenHashes();

    list.forEach((blob, index) => {
      try {
        const remote = this.parseBlob(blob);
        if (this.seen.has(remote.hash) || batch.has(remote.hash)) {
          Logger.debug(this.component, "Skipping already merged config", { index });
          return;
        }
        batch.add(remote.hash);
        remotes.push(remote);
      } catch (error) {
        Logger.warn(this.component, "Skipping unusable config blob", {
          index,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    });

    if (remotes.length === 0) return 0;

    this.seal();
    const { merged, changed } = mergeTrees(
      this.data,
      remotes.map((r) => r.data),
      this.descriptor.schema,
    );
    const mergedBytes = encodeDict(merged);
    const maxSeqno = Math.max(this.currentSeqno, ...remotes.map((r) => r.seqno));
    const matchesRemote = remotes.some((r) =>
      bytesEqual(encodeDict(r.data), mergedBytes),
    );

    if (matchesRemote) {
      // Adopting a state that is already on the swarm
      this.currentSeqno = maxSeqno;
      this.pushNeeded = false;
    } else if (changed || maxSeqno > this.currentSeqno) {
      // Local state now differs from everything stored under a seqno we could reuse
      this.currentSeqno = maxSeqno + 1;
      this.pushNeeded = true;
    }

    this.data = merged;
    for (const remote of remotes) this.seen.add(remote.hash);
    this.dumpNeeded = true;

    Logger.log(this.component, "Merged remote configs", {
      merged: remotes.length,
      changed,
      seqno: this.currentSeqno,
      unknownFields: collectUnknown(merged).length,
    });
    return remotes.length;
  }

  /** Alias of pull(). */
  merge(blobs: Uint8Array | readonly Uint8Array[]): number {
    return this.pull(blobs);
  }

  /**
   * Serializes the complete local state, encrypted under the store key, for
   * restoring through the constructor.
   */
  dump(): Uint8Array {
    this.assertAlive();
    this.seal();

    const snapshot = new ConfigDict();
    snapshot.entries.set(DUMP_SEQNO, intValue(this.currentSeqno));
    snapshot.entries.set(DUMP_DATA, bytesValue(encodeDict(this.data)));
    if (this.pushNeeded) snapshot.entries.set(DUMP_NEEDS_PUSH, intValue(1));
    if (this.seen.size > 0) {
      snapshot.entries.set(DUMP_SEEN, bytesValue(this.seen.serialize()));
    }
    const stamps = stampTree(this.data);
    if (!stamps.isEmpty()) snapshot.entries.set(DUMP_STAMPS, dictValue(stamps));
    snapshot.entries.set(DUMP_VERSION_KEY, intValue(DUMP_VERSION));
    for (const [key, raw] of this.dumpExtras) {
      snapshot.unknown.set(key, { raw, stamp: ZERO_STAMP });
    }

    const dumped = encryptBlob(
      this.key.bytes,
      encodeDict(snapshot),
      this.dumpDomain,
    );
    this.dumpNeeded = false;
    return dumped;
  }

  /** Zeroes the key and drops all state; the store is unusable afterwards. */
  destroy(): void {
    if (this.key.destroyed) return;
    this.key.destroy();
    this.data = new ConfigDict();
    this.seen = new SeenHashes();
    Logger.log(this.component, "Config store destroyed");
  }

  private get dumpDomain(): string {
    return `${this.descriptor.encryptionDomain}-dump`;
  }

  private assertAlive(): void {
    if (this.key.destroyed) {
      throw new ConfigError(ERRORS.STORE_DESTROYED, "DESTROYED");
    }
  }

  /** Gives pending local writes a fresh history token. */
  private hasUnsealed(): boolean {
    return this.unsealed || hasPending(this.data);
  }

  private seal(): void {
    if (!this.hasUnsealed()) return;
    this.currentSeqno += 1;
    sealPending(this.data, makeStamp(this.currentSeqno, this.data));
    this.unsealed = false;
    this.pushNeeded = true;
    this.dumpNeeded = true;
  }

  private parseBlob(blob: Uint8Array): RemoteConfig {
    const plaintext = unpad(
      decryptBlob(this.key.bytes, blob, this.descriptor.encryptionDomain),
    );
    const reader = new BtReader(plaintext);
    let seqno: number | undefined;
    let data = new ConfigDict();
    let stamps: ConfigDict | undefined;

    reader.beginDict();
    let previous: ByteKey | undefined;
    while (!reader.consumeEnd()) {
      const key = reader.readDictKey(previous);
      previous = key;
      if (key === MSG_SEQNO) {
        seqno = toSeqno(reader.readInt(), reader.offset);
      } else if (key === MSG_DATA) {
        const inner = new BtReader(reader.readBytes());
        data = loadDict(inner, this.descriptor.schema);
        inner.finish();
      } else if (key === MSG_STAMPS) {
        stamps = reader.readDict();
      } else {
        // Message fields from newer versions are not needed to merge
        reader.readRaw();
      }
    }
    reader.finish();

    if (seqno === undefined) {
      throw new DecodeError("Config message has no seqno", 0);
    }
    applyStamps(data, stamps && dictValue(stamps));
    return { seqno, data, hash: messageHash(plaintext) };
  }

  private restore(dumped: Uint8Array): void {
    const plaintext = decryptBlob(this.key.bytes, dumped, this.dumpDomain);
    const reader = new BtReader(plaintext);
    let version: number | undefined;
    let dataBytes: Uint8Array | undefined;
    let stamps: ConfigDict | undefined;

    reader.beginDict();
    let previous: ByteKey | undefined;
    while (!reader.consumeEnd()) {
      const key = reader.readDictKey(previous);
      previous = key;
      switch (key) {
        case DUMP_SEQNO:
          this.currentSeqno = toSeqno(reader.readInt(), reader.offset);
          break;
        case DUMP_DATA:
          dataBytes = reader.readBytes();
          break;
        case DUMP_NEEDS_PUSH:
          this.pushNeeded = reader.readInt() !== 0n;
          break;
        case DUMP_SEEN:
          this.seen = SeenHashes.deserialize(reader.readBytes());
          break;
        case DUMP_STAMPS:
          stamps = reader.readDict();
          break;
        case DUMP_VERSION_KEY:
          version = Number(reader.readInt());
          break;
        default:
          this.dumpExtras.set(key, reader.readRaw());
      }
    }
    reader.finish();

    if (version === undefined || dataBytes === undefined) {
      throw new DecodeError("Dump is missing required fields", 0);
    }
    if (version > DUMP_VERSION) {
      Logger.warn(this.component, "Restoring dump from a newer version", {
        version,
      });
    }

    const inner = new BtReader(dataBytes);
    const data = loadDict(inner, this.descriptor.schema);
    inner.finish();
    applyStamps(data, stamps && dictValue(stamps));
    this.data = data;
  }
}

function toSeqno(value: bigint, offset: number): number {
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DecodeError("Invalid seqno", offset);
  }
  return Number(value);
}
