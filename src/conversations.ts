import type { ByteKey, ConfigValue, StoreDescriptor } from "./types";
import { STORAGE_NAMESPACES } from "./constants";
import { ConfigStore } from "./config-store";
import { setPairIf } from "./field";
import { Logger } from "./logger";
import { counter, dictSchema, leaf } from "./schema";
import { checkSessionId, isSessionId, validateNumber } from "./validator";
import type { ConfigDict } from "./value";
import {
  ConversationIterator,
  type ConversationNamespace,
  type ConversationSource,
} from "./conversations/iterator";
import {
  type ConversationRecord,
  type ExpirationMode,
  type LegacyClosedGroup,
  type OneToOne,
  OpenGroup,
  legacyClosedGroup,
  oneToOne,
} from "./conversations/types";

/**
 * Stored layout:
 *
 *   1 - one-to-one conversations keyed by session ID (hex). Values:
 *       r - last-read unix timestamp in ms; always present, 0 if nothing read
 *       e - disappearing messages mode: 1 after send, 2 after read; omitted when off
 *       E - disappearing messages timer in minutes; omitted when `e` is
 *   o - open groups keyed by lc(baseUrl) \0 lc(room) \0 pubkey. Values: r
 *   C - legacy closed groups keyed by group ID (hex). Values: r
 *   c - reserved for new closed groups; carried through untouched
 */
export const CONVERSATIONS_SCHEMA = dictSchema({
  fields: {
    "1": dictSchema({
      entries: dictSchema({
        fields: { r: counter(), e: leaf("int"), E: leaf("int") },
      }),
    }),
    o: dictSchema({ entries: dictSchema({ fields: { r: counter() } }) }),
    C: dictSchema({ entries: dictSchema({ fields: { r: counter() } }) }),
  },
});

export const CONVERSATIONS: StoreDescriptor = {
  namespace: STORAGE_NAMESPACES.Conversations,
  encryptionDomain: "Conversations",
  schema: CONVERSATIONS_SCHEMA,
};

const EXPIRATION_VALUES: Record<Exclude<ExpirationMode, "none">, number> = {
  after_send: 1,
  after_read: 2,
};

const COMPONENT = "Conversations";

const NAMESPACES: readonly ConversationNamespace[] = ["1", "o", "C"];

/**
 * The conversation list: last-read markers and disappearing message settings
 * for every conversation the user has, synced between their devices.
 *
 *   const info = convos.getOrConstruct1to1(sessionId);
 *   info.lastRead = Date.now();
 *   convos.set(info);
 */
export class Conversations extends ConfigStore implements Iterable<ConversationRecord> {
  private readonly source: ConversationSource = {
    namespaceKeys: (namespace) => this.namespaceKeys(namespace),
    loadRecord: (namespace, key) => this.loadRecord(namespace, key),
  };

  /**
   * @param secretKey - 32-byte Ed25519 seed, or the 64-byte seed + pubkey form
   * @param dumped - output of a previous dump(), or undefined for an empty list
   */
  constructor(secretKey: Uint8Array, dumped?: Uint8Array) {
    super(secretKey, dumped, CONVERSATIONS);
    if (dumped) this.reportMalformedKeys();
  }

  pull(blobs: Uint8Array | readonly Uint8Array[]): number {
    const merged = super.pull(blobs);
    if (merged > 0) this.reportMalformedKeys();
    return merged;
  }

  get1to1(sessionId: string): OneToOne | undefined {
    const id = checkSessionId(sessionId);
    const info = this.field("1", id).dict();
    return info && loadOneToOne(id, info);
  }

  getOpen(
    baseUrl: string,
    room: string,
    pubkey: string | Uint8Array,
  ): OpenGroup | undefined {
    const group = new OpenGroup(baseUrl, room, pubkey);
    const info = this.field("o", group.encodedKey).dict();
    if (!info) return undefined;
    group.lastRead = lastReadOf(info);
    return group;
  }

  getLegacyClosed(id: string): LegacyClosedGroup | undefined {
    const groupId = checkSessionId(id, "id");
    const info = this.field("C", groupId).dict();
    return info && loadLegacyClosed(groupId, info);
  }

  getOrConstruct1to1(sessionId: string): OneToOne {
    return this.get1to1(sessionId) ?? oneToOne(sessionId);
  }

  getOrConstructOpen(
    baseUrl: string,
    room: string,
    pubkey: string | Uint8Array,
  ): OpenGroup {
    return (
      this.getOpen(baseUrl, room, pubkey) ?? new OpenGroup(baseUrl, room, pubkey)
    );
  }

  getOrConstructLegacyClosed(id: string): LegacyClosedGroup {
    return this.getLegacyClosed(id) ?? legacyClosedGroup(id);
  }

  /** Inserts or replaces a conversation. */
  set(record: ConversationRecord): void {
    const lastRead = validateNumber(record.lastRead, "lastRead", { min: 0 });

    switch (record.type) {
      case "one_to_one": {
        const id = checkSessionId(record.sessionId);
        const timer = validateNumber(record.expirationTimer, "expirationTimer", {
          min: 0,
        });
        const info = this.field("1", id);
        info.child("r").assign(lastRead);
        setPairIf(
          record.expiration !== "none" && timer > 0,
          info.child("e"),
          record.expiration === "none" ? 0 : EXPIRATION_VALUES[record.expiration],
          info.child("E"),
          timer,
        );
        return;
      }
      case "open_group":
        this.field("o", record.encodedKey, "r").assign(lastRead);
        return;
      case "legacy_closed_group":
        this.field("C", checkSessionId(record.id, "id"), "r").assign(lastRead);
        return;
    }
  }

  erase1to1(sessionId: string): boolean {
    return this.field("1", checkSessionId(sessionId)).erase();
  }

  eraseOpen(baseUrl: string, room: string, pubkey: string | Uint8Array): boolean {
    return this.field("o", OpenGroup.makeKey(baseUrl, room, pubkey)).erase();
  }

  eraseLegacyClosed(id: string): boolean {
    return this.field("C", checkSessionId(id, "id")).erase();
  }

  erase(record: ConversationRecord): boolean {
    switch (record.type) {
      case "one_to_one":
        return this.erase1to1(record.sessionId);
      case "open_group":
        return this.field("o", record.encodedKey).erase();
      case "legacy_closed_group":
        return this.eraseLegacyClosed(record.id);
    }
  }

  /**
   * Erases the iterator's current record and moves it on. This is the only
   * supported way to erase while iterating.
   */
  eraseAt(it: ConversationIterator): ConversationIterator {
    const { namespace, key } = it.location;
    this.field(namespace, key).erase();
    return it.advance();
  }

  size(): number {
    return this.size1to1() + this.sizeOpen() + this.sizeLegacyClosed();
  }

  size1to1(): number {
    return this.namespaceKeys("1").length;
  }

  sizeOpen(): number {
    return this.namespaceKeys("o").length;
  }

  sizeLegacyClosed(): number {
    return this.namespaceKeys("C").length;
  }

  empty(): boolean {
    return this.size() === 0;
  }

  /** All conversations: one-to-one, then open groups, then legacy closed groups. */
  begin(): ConversationIterator {
    return new ConversationIterator(this.source);
  }

  *[Symbol.iterator](): Iterator<ConversationRecord> {
    for (const it = this.begin(); !it.done; it.advance()) {
      yield it.value;
    }
  }

  *iterate1to1(): Generator<OneToOne> {
    for (const record of this.recordsOf("1")) {
      if (record.type === "one_to_one") yield record;
    }
  }

  *iterateOpen(): Generator<OpenGroup> {
    for (const record of this.recordsOf("o")) {
      if (record.type === "open_group") yield record;
    }
  }

  *iterateLegacyClosed(): Generator<LegacyClosedGroup> {
    for (const record of this.recordsOf("C")) {
      if (record.type === "legacy_closed_group") yield record;
    }
  }

  private *recordsOf(namespace: ConversationNamespace): Generator<ConversationRecord> {
    for (const key of this.namespaceKeys(namespace)) {
      const record = this.loadRecord(namespace, key);
      if (record) yield record;
    }
  }

  private namespaceKeys(namespace: ConversationNamespace): ByteKey[] {
    const entries = this.field(namespace).dict()?.entries;
    if (!entries) return [];

    const keys: ByteKey[] = [];
    for (const [key, value] of entries) {
      if (value.type === "dict" && isWellFormed(namespace, key)) keys.push(key);
    }
    return keys.sort();
  }

  /** Once per restore or merge; reads skip these keys silently. */
  private reportMalformedKeys(): void {
    for (const namespace of NAMESPACES) {
      const total = this.field(namespace).dict()?.entries.size ?? 0;
      const count = total - this.namespaceKeys(namespace).length;
      if (count > 0) {
        Logger.warn(COMPONENT, "Ignoring malformed conversation keys", { namespace, count });
      }
    }
  }

  private loadRecord(
    namespace: ConversationNamespace,
    key: ByteKey,
  ): ConversationRecord | undefined {
    const info = this.field(namespace, key).dict();
    if (!info) return undefined;
    switch (namespace) {
      case "1":
        return loadOneToOne(key, info);
      case "o": {
        const group = OpenGroup.fromEncodedKey(key);
        group.lastRead = lastReadOf(info);
        return group;
      }
      case "C":
        return loadLegacyClosed(key, info);
    }
  }
}

function isWellFormed(namespace: ConversationNamespace, key: ByteKey): boolean {
  if (namespace !== "o") return isSessionId(key) && key === key.toLowerCase();
  try {
    OpenGroup.fromEncodedKey(key);
    return true;
  } catch {
    return false;
  }
}

function intOf(value: ConfigValue | undefined): number | undefined {
  if (value?.type !== "int") return undefined;
  const n = Number(value.value);
  return Number.isSafeInteger(n) ? n : undefined;
}

function lastReadOf(info: ConfigDict): number {
  return intOf(info.entries.get("r")) ?? 0;
}

function loadOneToOne(sessionId: string, info: ConfigDict): OneToOne {
  const record = oneToOne(sessionId);
  record.lastRead = lastReadOf(info);

  const mode = intOf(info.entries.get("e"));
  const timer = intOf(info.entries.get("E")) ?? 0;
  if ((mode === 1 || mode === 2) && timer > 0) {
    record.expiration = mode === 1 ? "after_send" : "after_read";
    record.expirationTimer = timer;
  }
  return record;
}

function loadLegacyClosed(id: string, info: ConfigDict): LegacyClosedGroup {
  const record = legacyClosedGroup(id);
  record.lastRead = lastReadOf(info);
  return record;
}
