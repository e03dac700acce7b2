import { bytesToHex } from "@noble/hashes/utils.js";
import type { ByteKey } from "../types";
import { ValidationError } from "../types";
import { ERRORS, PUBKEY_LENGTH } from "../constants";
import {
  asciiLowercase,
  checkSessionId,
  decodePubkey,
  validateString,
} from "../validator";
import { bytesToKey, keyToBytes, keyToText, textToKey } from "../value";

export type ExpirationMode = "none" | "after_send" | "after_read";

export interface OneToOne {
  type: "one_to_one";
  sessionId: string; // hex, "05" prefixed
  lastRead: number; // unix ms
  expiration: ExpirationMode;
  expirationTimer: number; // minutes
}

export interface LegacyClosedGroup {
  type: "legacy_closed_group";
  id: string; // hex, looks like a session ID
  lastRead: number;
}

export function oneToOne(sessionId: string): OneToOne {
  return {
    type: "one_to_one",
    sessionId: checkSessionId(sessionId),
    lastRead: 0,
    expiration: "none",
    expirationTimer: 0,
  };
}

export function legacyClosedGroup(id: string): LegacyClosedGroup {
  return {
    type: "legacy_closed_group",
    id: checkSessionId(id, "id"),
    lastRead: 0,
  };
}

const SEPARATOR = "\0";

interface OpenGroupServer {
  baseUrl: string;
  room: string;
  pubkey: Uint8Array;
}

/**
 * Open group conversation. Identified by base URL and room, both lower-cased,
 * plus the 32-byte server pubkey; the three pack into one stored key:
 *
 *   lc(baseUrl) \0 lc(room) \0 pubkey
 */
export class OpenGroup {
  readonly type = "open_group";
  lastRead = 0;
  private server: OpenGroupServer;

  /** `pubkey` may be raw bytes or hex, base32z or base64 text. */
  constructor(baseUrl: string, room: string, pubkey: string | Uint8Array) {
    this.server = parseServer(baseUrl, room, pubkey);
  }

  static fromEncodedKey(key: ByteKey): OpenGroup {
    const { baseUrl, room, pubkey } = parseKey(key);
    return new OpenGroup(baseUrl, room, pubkey);
  }

  static makeKey(
    baseUrl: string,
    room: string,
    pubkey: string | Uint8Array,
  ): ByteKey {
    return encodeKey(parseServer(baseUrl, room, pubkey));
  }

  get baseUrl(): string {
    return this.server.baseUrl;
  }

  get room(): string {
    return this.server.room;
  }

  get pubkey(): Uint8Array {
    return this.server.pubkey.slice();
  }

  get pubkeyHex(): string {
    return bytesToHex(this.server.pubkey);
  }

  /** The key this conversation is stored under. */
  get encodedKey(): ByteKey {
    return encodeKey(this.server);
  }

  setServer(baseUrl: string, room: string, pubkey: string | Uint8Array): void {
    this.server = parseServer(baseUrl, room, pubkey);
  }

  /** Replaces the server from a stored key; throws ValidationError if malformed. */
  loadEncodedKey(key: ByteKey): void {
    this.server = parseKey(key);
  }
}

export type ConversationRecord = OneToOne | OpenGroup | LegacyClosedGroup;

function parseServer(
  baseUrl: string,
  room: string,
  pubkey: string | Uint8Array,
): OpenGroupServer {
  return {
    baseUrl: checkKeyPart(baseUrl, "baseUrl"),
    room: checkKeyPart(room, "room"),
    pubkey: decodePubkey(pubkey),
  };
}

function checkKeyPart(value: string, name: string): string {
  validateString(value, name);
  if (value.includes(SEPARATOR)) {
    throw new ValidationError(`${name} must not contain NUL`, name);
  }
  return asciiLowercase(value);
}

function encodeKey({ baseUrl, room, pubkey }: OpenGroupServer): ByteKey {
  return (
    textToKey(baseUrl) + SEPARATOR + textToKey(room) + SEPARATOR + bytesToKey(pubkey)
  );
}

// The pubkey is binary and may itself contain NULs, so only the first two split
function parseKey(key: ByteKey): OpenGroupServer {
  const urlEnd = key.indexOf(SEPARATOR);
  const roomEnd = urlEnd < 0 ? -1 : key.indexOf(SEPARATOR, urlEnd + 1);
  if (
    urlEnd <= 0 ||
    roomEnd <= urlEnd + 1 ||
    key.length - roomEnd - 1 !== PUBKEY_LENGTH
  ) {
    throw new ValidationError(ERRORS.INVALID_OPEN_GROUP_KEY, "key", {
      length: key.length,
    });
  }

  let baseUrl: string;
  let room: string;
  let pubkey: Uint8Array;
  try {
    baseUrl = keyToText(key.slice(0, urlEnd));
    room = keyToText(key.slice(urlEnd + 1, roomEnd));
    pubkey = keyToBytes(key.slice(roomEnd + 1));
  } catch (error) {
    throw new ValidationError(ERRORS.INVALID_OPEN_GROUP_KEY, "key", {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (asciiLowercase(baseUrl) !== baseUrl || asciiLowercase(room) !== room) {
    throw new ValidationError(ERRORS.INVALID_OPEN_GROUP_KEY, "key", {
      reason: "not lower-cased",
    });
  }
  return { baseUrl, room, pubkey };
}
