import { utf8ToBytes } from "@noble/hashes/utils.js";

export const CONTEXT_STORE_KEY = "convo-config store key v1";
export const CONTEXT_BLOB_NONCE = utf8ToBytes("blob_nonce");

// Storage namespaces used by the swarm to file config blobs
export const STORAGE_NAMESPACES = {
  UserProfile: 2,
  Contacts: 3,
  Conversations: 4,
  UserGroups: 5,
} as const;

// Error messages
export const ERRORS = {
  INVALID_SECRET_KEY_LENGTH:
    "Secret key must be a 32-byte seed or a 64-byte seed + public key",
  SECRET_KEY_PUBKEY_MISMATCH:
    "Secret key public half does not match its seed",
  INVALID_DUMP: "Unable to restore config from dump",
  STORE_DESTROYED: "Config store has been destroyed",
  ALLOC_FAILED: "Unable to allocate secure buffer",
  DECRYPTION_FAILED: "Unable to decrypt config blob",
  UNKNOWN_SCHEMA_PATH: "Path is not part of the config schema",
  WRONG_VALUE_TYPE: "Value type does not match the config schema",
  INVALID_SESSION_ID: "Invalid session ID",
  INVALID_PUBKEY: "Invalid encoded pubkey",
  INVALID_OPEN_GROUP_KEY: "Invalid open group key",
  ITERATOR_DONE: "Iterator is past the last conversation",
} as const;

// Key material
export const SEED_LENGTH = 32;
export const FULL_SECRET_KEY_LENGTH = 64;
export const STORE_KEY_LENGTH = 32;
export const NONCE_LENGTH = 24;

// History stamps: 8-byte big-endian seqno || 32-byte content hash
export const STAMP_LENGTH = 40;
export const STAMP_HASH_LENGTH = 32;

// Blob plaintext is left-padded with NULs to a multiple of this size
export const BLOB_PADDING = 256;

// Snapshot format written by dump()
export const DUMP_VERSION = 1;

// Seen-blob bookkeeping
export const MAX_SEEN_HASHES = 1000;

// Session IDs: "05" followed by the 32-byte X25519 pubkey in hex
export const SESSION_ID_PREFIX = "05";
export const SESSION_ID_LENGTH = 66;
export const PUBKEY_LENGTH = 32;
