import { ed25519 } from "@noble/curves/ed25519.js";
import { concatBytes } from "@noble/hashes/utils.js";
import { ConfigStore } from "../src/config-store";
import { CONVERSATIONS_SCHEMA } from "../src/conversations";
import { counter, dictSchema, leaf } from "../src/schema";
import { STAMP_LENGTH } from "../src/constants";
import type { DictSchema, StoreDescriptor } from "../src/types";

// Placeholder key material; never real keys
export const SEED_A = new Uint8Array(32).fill(1);
export const SEED_B = new Uint8Array(32).fill(2);

export function fullSecretKey(seed: Uint8Array): Uint8Array {
  return concatBytes(seed, ed25519.getPublicKey(seed));
}

/** "05" followed by 32 copies of the byte `fill` in hex. */
export function sessionId(fill: number): string {
  return "05" + fill.toString(16).padStart(2, "0").repeat(32);
}

// Open group server pubkey 0x01..0x20 in every accepted encoding
export const SERVER_PUBKEY = Uint8Array.from({ length: 32 }, (_, i) => i + 1);
export const SERVER_PUBKEY_HEX =
  "0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20";
export const SERVER_PUBKEY_BASE64 = "AQIDBAUGBwgJCgsMDQ4PEBESExQVFhcYGRobHB0eHyA=";
export const SERVER_PUBKEY_BASE32Z =
  "yrbygbyfyadoonekbcgy4doxnyetrrawnwmbqgy3depta8e6dhoy";

export const enc = (text: string): Uint8Array => new TextEncoder().encode(text);
export const dec = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

/** Runs `fn` and returns what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

/** A stamp with the given seqno and a hash part filled with `fill`. */
export function stamp(seqno: number, fill = 0): Uint8Array {
  const out = new Uint8Array(STAMP_LENGTH).fill(fill);
  new DataView(out.buffer).setBigUint64(0, BigInt(seqno));
  return out;
}

export const TEST_SCHEMA = dictSchema({
  fields: {
    n: leaf("int"),
    r: counter(),
    s: leaf("bytes"),
    m: leaf("set"),
    d: dictSchema({ entries: dictSchema({ fields: { r: counter(), x: leaf("int") } }) }),
  },
});

export const TEST_STORE: StoreDescriptor = {
  namespace: 99,
  encryptionDomain: "TestConfig",
  schema: TEST_SCHEMA,
};

export class TestStore extends ConfigStore {
  constructor(secretKey: Uint8Array, dumped?: Uint8Array, schema: DictSchema = TEST_SCHEMA) {
    super(secretKey, dumped, { ...TEST_STORE, schema });
  }
}

/** Same store type as TestStore, as written by a version that knows about `z`. */
export const NEWER_TEST_SCHEMA = dictSchema({
  fields: { ...TEST_SCHEMA.fields, z: leaf("bytes") },
});

/** Conversations as a version that also interprets the reserved `c` namespace. */
export const NEWER_CONVERSATIONS_SCHEMA = dictSchema({
  fields: {
    ...CONVERSATIONS_SCHEMA.fields,
    c: dictSchema({ entries: dictSchema({ fields: { r: counter() } }) }),
  },
});

export class NewerConversations extends ConfigStore {
  constructor(secretKey: Uint8Array, dumped?: Uint8Array) {
    super(secretKey, dumped, {
      namespace: 4,
      encryptionDomain: "Conversations",
      schema: NEWER_CONVERSATIONS_SCHEMA,
    });
  }
}
