// crypto.ts - key derivation, blob encryption and text encodings
import { blake3 } from "@noble/hashes/blake3.js";
import { xchacha20poly1305 } from "@noble/ciphers/chacha.js";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils.js";
import {
  BLOB_PADDING,
  CONTEXT_BLOB_NONCE,
  ERRORS,
  NONCE_LENGTH,
  STORE_KEY_LENGTH,
} from "./constants";

const TAG_LENGTH = 16;

/**
 * Hash data using Blake3
 */
export function hash(
  data: Uint8Array | string,
  outputLength: number = 32,
): Uint8Array {
  if (outputLength <= 0 || outputLength > 64) {
    throw new Error("Output length must be between 1 and 64 bytes");
  }

  const input = typeof data === "string" ? utf8ToBytes(data) : data;
  return blake3(input, { dkLen: outputLength });
}

/**
 * Derive a key from input data using Blake3 with domain separation
 */
export function deriveKey(
  data: Uint8Array,
  context: string,
  outputLength: number = STORE_KEY_LENGTH,
): Uint8Array {
  const contextBytes = utf8ToBytes(context);

  // hash(context || input || outputLength)
  const combined = new Uint8Array(contextBytes.length + data.length + 1);
  combined.set(contextBytes, 0);
  combined.set(data, contextBytes.length);
  combined[combined.length - 1] = outputLength;

  const key = blake3(combined, { dkLen: outputLength });
  combined.fill(0);
  return key;
}

/**
 * Encrypt data using XChaCha20-Poly1305
 */
export function encrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  associatedData?: Uint8Array,
): Uint8Array {
  if (key.length !== STORE_KEY_LENGTH) {
    throw new Error("Key must be 32 bytes");
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new Error("Nonce must be 24 bytes");
  }

  return xchacha20poly1305(key, nonce, associatedData).encrypt(plaintext);
}

/**
 * Decrypt data using XChaCha20-Poly1305. Throws if authentication fails.
 */
export function decrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  associatedData?: Uint8Array,
): Uint8Array {
  if (key.length !== STORE_KEY_LENGTH) {
    throw new Error("Key must be 32 bytes");
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new Error("Nonce must be 24 bytes");
  }

  return xchacha20poly1305(key, nonce, associatedData).decrypt(ciphertext);
}

/**
 * Encrypts a blob as `nonce || ciphertext`, with `domain` as associated data.
 * The nonce is a keyed hash of domain and plaintext, so equal inputs give
 * equal blobs and distinct plaintexts never share a nonce.
 */
export function encryptBlob(
  key: Uint8Array,
  plaintext: Uint8Array,
  domain: string,
): Uint8Array {
  const domainBytes = utf8ToBytes(domain);
  const nonce = blake3(concatBytes(CONTEXT_BLOB_NONCE, domainBytes, plaintext), {
    key,
    dkLen: NONCE_LENGTH,
  });
  return concatBytes(nonce, encrypt(key, nonce, plaintext, domainBytes));
}

export function decryptBlob(
  key: Uint8Array,
  blob: Uint8Array,
  domain: string,
): Uint8Array {
  if (blob.length < NONCE_LENGTH + TAG_LENGTH) {
    throw new Error(ERRORS.DECRYPTION_FAILED);
  }
  const nonce = blob.subarray(0, NONCE_LENGTH);
  return decrypt(key, nonce, blob.subarray(NONCE_LENGTH), utf8ToBytes(domain));
}

/**
 * Left-pads with NUL bytes to a multiple of `block` so blob sizes leak less.
 * Encoded messages start with "d", so the padding is unambiguous.
 */
export function pad(data: Uint8Array, block: number = BLOB_PADDING): Uint8Array {
  const padded = new Uint8Array(Math.ceil(data.length / block) * block);
  padded.set(data, padded.length - data.length);
  return padded;
}

export function unpad(data: Uint8Array): Uint8Array {
  let start = 0;
  while (start < data.length && data[start] === 0) start++;
  return data.subarray(start);
}

/**
 * Convert base64 (standard or URL-safe, padded or not) to bytes. Throws on
 * characters outside the alphabet.
 */
export function base64ToBytes(base64: string): Uint8Array {
  if (!/^[A-Za-z0-9+/_-]*={0,2}$/.test(base64) || base64.length % 4 === 1) {
    throw new Error("Invalid base64 string");
  }
  // Normalize base64 string (handle URL-safe encoding)
  let normalized = base64.replace(/-/g, "+").replace(/_/g, "/");

  // Add padding if needed
  while (normalized.length % 4 !== 0) {
    normalized += "=";
  }

  return new Uint8Array(Buffer.from(normalized, "base64"));
}

/**
 * Convert bytes to standard padded base64
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

const BASE32Z_ALPHABET = "ybndrfg8ejkmcpqxot1uwisza345h769";

/**
 * Convert bytes to z-base-32 (unpadded, lower case)
 */
export function bytesToBase32z(bytes: Uint8Array): string {
  let result = "";
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      result += BASE32Z_ALPHABET[(buffer >> (bits - 5)) & 0x1f];
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    result += BASE32Z_ALPHABET[(buffer << (5 - bits)) & 0x1f];
  }
  return result;
}

/**
 * Convert z-base-32 to bytes. Leftover bits must be zero.
 */
export function base32zToBytes(text: string): Uint8Array {
  const out = new Uint8Array(Math.floor((text.length * 5) / 8));
  let buffer = 0;
  let bits = 0;
  let p = 0;
  for (const char of text) {
    const index = BASE32Z_ALPHABET.indexOf(char);
    if (index < 0) throw new Error("Invalid base32z string");
    buffer = (buffer << 5) | index;
    bits += 5;
    if (bits >= 8) {
      out[p++] = (buffer >> (bits - 8)) & 0xff;
      bits -= 8;
    }
    buffer &= (1 << bits) - 1;
  }
  if (buffer !== 0) throw new Error("Invalid base32z padding");
  return out;
}

/**
 * Zero out a buffer to clear sensitive data from memory
 */
export function zeroBuffer(buffer: Uint8Array): void {
  buffer.fill(0);
}
