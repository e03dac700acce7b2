// validator.ts
import { ed25519 } from "@noble/curves/ed25519.js";
import { hexToBytes } from "@noble/hashes/utils.js";
import type { ValidationOptions } from "./types";
import { ConfigError, ValidationError } from "./types";
import {
  ERRORS,
  FULL_SECRET_KEY_LENGTH,
  PUBKEY_LENGTH,
  SEED_LENGTH,
  SESSION_ID_LENGTH,
  SESSION_ID_PREFIX,
} from "./constants";
import { base32zToBytes, base64ToBytes } from "./crypto";
import { bytesEqual } from "./value";

// Basic type validators
export function validateUint8Array(
  value: unknown,
  name: string,
  options?: ValidationOptions,
): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new ValidationError(`${name} must be a Uint8Array`, name);
  }

  if (!options?.allowEmpty && value.length === 0) {
    throw new ValidationError(`${name} must not be empty`, name);
  }

  if (options?.minLength !== undefined && value.length < options.minLength) {
    throw new ValidationError(
      `${name} must be at least ${options.minLength} bytes`,
      name,
      { length: value.length, minLength: options.minLength },
    );
  }

  if (options?.maxLength !== undefined && value.length > options.maxLength) {
    throw new ValidationError(
      `${name} must be at most ${options.maxLength} bytes`,
      name,
      { length: value.length, maxLength: options.maxLength },
    );
  }

  return value;
}

export function validateString(
  value: unknown,
  name: string,
  options?: ValidationOptions,
): string {
  if (typeof value !== "string") {
    throw new ValidationError(`${name} must be a string`, name);
  }

  if (!options?.allowEmpty && value === "") {
    throw new ValidationError(`${name} must not be empty`, name);
  }

  if (options?.maxLength !== undefined && value.length > options.maxLength) {
    throw new ValidationError(
      `${name} must be at most ${options.maxLength} characters`,
      name,
      { length: value.length, maxLength: options.maxLength },
    );
  }

  return value;
}

export function validateNumber(
  value: unknown,
  name: string,
  options?: { min?: number; max?: number },
): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ValidationError(`${name} must be a safe integer`, name);
  }

  if (options?.min !== undefined && value < options.min) {
    throw new ValidationError(`${name} must be at least ${options.min}`, name, {
      value,
      min: options.min,
    });
  }

  if (options?.max !== undefined && value > options.max) {
    throw new ValidationError(`${name} must be at most ${options.max}`, name, {
      value,
      max: options.max,
    });
  }

  return value;
}

export function isSessionId(value: string): boolean {
  return (
    value.length === SESSION_ID_LENGTH &&
    value.startsWith(SESSION_ID_PREFIX) &&
    /^[0-9a-fA-F]+$/.test(value)
  );
}

/**
 * Checks a session ID ("05" + 64 hex digits) and returns it lower-cased.
 */
export function checkSessionId(sessionId: unknown, name = "sessionId"): string {
  if (typeof sessionId !== "string" || !isSessionId(sessionId)) {
    throw new ValidationError(ERRORS.INVALID_SESSION_ID, name, {
      received: typeof sessionId === "string" ? sessionId : typeof sessionId,
    });
  }
  return sessionId.toLowerCase();
}

/**
 * Decodes a 32-byte pubkey given as raw bytes, hex (64), base32z (52) or
 * base64 (43 unpadded, 44 padded).
 */
export function decodePubkey(pubkey: string | Uint8Array, name = "pubkey"): Uint8Array {
  if (pubkey instanceof Uint8Array) {
    if (pubkey.length !== PUBKEY_LENGTH) {
      throw new ValidationError(ERRORS.INVALID_PUBKEY, name, {
        length: pubkey.length,
      });
    }
    return pubkey.slice();
  }

  try {
    if (pubkey.length === 64 && /^[0-9a-fA-F]+$/.test(pubkey)) {
      return hexToBytes(pubkey.toLowerCase());
    }
    if (pubkey.length === 52) {
      return base32zToBytes(pubkey);
    }
    if (
      (pubkey.length === 43 || (pubkey.length === 44 && pubkey.endsWith("="))) &&
      !pubkey.slice(0, 43).includes("=")
    ) {
      return base64ToBytes(pubkey);
    }
  } catch (error) {
    throw new ValidationError(ERRORS.INVALID_PUBKEY, name, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  throw new ValidationError(ERRORS.INVALID_PUBKEY, name, {
    length: pubkey.length,
  });
}

/** ASCII-only lower-casing; other characters pass through unchanged. */
export function asciiLowercase(text: string): string {
  return text.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/**
 * Accepts a 32-byte Ed25519 seed, or the 64-byte seed + public key form (the
 * public half must match), and returns a copy of the seed.
 */
export function validateSecretKey(secretKey: unknown): Uint8Array {
  if (
    !(secretKey instanceof Uint8Array) ||
    (secretKey.length !== SEED_LENGTH &&
      secretKey.length !== FULL_SECRET_KEY_LENGTH)
  ) {
    throw new ConfigError(ERRORS.INVALID_SECRET_KEY_LENGTH, "INVALID_SECRET_KEY");
  }

  const seed = secretKey.slice(0, SEED_LENGTH);
  if (secretKey.length === FULL_SECRET_KEY_LENGTH) {
    const publicKey = ed25519.getPublicKey(seed);
    if (!bytesEqual(publicKey, secretKey.subarray(SEED_LENGTH))) {
      seed.fill(0);
      throw new ConfigError(
        ERRORS.SECRET_KEY_PUBKEY_MISMATCH,
        "INVALID_SECRET_KEY",
      );
    }
  }
  return seed;
}
