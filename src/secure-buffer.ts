import { ConfigError } from "./types";
import { ERRORS } from "./constants";
import { zeroBuffer } from "./crypto";

// Zeroes buffers whose owner was collected without destroy()
const registry = new FinalizationRegistry<Uint8Array>(zeroBuffer);

/**
 * Exclusively owned key material. There is no way to copy it out: `bytes`
 * hands out the live view for immediate use only, and `destroy()` zeroes it.
 */
export class SecureBuffer {
  private buffer: Uint8Array | null;

  private constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    registry.register(this, buffer, this);
  }

  static allocate(size: number): SecureBuffer {
    let buffer: Uint8Array;
    try {
      buffer = new Uint8Array(size);
    } catch (error) {
      throw new ConfigError(
        `${ERRORS.ALLOC_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
        "ALLOC_FAILED",
      );
    }
    return new SecureBuffer(buffer);
  }

  /** Takes a copy of `source`; the caller remains responsible for its own copy. */
  static from(source: Uint8Array): SecureBuffer {
    const secure = SecureBuffer.allocate(source.length);
    secure.bytes.set(source);
    return secure;
  }

  get bytes(): Uint8Array {
    if (!this.buffer) {
      throw new ConfigError(ERRORS.STORE_DESTROYED, "DESTROYED");
    }
    return this.buffer;
  }

  get destroyed(): boolean {
    return this.buffer === null;
  }

  destroy(): void {
    if (!this.buffer) return;
    zeroBuffer(this.buffer);
    registry.unregister(this);
    this.buffer = null;
  }

  toJSON(): string {
    return "[SecureBuffer]";
  }
}
