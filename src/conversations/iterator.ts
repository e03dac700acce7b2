import type { ByteKey } from "../types";
import { ERRORS } from "../constants";
import type { ConversationRecord } from "./types";

export type ConversationNamespace = "1" | "o" | "C";

/** Visit order: one-to-one, open groups, legacy closed groups. */
export const CONVERSATION_NAMESPACES: readonly ConversationNamespace[] = ["1", "o", "C"];

export interface ConversationSource {
  /** Well-formed keys of a namespace, ascending. */
  namespaceKeys(namespace: ConversationNamespace): ByteKey[];
  loadRecord(
    namespace: ConversationNamespace,
    key: ByteKey,
  ): ConversationRecord | undefined;
}

/**
 * Single forward pass over all conversations. The keys of a namespace are
 * captured when the pass enters it and each record is read when it is
 * reached, so records changed ahead of the cursor are seen with their new
 * values and records erased ahead of it are skipped.
 *
 *   for (let it = convos.begin(); !it.done; ) {
 *     it = shouldRemove(it.value) ? convos.eraseAt(it) : it.advance();
 *   }
 */
export class ConversationIterator {
  private namespaceIndex = -1;
  private keys: ByteKey[] = [];
  private position = 0;
  private current: ConversationRecord | undefined;

  constructor(private readonly source: ConversationSource) {
    this.settle();
  }

  get done(): boolean {
    return this.current === undefined;
  }

  get value(): ConversationRecord {
    if (!this.current) throw new RangeError(ERRORS.ITERATOR_DONE);
    return this.current;
  }

  /** Namespace and stored key of the current record. */
  get location(): { namespace: ConversationNamespace; key: ByteKey } {
    if (!this.current) throw new RangeError(ERRORS.ITERATOR_DONE);
    return {
      namespace: CONVERSATION_NAMESPACES[this.namespaceIndex],
      key: this.keys[this.position],
    };
  }

  advance(): this {
    if (this.current === undefined) return this;
    this.position++;
    this.settle();
    return this;
  }

  private settle(): void {
    this.current = undefined;
    while (this.namespaceIndex < CONVERSATION_NAMESPACES.length) {
      if (this.namespaceIndex >= 0) {
        const namespace = CONVERSATION_NAMESPACES[this.namespaceIndex];
        for (; this.position < this.keys.length; this.position++) {
          const record = this.source.loadRecord(namespace, this.keys[this.position]);
          if (record) {
            this.current = record;
            return;
          }
        }
      }
      this.namespaceIndex++;
      this.position = 0;
      this.keys =
        this.namespaceIndex < CONVERSATION_NAMESPACES.length
          ? this.source.namespaceKeys(CONVERSATION_NAMESPACES[this.namespaceIndex])
          : [];
    }
  }
}
