export { Conversations, CONVERSATIONS, CONVERSATIONS_SCHEMA } from "./conversations";
export {
  OpenGroup,
  oneToOne,
  legacyClosedGroup,
} from "./conversations/types";
export { ConversationIterator } from "./conversations/iterator";
export { ConfigStore } from "./config-store";
export { FieldCursor, readPath, writePath, erasePath } from "./field";
export {
  setFlag,
  setNonemptyString,
  setNonzeroInt,
  setPositiveInt,
  setPairIf,
} from "./field";
export { mergeTrees } from "./merge";
export { BtReader, BtWriter, encodeValue, encodeDict, decodeValue, decodeDict } from "./codec";
export { decodeWithSchema, collectUnknown } from "./unknown-fields";
export { leaf, counter, dictSchema } from "./schema";
export {
  ConfigDict,
  intValue,
  bytesValue,
  setValue,
  dictValue,
  textToKey,
  keyToText,
  bytesToKey,
  keyToBytes,
} from "./value";
export { SecureBuffer } from "./secure-buffer";
export { Settings } from "./config";
export { Logger } from "./logger";
export { STORAGE_NAMESPACES } from "./constants";
export { ConfigError, ValidationError, DecodeError } from "./types";
export type {
  ByteKey,
  ConfigValue,
  ValueType,
  UnknownField,
  MergePolicy,
  LeafSchema,
  DictSchema,
  NodeSchema,
  StoreDescriptor,
  PushResult,
  MergeResult,
  LogLevel,
  LibrarySettings,
  ConfigErrorCode,
} from "./types";
export type {
  ConversationRecord,
  ExpirationMode,
  OneToOne,
  LegacyClosedGroup,
} from "./conversations/types";
export type { ConversationNamespace } from "./conversations/iterator";
