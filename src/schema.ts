import type {
  ByteKey,
  ConfigValue,
  DictSchema,
  LeafSchema,
  MergePolicy,
  NodeSchema,
} from "./types";

export function leaf(
  type: LeafSchema["type"],
  merge: MergePolicy = "lww",
): LeafSchema {
  return { kind: "leaf", type, merge };
}

export function counter(): LeafSchema {
  return leaf("int", "counter");
}

export function dictSchema(
  shape: { fields?: Record<string, NodeSchema>; entries?: NodeSchema } = {},
): DictSchema {
  return { kind: "dict", ...shape };
}

/** Schema of `key` under `schema`, or undefined if the key is not interpreted. */
export function childSchema(
  schema: DictSchema,
  key: ByteKey,
): NodeSchema | undefined {
  if (schema.fields && Object.hasOwn(schema.fields, key)) {
    return schema.fields[key];
  }
  return schema.entries;
}

/** Walks `path` from the root schema; undefined as soon as a key is not interpreted. */
export function schemaAt(
  root: DictSchema,
  path: readonly ByteKey[],
): NodeSchema | undefined {
  let node: NodeSchema = root;
  for (const key of path) {
    if (node.kind !== "dict") return undefined;
    const next = childSchema(node, key);
    if (!next) return undefined;
    node = next;
  }
  return node;
}

export function matchesSchema(schema: NodeSchema, value: ConfigValue): boolean {
  return schema.kind === "dict" ? value.type === "dict" : value.type === schema.type;
}
