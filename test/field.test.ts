import { describe, it, expect, beforeEach } from "vitest";
import {
  FieldCursor,
  erasePath,
  readPath,
  setFlag,
  setNonemptyString,
  setNonzeroInt,
  setPairIf,
  setPositiveInt,
  writePath,
  type FieldHost,
} from "../src/field";
import { ValidationError } from "../src/types";
import { ZERO_STAMP } from "../src/history";
import { ConfigDict, dictValue, intValue } from "../src/value";
import { TEST_SCHEMA, enc, stamp } from "./setup";

describe("Field Path Accessor", () => {
  let root: ConfigDict;
  let writes: number;
  let field: (...path: string[]) => FieldCursor;

  beforeEach(() => {
    root = new ConfigDict();
    writes = 0;
    const host: FieldHost = {
      root: () => root,
      schema: TEST_SCHEMA,
      onLocalWrite: () => {
        writes++;
      },
    };
    field = (...path) => new FieldCursor(host, path);
  });

  describe("Reads", () => {
    it("should treat missing paths as absent", () => {
      expect(field("n").get()).toBeUndefined();
      expect(field("d", "k", "r").int()).toBeUndefined();
      expect(field("d", "k").exists()).toBe(false);
    });

    it("should treat paths through a non-dict as absent", () => {
      field("n").assign(1);
      expect(readPath(root, ["n", "x"])).toBeUndefined();
    });

    it("should return the root for an empty path", () => {
      field("n").assign(1);
      expect(readPath(root, [])).toEqual(dictValue(root));
    });

    it("should read typed values and reject the wrong type", () => {
      field("n").assign(5);
      field("s").assign("héllo");
      expect(field("n").int()).toBe(5);
      expect(field("n").bigint()).toBe(5n);
      expect(field("n").string()).toBeUndefined();
      expect(field("s").string()).toBe("héllo");
      expect(field("s").bytes()).toEqual(enc("héllo"));
      expect(field("s").int()).toBeUndefined();
    });

    it("should not decode invalid UTF-8 as a string", () => {
      field("s").assign(Uint8Array.of(0xff, 0xfe));
      expect(field("s").bytes()).toEqual(Uint8Array.of(0xff, 0xfe));
      expect(field("s").string()).toBeUndefined();
    });

    it("should only return integers that fit a number", () => {
      field("n").assign(2n ** 60n);
      expect(field("n").bigint()).toBe(2n ** 60n);
      expect(field("n").int()).toBeUndefined();
    });

    it("should extend paths with child()", () => {
      expect(field("d").child("k", "x").path).toEqual(["d", "k", "x"]);
    });
  });

  describe("Writes", () => {
    it("should stamp local writes as pending and notify the host", () => {
      field("n").assign(5);
      expect(root.stamps.get("n")?.length).toBe(0);
      expect(writes).toBe(1);
    });

    it("should ignore writes of the current value", () => {
      field("n").assign(5);
      field("n").assign(5n);
      expect(writes).toBe(1);
    });

    it("should create intermediate dicts", () => {
      field("d", "k1", "r").assign(3);
      expect(readPath(root, ["d", "k1"])?.type).toBe("dict");
      expect(field("d", "k1", "r").int()).toBe(3);
    });

    it("should erase when assigned an empty value", () => {
      field("s").assign("abc");
      field("s").assign("");
      expect(field("s").exists()).toBe(false);
      expect(root.isEmpty()).toBe(true);
    });

    it("should reject paths and types the schema does not know", () => {
      expect(() => field("zz").assign(1)).toThrow(ValidationError);
      expect(() => field("n").assign("text")).toThrow(ValidationError);
      expect(() => field("n", "x").assign(1)).toThrow(ValidationError);
      expect(() => field("d", "k", "r").assign("text")).toThrow(ValidationError);
      expect(root.isEmpty()).toBe(true);
      expect(writes).toBe(0);
    });

    it("should write the given stamp on every leaf of a dict value", () => {
      const record = new ConfigDict();
      record.entries.set("r", intValue(1));
      record.entries.set("x", intValue(2));
      writePath(root, ["d", "k"], dictValue(record), stamp(4), TEST_SCHEMA);
      expect(record.stamps.get("r")).toEqual(stamp(4));
      expect(record.stamps.get("x")).toEqual(stamp(4));

      writePath(root, ["n"], intValue(1), stamp(3), TEST_SCHEMA);
      expect(root.stamps.get("n")).toEqual(stamp(3));
    });

    it("should add and remove set members", () => {
      field("m").setAdd("b");
      field("m").setAdd("a");
      field("m").setAdd("a");
      expect([...(field("m").set() ?? [])].sort()).toEqual(["a", "b"]);
      expect(writes).toBe(2);

      field("m").setRemove("a");
      field("m").setRemove("b");
      expect(field("m").exists()).toBe(false);
    });
  });

  describe("Erase", () => {
    it("should prune dicts left empty, but never the root", () => {
      field("d", "k1", "r").assign(3);
      expect(field("d", "k1", "r").erase()).toBe(true);
      expect(root.isEmpty()).toBe(true);
      expect(erasePath(root, [])).toBe(false);
    });

    it("should keep siblings", () => {
      field("d", "k1", "r").assign(1);
      field("d", "k2", "r").assign(2);
      field("d", "k1", "r").erase();
      expect(field("d", "k1").exists()).toBe(false);
      expect(field("d", "k2", "r").int()).toBe(2);
    });

    it("should keep a dict that still holds vault entries", () => {
      field("d", "k1", "r").assign(3);
      field("d", "k1").dict()?.unknown.set("q", { raw: enc("i1e"), stamp: ZERO_STAMP });

      expect(field("d", "k1", "r").erase()).toBe(true);
      expect(field("d", "k1").dict()?.unknown.has("q")).toBe(true);
    });

    it("should report whether anything was removed", () => {
      expect(field("n").erase()).toBe(false);
      expect(writes).toBe(0);
      expect(root.tombstones.size).toBe(0);
    });

    it("should leave a pending tombstone for an erased last-writer-wins leaf", () => {
      field("n").assign(5);
      field("n").erase();
      expect(root.tombstones.get("n")).toEqual(new Uint8Array(0));

      field("n").assign(6);
      expect(root.tombstones.has("n")).toBe(false);
      expect(field("n").int()).toBe(6);
    });

    it("should leave no tombstone for counters or whole records", () => {
      field("r").assign(1);
      field("r").erase();
      field("d", "k1", "x").assign(1);
      field("d", "k1").erase();

      expect(root.tombstones.size).toBe(0);
      expect(root.isEmpty()).toBe(true);
    });
  });

  describe("Optional field helpers", () => {
    it("should store only meaningful values", () => {
      setNonzeroInt(field("n"), 7);
      expect(field("n").int()).toBe(7);
      setNonzeroInt(field("n"), 0);
      expect(field("n").exists()).toBe(false);

      setPositiveInt(field("n"), -1);
      expect(field("n").exists()).toBe(false);
      setPositiveInt(field("n"), 2);
      expect(field("n").int()).toBe(2);

      setFlag(field("r"), true);
      expect(field("r").int()).toBe(1);
      setFlag(field("r"), false);
      expect(field("r").exists()).toBe(false);

      setNonemptyString(field("s"), "x");
      expect(field("s").string()).toBe("x");
      setNonemptyString(field("s"), "");
      expect(field("s").exists()).toBe(false);
    });

    it("should set or clear a pair together", () => {
      setPairIf(true, field("d", "k", "r"), 1, field("d", "k", "x"), 60);
      expect(field("d", "k", "r").int()).toBe(1);
      expect(field("d", "k", "x").int()).toBe(60);

      setPairIf(false, field("d", "k", "r"), 1, field("d", "k", "x"), 60);
      expect(field("d", "k").exists()).toBe(false);
    });
  });
});
