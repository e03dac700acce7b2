import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { bytesToHex } from "@noble/hashes/utils.js";
import { Conversations, OpenGroup, type ExpirationMode } from "../src/index";
import { NewerConversations, SEED_A, SERVER_PUBKEY, sessionId } from "./setup";

const ALICE = sessionId(0xaa);
const GROUP = sessionId(0x11);

function setLastRead(convos: Conversations, id: string, lastRead: number): void {
  const info = convos.getOrConstruct1to1(id);
  info.lastRead = lastRead;
  convos.set(info);
}

function setExpiration(
  convos: Conversations,
  id: string,
  expiration: ExpirationMode,
  expirationTimer: number,
): void {
  const info = convos.getOrConstruct1to1(id);
  info.expiration = expiration;
  info.expirationTimer = expirationTimer;
  convos.set(info);
}

describe("Multi-device Integration Tests", () => {
  let device1: Conversations;
  let device2: Conversations;

  beforeEach(() => {
    device1 = new Conversations(SEED_A);
    device2 = new Conversations(SEED_A);
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    device1.destroy();
    device2.destroy();
    vi.restoreAllMocks();
  });

  it("should sync last read markers both ways", () => {
    // 1. First device reads up to 1000 and pushes
    setLastRead(device1, ALICE, 1000);
    const first = device1.push();
    expect(first.seqno).toBe(1);
    expect(first.namespace).toBe(4);

    // 2. Second device picks it up
    expect(device2.pull(first.ciphertext)).toBe(1);
    expect(device2.get1to1(ALICE)?.lastRead).toBe(1000);

    // 3. Second device reads further and pushes back
    setLastRead(device2, ALICE, 2000);
    const second = device2.push();
    expect(second.seqno).toBe(2);

    expect(device1.pull(second.ciphertext)).toBe(1);
    expect(device1.get1to1(ALICE)?.lastRead).toBe(2000);
    expect(device2.get1to1(ALICE)?.lastRead).toBe(2000);

    // Nothing left for the first device to push
    expect(device1.seqno).toBe(2);
    expect(device1.needsPush()).toBe(false);
  });

  it("should converge after concurrent edits to one conversation", () => {
    setLastRead(device1, ALICE, 100);

    const info = device2.getOrConstruct1to1(ALICE);
    info.lastRead = 50;
    info.expiration = "after_send";
    info.expirationTimer = 60;
    device2.set(info);

    const push1 = device1.push().ciphertext;
    const push2 = device2.push().ciphertext;
    expect(device1.pull(push2)).toBe(1);
    expect(device2.pull(push1)).toBe(1);

    const expected = {
      type: "one_to_one",
      sessionId: ALICE,
      lastRead: 100,
      expiration: "after_send",
      expirationTimer: 60,
    };
    expect(device1.get1to1(ALICE)).toEqual(expected);
    expect(device2.get1to1(ALICE)).toEqual(expected);

    expect(device1.seqno).toBe(2);
    expect(device2.seqno).toBe(2);
    expect(bytesToHex(device1.push().ciphertext)).toBe(
      bytesToHex(device2.push().ciphertext),
    );
  });

  it("should not propagate erasures", () => {
    setLastRead(device1, ALICE, 10);
    device2.pull(device1.push().ciphertext);

    expect(device2.erase1to1(ALICE)).toBe(true);
    device1.pull(device2.push().ciphertext);

    expect(device1.get1to1(ALICE)?.lastRead).toBe(10);
  });

  describe("Disappearing message settings", () => {
    let fresh: Conversations[];

    beforeEach(() => {
      fresh = [];
      setLastRead(device1, ALICE, 10);
      setExpiration(device1, ALICE, "after_send", 60);
    });

    afterEach(() => {
      for (const convos of fresh) convos.destroy();
    });

    function another(dumped?: Uint8Array): Conversations {
      const convos = new Conversations(SEED_A, dumped);
      fresh.push(convos);
      return convos;
    }

    it.each([
      ["changed", "after_read", 5],
      ["switched off", "none", 0],
    ] as const)("should let the later setting win when %s", (_, expiration, timer) => {
      const first = device1.push();
      device2.pull(first.ciphertext);
      setExpiration(device2, ALICE, expiration, timer);
      const second = device2.push();
      expect(second.seqno).toBe(2);

      expect(device1.pull(second.ciphertext)).toBe(1);
      expect(device1.seqno).toBe(2);
      expect(device1.needsPush()).toBe(false);
      expect(bytesToHex(device1.push().ciphertext)).toBe(bytesToHex(second.ciphertext));

      const newestFirst = another();
      newestFirst.pull(second.ciphertext);
      newestFirst.pull(first.ciphertext);
      const oldestFirst = another();
      oldestFirst.pull(first.ciphertext);
      oldestFirst.pull(second.ciphertext);

      for (const convos of [device1, newestFirst, oldestFirst]) {
        const info = convos.get1to1(ALICE);
        expect(info?.expiration).toBe(expiration);
        expect(info?.expirationTimer).toBe(timer);
        expect(info?.lastRead).toBe(10);
        expect(convos.seqno).toBe(2);
        expect(convos.needsPush()).toBe(false);
      }
    });

    it("should keep a switched off setting across concurrent edits", () => {
      device2.pull(device1.push().ciphertext);

      setLastRead(device1, ALICE, 500);
      const read = device1.push();
      setExpiration(device2, ALICE, "none", 0);
      const off = device2.push();
      expect(read.seqno).toBe(2);
      expect(off.seqno).toBe(2);

      expect(device1.pull(off.ciphertext)).toBe(1);
      expect(device2.pull(read.ciphertext)).toBe(1);

      for (const convos of [device1, device2]) {
        expect(convos.get1to1(ALICE)?.expiration).toBe("none");
        expect(convos.get1to1(ALICE)?.lastRead).toBe(500);
        expect(convos.seqno).toBe(3);
        expect(convos.needsPush()).toBe(true);
      }
      expect(bytesToHex(device1.push().ciphertext)).toBe(
        bytesToHex(device2.push().ciphertext),
      );
    });

    it("should remember a switched off setting through dump and restore", () => {
      const first = device1.push();
      device2.pull(first.ciphertext);
      setExpiration(device2, ALICE, "none", 0);
      const off = device2.push();

      const device3 = another();
      device3.pull(off.ciphertext);
      const restarted = another(device3.dump());
      expect(restarted.pull(first.ciphertext)).toBe(1);
      expect(restarted.get1to1(ALICE)?.expiration).toBe("none");
      expect(restarted.seqno).toBe(2);
    });
  });

  it("should survive a restart through dump and restore", () => {
    setLastRead(device1, ALICE, 1000);
    const group = device1.getOrConstructOpen("https://example.org", "general", SERVER_PUBKEY);
    group.lastRead = 500;
    device1.set(group);
    const legacy = device1.getOrConstructLegacyClosed(GROUP);
    legacy.lastRead = 250;
    device1.set(legacy);
    const { ciphertext } = device1.push();

    const restarted = new Conversations(SEED_A, device1.dump());
    expect(restarted.size()).toBe(3);
    expect(restarted.get1to1(ALICE)?.lastRead).toBe(1000);
    expect(restarted.getOpen("https://example.org", "general", SERVER_PUBKEY)?.lastRead).toBe(500);
    expect(restarted.getLegacyClosed(GROUP)?.lastRead).toBe(250);
    expect(restarted.pull(ciphertext)).toBe(0);
    expect(restarted.needsPush()).toBe(true);

    const open = [...restarted.iterateOpen()];
    expect(open).toHaveLength(1);
    expect(open[0]).toBeInstanceOf(OpenGroup);
    restarted.destroy();
  });

  it("should keep closed groups written by a newer version", () => {
    const newer = new NewerConversations(SEED_A);
    newer.field("c", GROUP, "r").assign(42);

    expect(device1.pull(newer.push().ciphertext)).toBe(1);
    expect(device1.size()).toBe(0);
    setLastRead(device1, ALICE, 5);

    // The reserved namespace also survives a dump on the older version
    const restarted = new Conversations(SEED_A, device1.dump());
    expect(newer.pull(restarted.push().ciphertext)).toBe(1);
    expect(newer.field("c", GROUP, "r").int()).toBe(42);
    expect(newer.field("1", ALICE, "r").int()).toBe(5);

    restarted.destroy();
    newer.destroy();
  });
});
