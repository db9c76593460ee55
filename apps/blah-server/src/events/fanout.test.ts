import { describe, it, expect, afterEach } from "vitest";
import type { ChatItem } from "@blah/protocol";
import { closeAllSubscriptions, publish, subscribe, subscriberCount } from "./fanout.js";

const ROOM = "7ed9e067-ec37-4054-9fc2-b1bd890929bd";
const OTHER = "0b6f8a43-2c1e-4b1a-9d0e-3f2a1c5b7e90";

function item(cid: number, room = ROOM): ChatItem {
  return { cid, room, user: "alice", text: `m${cid}`, timestamp: 0, nonce: cid, sig: "" };
}

describe("fanout", () => {
  afterEach(() => {
    closeAllSubscriptions();
  });

  it("delivers published items in order", async () => {
    const sub = subscribe(ROOM, undefined, 10);
    expect(publish(item(1))).toBe(1);
    expect(publish(item(2))).toBe(1);

    expect((await sub.next()).value).toEqual(item(1));
    expect((await sub.next()).value).toEqual(item(2));
  });

  it("wakes a waiting reader", async () => {
    const sub = subscribe(ROOM, undefined, 10);
    const pending = sub.next();
    publish(item(1));

    expect(await pending).toEqual({ value: item(1), done: false });
  });

  it("delivers to every subscriber of the room and no other", async () => {
    const a = subscribe(ROOM, undefined, 10);
    const b = subscribe(ROOM, "bob", 10);
    const elsewhere = subscribe(OTHER, undefined, 10);

    expect(publish(item(1))).toBe(2);
    expect(a.pending).toBe(1);
    expect(b.pending).toBe(1);
    expect(elsewhere.pending).toBe(0);
  });

  it("works with for await and stops on close", async () => {
    const sub = subscribe(ROOM, undefined, 10);
    publish(item(1));
    publish(item(2));
    publish(item(3));

    const seen: number[] = [];
    for await (const received of sub) {
      seen.push(received.cid);
      if (received.cid === 3) break;
    }

    expect(seen).toEqual([1, 2, 3]);
    expect(sub.closeReason).toBe("unsubscribed");
    expect(subscriberCount(ROOM)).toBe(0);
  });

  it("drops a lagging subscriber without holding up the others", async () => {
    const slow = subscribe(ROOM, undefined, 2);
    const fast = subscribe(ROOM, undefined, 10);

    publish(item(1));
    publish(item(2));
    expect(publish(item(3))).toBe(1);

    expect(slow.closeReason).toBe("lagged");
    expect(await slow.next()).toEqual({ value: undefined, done: true });
    expect(subscriberCount(ROOM)).toBe(1);
    expect(fast.pending).toBe(3);
  });

  it("stops delivering after unsubscribe", async () => {
    const sub = subscribe(ROOM, undefined, 10);
    const pending = sub.next();
    sub.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(publish(item(1))).toBe(0);
    expect(subscriberCount(ROOM)).toBe(0);
  });

  it("closes everything on shutdown", () => {
    const a = subscribe(ROOM, undefined, 10);
    const b = subscribe(OTHER, undefined, 10);
    closeAllSubscriptions();

    expect(a.closeReason).toBe("shutdown");
    expect(b.closeReason).toBe("shutdown");
    expect(subscriberCount(ROOM)).toBe(0);
    expect(subscriberCount(OTHER)).toBe(0);
  });
});
