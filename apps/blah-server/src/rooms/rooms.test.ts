import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MemberPermission, RoomAttrs } from "@blah/protocol";
import { initDb, closeDb } from "../db/database.js";
import { NOW, alice, bob, carol } from "../test-utils.js";
import {
  addMember,
  canPost,
  canRead,
  createRoom,
  getMemberPermission,
  getMembers,
  getRoom,
  isMember,
} from "./rooms.js";

function makeRoom(attrs: number) {
  return createRoom(
    alice.user,
    {
      attrs,
      title: "lobby",
      members: [{ permission: MemberPermission.ALL, user: alice.user }],
    },
    NOW
  );
}

describe("rooms", () => {
  beforeEach(() => {
    initDb(":memory:");
  });

  afterEach(() => {
    closeDb();
  });

  it("creates a room with its member list", () => {
    const room = makeRoom(RoomAttrs.PUBLIC_READABLE);

    expect(room.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(getRoom(room.id)).toEqual({
      id: room.id,
      attrs: 1,
      title: "lobby",
      creator: alice.user,
      createdAt: NOW,
    });
    expect(getMembers(room.id)).toEqual([{ user: alice.user, permission: -1 }]);
    expect(getMemberPermission(room.id, alice.user)).toBe(-1);
  });

  it("gives every room a fresh id", () => {
    expect(makeRoom(0).id).not.toBe(makeRoom(0).id);
  });

  it("returns undefined for unknown rooms", () => {
    expect(getRoom("7ed9e067-ec37-4054-9fc2-b1bd890929bd")).toBeUndefined();
  });

  it("lets anyone read a public room but only members post", () => {
    const room = makeRoom(RoomAttrs.PUBLIC_READABLE);

    expect(canRead(room)).toBe(true);
    expect(canRead(room, bob.user)).toBe(true);
    expect(canPost(room, alice.user)).toBe(true);
    expect(canPost(room, bob.user)).toBe(false);
  });

  it("limits a private room to its members", () => {
    const room = makeRoom(0);

    expect(canRead(room)).toBe(false);
    expect(canRead(room, bob.user)).toBe(false);
    expect(canRead(room, alice.user)).toBe(true);
    expect(isMember(room.id, alice.user)).toBe(true);
    expect(isMember(room.id, bob.user)).toBe(false);
  });

  it("adds members once and keeps their first level", () => {
    const room = makeRoom(0);

    expect(addMember(room.id, bob.user, MemberPermission.POST_CHAT)).toBe(true);
    expect(addMember(room.id, bob.user, MemberPermission.ALL)).toBe(false);
    expect(getMemberPermission(room.id, bob.user)).toBe(1);
    expect(canRead(room, bob.user)).toBe(true);
    expect(canPost(room, bob.user)).toBe(true);
    expect(isMember(room.id, carol.user)).toBe(false);
  });
});
