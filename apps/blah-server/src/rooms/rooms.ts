import { v4 as uuid } from "uuid";
import { getDb } from "../db/database.js";
import { isPublicReadable, type RoomInfo, type RoomMember, type UserId } from "@blah/protocol";

/**
 * Create a room with its initial member list in one step.
 * The creator's level is whatever the list gives them.
 */
export function createRoom(
  creator: UserId,
  room: { attrs: number; title: string; members: RoomMember[] },
  now: number
): RoomInfo {
  const db = getDb();
  const id = uuid();

  db.transaction(() => {
    db.prepare("INSERT INTO rooms (id, attrs, title, creator, created_at) VALUES (?, ?, ?, ?, ?)").run(
      id,
      room.attrs,
      room.title,
      creator,
      now
    );
    const insertMember = db.prepare(
      "INSERT INTO room_members (room_id, user, permission) VALUES (?, ?, ?)"
    );
    for (const member of room.members) {
      insertMember.run(id, member.user, member.permission);
    }
  })();

  return { id, attrs: room.attrs, title: room.title, creator, createdAt: now };
}

export function getRoom(id: string): RoomInfo | undefined {
  const row = getDb()
    .prepare("SELECT * FROM rooms WHERE id = ?")
    .get(id) as Record<string, unknown> | undefined;

  return row ? rowToRoom(row) : undefined;
}

export function getMemberPermission(roomId: string, user: UserId): number | undefined {
  const row = getDb()
    .prepare("SELECT permission FROM room_members WHERE room_id = ? AND user = ?")
    .get(roomId, user) as { permission: number } | undefined;
  return row?.permission;
}

export function isMember(roomId: string, user: UserId): boolean {
  return getMemberPermission(roomId, user) !== undefined;
}

export function getMembers(roomId: string): RoomMember[] {
  return getDb()
    .prepare("SELECT user, permission FROM room_members WHERE room_id = ? ORDER BY user")
    .all(roomId) as RoomMember[];
}

/** Public rooms are readable by anyone, private ones by members only */
export function canRead(room: RoomInfo, user?: UserId): boolean {
  if (isPublicReadable(room.attrs)) return true;
  return user !== undefined && isMember(room.id, user);
}

/** Any member may post, whatever their level */
export function canPost(room: RoomInfo, user: UserId): boolean {
  return isMember(room.id, user);
}

/** Add a member. Returns false if they already belong to the room. */
export function addMember(roomId: string, user: UserId, permission: number): boolean {
  const result = getDb()
    .prepare("INSERT OR IGNORE INTO room_members (room_id, user, permission) VALUES (?, ?, ?)")
    .run(roomId, user, permission);
  return result.changes === 1;
}

function rowToRoom(row: Record<string, unknown>): RoomInfo {
  return {
    id: row.id as string,
    attrs: row.attrs as number,
    title: row.title as string,
    creator: row.creator as string,
    createdAt: row.created_at as number,
  };
}
