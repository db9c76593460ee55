import { getDb } from "../db/database.js";
import type { ChatItem } from "@blah/protocol";

/**
 * Append an item to its room's log and return it with its cid.
 * The caller has already checked that the sender may post.
 */
export function appendChat(item: Omit<ChatItem, "cid">): ChatItem {
  const db = getDb();

  return db.transaction(() => {
    const counter = db
      .prepare("UPDATE rooms SET last_cid = last_cid + 1 WHERE id = ? RETURNING last_cid")
      .get(item.room) as { last_cid: number } | undefined;
    if (!counter) {
      throw new Error(`Cannot append to missing room ${item.room}`);
    }

    db.prepare(
      `INSERT INTO chat_items (room_id, cid, user, text, timestamp, nonce, sig)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    ).run(item.room, counter.last_cid, item.user, item.text, item.timestamp, item.nonce, item.sig);

    return { ...item, cid: counter.last_cid };
  })();
}

/**
 * Newest-first page of a room's log. With `beforeId`, only items with a
 * smaller cid are returned, so the oldest cid of one page is the cursor
 * for the next.
 */
export function getChatPage(roomId: string, beforeId: number | undefined, limit: number): ChatItem[] {
  const query =
    beforeId !== undefined
      ? `SELECT * FROM chat_items WHERE room_id = ? AND cid < ? ORDER BY cid DESC LIMIT ?`
      : `SELECT * FROM chat_items WHERE room_id = ? ORDER BY cid DESC LIMIT ?`;

  const params = beforeId !== undefined ? [roomId, beforeId, limit] : [roomId, limit];

  const rows = getDb().prepare(query).all(...params) as Record<string, unknown>[];

  return rows.map(rowToItem);
}

export function countChatItems(roomId: string): number {
  const row = getDb()
    .prepare("SELECT COUNT(*) as c FROM chat_items WHERE room_id = ?")
    .get(roomId) as { c: number };
  return row.c;
}

function rowToItem(row: Record<string, unknown>): ChatItem {
  return {
    cid: row.cid as number,
    room: row.room_id as string,
    user: row.user as string,
    text: row.text as string,
    timestamp: row.timestamp as number,
    nonce: row.nonce as number,
    sig: row.sig as string,
  };
}
