import { Feed } from "feed";
import { isPublicReadable } from "@blah/protocol";
import { getRoom } from "../rooms/rooms.js";
import { getChatPage } from "../chat/store.js";
import { ChatError } from "../errors.js";
import type { CoreContext } from "../context.js";

const TITLE_PREVIEW_LEN = 80;

/** JSON feed of a public room's newest items. Private rooms are not served. */
export function buildRoomFeed(roomId: string, ctx: CoreContext): Feed {
  const room = getRoom(roomId);
  if (!room || !isPublicReadable(room.attrs)) {
    throw new ChatError("ROOM_NOT_FOUND", "Room does not exist or is private");
  }

  const items = getChatPage(room.id, undefined, ctx.pageLen);
  const roomUrl = `${ctx.publicUrl}/room/${room.id}`;
  const latest = items[0];

  const feed = new Feed({
    title: room.title,
    id: roomUrl,
    link: roomUrl,
    updated: new Date((latest ? latest.timestamp : room.createdAt) * 1000),
    copyright: "",
    feedLinks: { json: `${roomUrl}/feed.json` },
  });

  for (const item of items) {
    feed.addItem({
      title:
        item.text.length > TITLE_PREVIEW_LEN ? `${item.text.slice(0, TITLE_PREVIEW_LEN)}…` : item.text,
      id: `${roomUrl}/item/${item.cid}`,
      link: `${roomUrl}/item?before_id=${item.cid + 1}`,
      description: item.text,
      date: new Date(item.timestamp * 1000),
      author: [{ name: item.user }],
    });
  }

  return feed;
}
