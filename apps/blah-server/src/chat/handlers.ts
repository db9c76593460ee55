import {
  AddMemberEnvelopeSchema,
  ChatEnvelopeSchema,
  CreateRoomEnvelopeSchema,
  HistoryQuerySchema,
  MemberPermission,
  type ChatItem,
  type HistoryPage,
  type RoomInfo,
  type WithSig,
} from "@blah/protocol";
import { getDb } from "../db/database.js";
import { ChatError } from "../errors.js";
import { canCreateRooms } from "../config.js";
import type { CoreContext } from "../context.js";
import { parseEnvelope, verifyAuthHeader, verifySignature } from "../auth/verify.js";
import { admitNonce } from "../auth/replay.js";
import { addMember, canPost, canRead, createRoom, getMemberPermission, getRoom } from "../rooms/rooms.js";
import { appendChat, getChatPage } from "./store.js";
import { publish, subscribe, type Subscription } from "../events/fanout.js";

/** Signature check, then replay check. Runs inside the caller's transaction. */
function admit<T>(envelope: WithSig<T>, ctx: CoreContext): void {
  verifySignature(envelope, ctx.keys);
  const { user, nonce, timestamp } = envelope.signee;
  admitNonce(user, nonce, timestamp, ctx.clock(), ctx.maxSkewSecs);
}

/** Length in Unicode code points, so one emoji counts once */
function charCount(text: string): number {
  return [...text].length;
}

function requireRoom(roomId: string): RoomInfo {
  const room = getRoom(roomId);
  if (!room) {
    throw new ChatError("ROOM_NOT_FOUND", `Room ${roomId} not found`);
  }
  return room;
}

export function handleCreateRoom(raw: unknown, ctx: CoreContext): RoomInfo {
  const db = getDb();

  const room = db.transaction(() => {
    const envelope = parseEnvelope(CreateRoomEnvelopeSchema, raw);
    const { payload, user } = envelope.signee;

    if (charCount(payload.title) > ctx.maxTitleLength) {
      throw new ChatError("BAD_ENVELOPE", `Title exceeds ${ctx.maxTitleLength} characters`);
    }
    if (!payload.members.some((m) => m.user === user)) {
      throw new ChatError("BAD_ENVELOPE", "Member list must include the room creator");
    }

    admit(envelope, ctx);

    if (!canCreateRooms(user, ctx.roomCreators)) {
      throw new ChatError("FORBIDDEN", "You may not create rooms");
    }

    return createRoom(user, payload, ctx.clock());
  })();

  console.log(`[rooms] Created "${room.title}" (${room.id})`);
  return room;
}

export function handlePostChat(roomId: string, raw: unknown, ctx: CoreContext): ChatItem {
  const db = getDb();

  const item = db.transaction(() => {
    const envelope = parseEnvelope(ChatEnvelopeSchema, raw);
    const { payload, user, nonce, timestamp } = envelope.signee;

    if (payload.room !== roomId) {
      throw new ChatError("BAD_ENVELOPE", "Payload room does not match the request path");
    }
    if (charCount(payload.text) > ctx.maxTextLength) {
      throw new ChatError("BAD_ENVELOPE", `Text exceeds ${ctx.maxTextLength} characters`);
    }

    admit(envelope, ctx);

    const room = requireRoom(roomId);
    if (!canPost(room, user)) {
      throw new ChatError("FORBIDDEN", "You are not a member of this room");
    }

    return appendChat({ room: roomId, user, text: payload.text, timestamp, nonce, sig: envelope.sig });
  })();

  // Committed; publish before yielding so delivery follows cid order
  publish(item);
  return item;
}

/** Only the owner level may add members. Existing members are left alone. */
export function handleAddMember(roomId: string, raw: unknown, ctx: CoreContext): void {
  const db = getDb();

  db.transaction(() => {
    const envelope = parseEnvelope(AddMemberEnvelopeSchema, raw);
    const { payload, user } = envelope.signee;

    if (payload.room !== roomId) {
      throw new ChatError("BAD_ENVELOPE", "Payload room does not match the request path");
    }

    admit(envelope, ctx);

    requireRoom(roomId);
    if (getMemberPermission(roomId, user) !== MemberPermission.ALL) {
      throw new ChatError("FORBIDDEN", "Only room owners may add members");
    }
    if (!addMember(roomId, payload.user, payload.permission)) {
      throw new ChatError("CONFLICT", "User is already a member");
    }
  })();
}

/** Resolve the room and check read access. Private rooms look missing to outsiders. */
function authorizeRead(roomId: string, authHeader: string | undefined, ctx: CoreContext): string | undefined {
  const room = requireRoom(roomId);
  const user = verifyAuthHeader(authHeader, roomId, ctx);
  if (!canRead(room, user)) {
    throw new ChatError("ROOM_NOT_FOUND", `Room ${roomId} not found`);
  }
  return user;
}

export function handleGetHistory(
  roomId: string,
  query: unknown,
  authHeader: string | undefined,
  ctx: CoreContext
): HistoryPage {
  const parsed = HistoryQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw new ChatError("BAD_ENVELOPE", "Invalid history query");
  }

  authorizeRead(roomId, authHeader, ctx);

  const limit = Math.min(parsed.data.limit ?? ctx.pageLen, ctx.pageLen);
  const items = getChatPage(roomId, parsed.data.before_id, limit);
  return { items, hasMore: items.length >= limit };
}

/**
 * Open a live stream. Access is decided once, here, with the same rule as
 * history; later membership changes do not affect an open stream.
 */
export function handleSubscribe(roomId: string, authHeader: string | undefined, ctx: CoreContext): Subscription {
  const user = authorizeRead(roomId, authHeader, ctx);
  return subscribe(roomId, user, ctx.streamQueueLimit);
}
