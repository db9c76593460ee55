export {
  type UserId,
  type RoomMember,
  UserIdSchema,
  RoomMemberSchema,
  MemberPermission,
} from "./user.js";

export { type RoomInfo, RoomAttrs, isPublicReadable } from "./room.js";

export {
  type CreateRoomPayload,
  type ChatPayload,
  type AuthPayload,
  type AddMemberPayload,
  CreateRoomPayloadSchema,
  ChatPayloadSchema,
  AuthPayloadSchema,
  AddMemberPayloadSchema,
  CreateRoomEnvelopeSchema,
  ChatEnvelopeSchema,
  AuthEnvelopeSchema,
  AddMemberEnvelopeSchema,
} from "./commands.js";

export {
  type Signee,
  type WithSig,
  type ChatItem,
  type HistoryPage,
  withSigSchema,
  HistoryQuerySchema,
} from "./messages.js";

export {
  type ErrorCode,
  type ErrorBody,
  type StreamCloseReason,
  WS_CLOSE_LAGGED,
} from "./events.js";
