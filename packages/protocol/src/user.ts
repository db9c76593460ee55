import { z } from "zod";

/**
 * Opaque user identifier. The bundled key directory reads it as the
 * lowercase hex encoding of an Ed25519 public key.
 */
export type UserId = string;

export const UserIdSchema = z.string().min(1).max(128);

/** Member permission levels. Compared for equality only. */
export const MemberPermission = {
  POST_CHAT: 1,
  ADD_MEMBER: 2,
  /** Owner level, given to room creators */
  ALL: -1,
} as const;

export const RoomMemberSchema = z
  .object({
    permission: z.number().int().safe(),
    user: UserIdSchema,
  })
  .strict();

export type RoomMember = z.infer<typeof RoomMemberSchema>;
