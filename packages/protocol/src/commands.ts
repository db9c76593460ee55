import { z } from "zod";
import { RoomMemberSchema, UserIdSchema } from "./user.js";
import { withSigSchema } from "./messages.js";

/** Client → Server payloads. Each one travels inside a signed envelope. */

const RoomIdSchema = z.string().uuid();

export const CreateRoomPayloadSchema = z
  .object({
    typ: z.literal("create_room"),
    attrs: z.number().int().nonnegative().safe(),
    members: z.array(RoomMemberSchema).min(1),
    title: z.string(),
  })
  .strict()
  .superRefine((payload, ctx) => {
    // Sorted by user, which also rules out duplicates
    for (let i = 1; i < payload.members.length; i++) {
      if (payload.members[i - 1].user >= payload.members[i].user) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["members", i],
          message: "unsorted or duplicated users",
        });
        return;
      }
    }
  });

export const ChatPayloadSchema = z
  .object({
    typ: z.literal("chat"),
    room: RoomIdSchema,
    text: z.string(),
  })
  .strict();

/** Proof of room membership for read access */
export const AuthPayloadSchema = z
  .object({
    typ: z.literal("auth"),
    room: RoomIdSchema,
  })
  .strict();

export const AddMemberPayloadSchema = z
  .object({
    typ: z.literal("add_member"),
    permission: z.number().int().safe(),
    room: RoomIdSchema,
    user: UserIdSchema,
  })
  .strict();

export type CreateRoomPayload = z.infer<typeof CreateRoomPayloadSchema>;
export type ChatPayload = z.infer<typeof ChatPayloadSchema>;
export type AuthPayload = z.infer<typeof AuthPayloadSchema>;
export type AddMemberPayload = z.infer<typeof AddMemberPayloadSchema>;

/** Each route accepts exactly one payload type */
export const CreateRoomEnvelopeSchema = withSigSchema(CreateRoomPayloadSchema);
export const ChatEnvelopeSchema = withSigSchema(ChatPayloadSchema);
export const AuthEnvelopeSchema = withSigSchema(AuthPayloadSchema);
export const AddMemberEnvelopeSchema = withSigSchema(AddMemberPayloadSchema);
