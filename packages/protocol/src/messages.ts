import { z } from "zod";
import type { UserId } from "./user.js";
import { UserIdSchema } from "./user.js";

/** Every signed request follows this envelope shape */
export interface Signee<T> {
  nonce: number;
  payload: T;
  timestamp: number; // Unix seconds
  user: UserId;
}

export interface WithSig<T> {
  sig: string; // hex-encoded Ed25519 detached signature
  signee: Signee<T>;
}

/** Build the envelope schema for a given payload schema */
export function withSigSchema<T extends z.ZodTypeAny>(payload: T) {
  return z
    .object({
      sig: z.string().regex(/^[0-9a-f]{128}$/, "sig must be 64 hex-encoded bytes"),
      signee: z
        .object({
          nonce: z.number().int().nonnegative().safe(),
          payload,
          timestamp: z.number().int().nonnegative().safe(),
          user: UserIdSchema,
        })
        .strict(),
    })
    .strict();
}

/** A stored/transmitted chat item */
export interface ChatItem {
  cid: number;
  room: string;
  user: UserId;
  text: string;
  timestamp: number;
  nonce: number;
  sig: string;
}

export interface HistoryPage {
  items: ChatItem[];
  hasMore: boolean;
}

export const HistoryQuerySchema = z
  .object({
    before_id: z.coerce.number().int().nonnegative().safe().optional(),
    limit: z.coerce.number().int().positive().safe().optional(),
  });
