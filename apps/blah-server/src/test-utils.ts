import {
  identityFromSeed,
  signEnvelope,
  type Identity,
  type SignOptions,
} from "@blah/crypto";
import { MemberPermission, RoomAttrs, type CreateRoomPayload, type RoomMember, type WithSig } from "@blah/protocol";
import { contextFromConfig, type CoreContext } from "./context.js";
import { ChatError } from "./errors.js";

/** Fixed server time for tests */
export const NOW = 1_724_966_284;

export const alice = identityFromSeed(new Uint8Array(32).fill(1));
export const bob = identityFromSeed(new Uint8Array(32).fill(2));
export const carol = identityFromSeed(new Uint8Array(32).fill(3));

export function testContext(overrides: Partial<CoreContext> = {}): CoreContext {
  return contextFromConfig({
    clock: () => NOW,
    maxSkewSecs: 90,
    pageLen: 64,
    streamQueueLimit: 16,
    roomCreators: [],
    maxTitleLength: 256,
    maxTextLength: 4096,
    publicUrl: "http://chat.test",
    ...overrides,
  });
}

let lastNonce = 0;

/** Sign with a fresh nonce and the test clock's time */
export function signed<T>(payload: T, who: Identity, options: SignOptions = {}): WithSig<T> {
  lastNonce += 1;
  return signEnvelope(payload, who, { nonce: lastNonce, timestamp: NOW, ...options });
}

export function createRoomPayload(
  owner: Identity,
  attrs: number = RoomAttrs.PUBLIC_READABLE,
  others: RoomMember[] = []
): CreateRoomPayload {
  const members = [{ permission: MemberPermission.ALL, user: owner.user }, ...others].sort((a, b) =>
    a.user < b.user ? -1 : a.user > b.user ? 1 : 0
  );
  return { typ: "create_room", attrs, members, title: "test room" };
}

/** The ChatError code a call fails with, or undefined if it succeeds */
export function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ChatError) return err.code;
    throw err;
  }
  return undefined;
}
