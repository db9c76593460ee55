/**
 * Produce signed envelopes for poking a running server with curl.
 *
 * Usage:
 *   npx tsx utils/sign-envelope.ts keygen
 *   BLAH_MNEMONIC="..." npx tsx utils/sign-envelope.ts create-room <title> [attrs]
 *   BLAH_MNEMONIC="..." npx tsx utils/sign-envelope.ts chat <room> <text>
 *   BLAH_MNEMONIC="..." npx tsx utils/sign-envelope.ts auth <room>
 *   BLAH_MNEMONIC="..." npx tsx utils/sign-envelope.ts add-member <room> <user> [permission]
 */

import {
  MemberPermission,
  RoomAttrs,
  type AddMemberPayload,
  type AuthPayload,
  type ChatPayload,
  type CreateRoomPayload,
} from "../packages/protocol/src/index.js";
import {
  generateMnemonic,
  identityFromMnemonic,
  signEnvelope,
  type Identity,
} from "../packages/crypto/src/index.js";

const USAGE = "Usage: npx tsx utils/sign-envelope.ts <keygen|create-room|chat|auth|add-member> [args...]";

function usage(): never {
  console.error(USAGE);
  process.exit(1);
}

function loadIdentity(): Identity {
  const mnemonic = process.env.BLAH_MNEMONIC?.trim();
  if (!mnemonic) {
    console.error("Set BLAH_MNEMONIC to the phrase printed by `keygen`");
    process.exit(1);
  }
  return identityFromMnemonic(mnemonic);
}

function parseIntArg(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) usage();
  return value;
}

function main() {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case "keygen": {
      const mnemonic = generateMnemonic();
      console.log(`BLAH_MNEMONIC="${mnemonic}"`);
      console.log(`user=${identityFromMnemonic(mnemonic).user}`);
      return;
    }
    case "create-room": {
      const [title, attrs] = args;
      if (title === undefined) usage();
      const identity = loadIdentity();
      const payload: CreateRoomPayload = {
        typ: "create_room",
        attrs: parseIntArg(attrs, RoomAttrs.PUBLIC_READABLE),
        members: [{ permission: MemberPermission.ALL, user: identity.user }],
        title,
      };
      console.log(JSON.stringify(signEnvelope(payload, identity)));
      return;
    }
    case "chat": {
      const [room, text] = args;
      if (room === undefined || text === undefined) usage();
      const payload: ChatPayload = { typ: "chat", room, text };
      console.log(JSON.stringify(signEnvelope(payload, loadIdentity())));
      return;
    }
    case "auth": {
      const [room] = args;
      if (room === undefined) usage();
      const payload: AuthPayload = { typ: "auth", room };
      console.log(JSON.stringify(signEnvelope(payload, loadIdentity())));
      return;
    }
    case "add-member": {
      const [room, user, permission] = args;
      if (room === undefined || user === undefined) usage();
      const payload: AddMemberPayload = {
        typ: "add_member",
        permission: parseIntArg(permission, MemberPermission.POST_CHAT),
        room,
        user,
      };
      console.log(JSON.stringify(signEnvelope(payload, loadIdentity())));
      return;
    }
    default:
      usage();
  }
}

main();
