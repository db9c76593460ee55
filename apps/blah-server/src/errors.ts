import type { ErrorBody, ErrorCode } from "@blah/protocol";

/** A request-terminal failure with a client-visible code */
export class ChatError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ChatError";
  }
}

const STATUS: Record<ErrorCode, number> = {
  BAD_ENVELOPE: 400,
  STALE_TIMESTAMP: 400,
  UNKNOWN_USER: 401,
  INVALID_SIGNATURE: 401,
  FORBIDDEN: 403,
  ROOM_NOT_FOUND: 404,
  NONCE_REUSED: 409,
  CONFLICT: 409,
  INTERNAL: 500,
};

export function statusFor(code: ErrorCode): number {
  return STATUS[code];
}

export function errorBody(code: ErrorCode, message: string): ErrorBody {
  return { error: { code, message } };
}
