/** Server → Client errors and stream signals */

export type ErrorCode =
  | "BAD_ENVELOPE"
  | "UNKNOWN_USER"
  | "INVALID_SIGNATURE"
  | "STALE_TIMESTAMP"
  | "NONCE_REUSED"
  | "FORBIDDEN"
  | "ROOM_NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL";

export interface ErrorBody {
  error: {
    code: ErrorCode;
    message: string;
  };
}

/** Why a live stream ended */
export type StreamCloseReason = "unsubscribed" | "lagged" | "shutdown";

/** WebSocket close code sent when a subscriber falls too far behind */
export const WS_CLOSE_LAGGED = 4000;
