import type { UserId } from "@blah/protocol";
import { publicKeyFromUser } from "@blah/crypto";
import config, { type ServerConfig } from "./config.js";

/** Resolves a user id to the Ed25519 key that verifies its envelopes */
export interface KeyDirectory {
  resolve(user: UserId): Uint8Array | undefined;
}

/** User ids are their own hex-encoded public keys */
export const hexKeyDirectory: KeyDirectory = {
  resolve: publicKeyFromUser,
};

/** Unix seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/** Everything a request handler needs besides the database */
export interface CoreContext
  extends Pick<
    ServerConfig,
    | "maxSkewSecs"
    | "pageLen"
    | "streamQueueLimit"
    | "roomCreators"
    | "maxTitleLength"
    | "maxTextLength"
    | "publicUrl"
  > {
  keys: KeyDirectory;
  clock: Clock;
}

export function contextFromConfig(overrides: Partial<CoreContext> = {}): CoreContext {
  return {
    maxSkewSecs: config.maxSkewSecs,
    pageLen: config.pageLen,
    streamQueueLimit: config.streamQueueLimit,
    roomCreators: config.roomCreators,
    maxTitleLength: config.maxTitleLength,
    maxTextLength: config.maxTextLength,
    publicUrl: config.publicUrl,
    keys: hexKeyDirectory,
    clock: systemClock,
    ...overrides,
  };
}
