function parseList(raw: string | undefined): string[] {
  return (
    raw
      ?.split(";")
      .map((s) => s.trim())
      .filter(Boolean) ?? []
  );
}

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** Accepted clock drift for signed envelopes, in seconds */
  maxSkewSecs: number;
  /** Upper bound on history page size */
  pageLen: number;
  /** Pending events a live subscriber may buffer before it is dropped */
  streamQueueLimit: number;
  nonceSweepIntervalMs: number;
  /** Users allowed to create rooms. Empty means anyone. */
  roomCreators: string[];
  maxTitleLength: number;
  maxTextLength: number;
  /** Base URL used for links in the JSON feed */
  publicUrl: string;
}

const port = parseInt(process.env.PORT ?? "9000", 10);
const host = process.env.HOST ?? "0.0.0.0";

const config: ServerConfig = {
  port,
  host,
  dataDir: process.env.DATA_DIR ?? "./data",
  maxSkewSecs: parseInt(process.env.MAX_SKEW_SECS ?? "90", 10),
  pageLen: parseInt(process.env.PAGE_LEN ?? "64", 10),
  streamQueueLimit: parseInt(process.env.STREAM_QUEUE_LIMIT ?? "256", 10),
  nonceSweepIntervalMs: parseInt(process.env.NONCE_SWEEP_INTERVAL_MS ?? "60000", 10),
  roomCreators: parseList(process.env.ROOM_CREATORS),
  maxTitleLength: parseInt(process.env.MAX_TITLE_LENGTH ?? "256", 10),
  maxTextLength: parseInt(process.env.MAX_TEXT_LENGTH ?? "4096", 10),
  publicUrl: process.env.PUBLIC_URL?.trim() || `http://${host}:${port}`,
};

export function canCreateRooms(user: string, roomCreators = config.roomCreators): boolean {
  return roomCreators.length === 0 || roomCreators.includes(user);
}

export default config;
