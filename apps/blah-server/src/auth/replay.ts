import { getDb } from "../db/database.js";
import { ChatError } from "../errors.js";
import type { Clock } from "../context.js";

/** Reject timestamps outside [now - maxSkew, now + maxSkew] */
export function assertFresh(timestamp: number, now: number, maxSkew: number): void {
  if (timestamp < now - maxSkew || timestamp > now + maxSkew) {
    throw new ChatError(
      "STALE_TIMESTAMP",
      `Timestamp ${timestamp} is outside the accepted window around ${now}`
    );
  }
}

/**
 * Consume a (user, nonce) pair. The record lives until the envelope's
 * timestamp leaves the window, after which the timestamp check alone
 * rejects a replay.
 */
export function admitNonce(
  user: string,
  nonce: number,
  timestamp: number,
  now: number,
  maxSkew: number
): void {
  assertFresh(timestamp, now, maxSkew);

  const db = getDb();
  const admitted = db.transaction(() => {
    db.prepare("DELETE FROM used_nonces WHERE user = ? AND nonce = ? AND expires_at < ?").run(
      user,
      nonce,
      now
    );
    const result = db
      .prepare("INSERT OR IGNORE INTO used_nonces (user, nonce, expires_at) VALUES (?, ?, ?)")
      .run(user, nonce, timestamp + maxSkew);
    return result.changes === 1;
  })();

  if (!admitted) {
    throw new ChatError("NONCE_REUSED", "Nonce has already been used");
  }
}

/** Drop nonce records whose window has passed */
export function pruneExpiredNonces(now: number): number {
  return getDb().prepare("DELETE FROM used_nonces WHERE expires_at < ?").run(now).changes;
}

export function countNonces(): number {
  const row = getDb().prepare("SELECT COUNT(*) as c FROM used_nonces").get() as { c: number };
  return row.c;
}

/** Start periodic nonce garbage collection */
export function startNonceSweep(clock: Clock, intervalMs: number): NodeJS.Timeout {
  return setInterval(() => {
    const pruned = pruneExpiredNonces(clock());
    if (pruned > 0) {
      console.log(`[replay] Pruned ${pruned} expired nonces`);
    }
  }, intervalMs);
}
