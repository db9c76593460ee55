import type { ChatItem, StreamCloseReason, UserId } from "@blah/protocol";

/**
 * A live feed of one room's new items.
 *
 * Items are pushed synchronously by {@link publish} and pulled by the
 * transport with `for await`. Each subscription buffers at most
 * `queueLimit` undelivered items; past that it is closed as `lagged`
 * instead of skipping, and the client falls back to paging history.
 */
export class Subscription implements AsyncIterableIterator<ChatItem> {
  private queue: ChatItem[] = [];
  private waiting: ((result: IteratorResult<ChatItem>) => void) | undefined;
  private reason: StreamCloseReason | undefined;

  constructor(
    readonly roomId: string,
    /** Who was authorized at subscribe time, if anyone */
    readonly user: UserId | undefined,
    private readonly queueLimit: number,
    private readonly onClose: (sub: Subscription) => void
  ) {}

  get closed(): boolean {
    return this.reason !== undefined;
  }

  get closeReason(): StreamCloseReason | undefined {
    return this.reason;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Returns false if the item was not accepted */
  push(item: ChatItem): boolean {
    if (this.closed) return false;

    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ value: item, done: false });
      return true;
    }

    if (this.queue.length >= this.queueLimit) {
      this.close("lagged");
      return false;
    }
    this.queue.push(item);
    return true;
  }

  next(): Promise<IteratorResult<ChatItem>> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<ChatItem>> {
    this.close("unsubscribed");
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ChatItem> {
    return this;
  }

  /** End the stream. Undelivered items are dropped. */
  close(reason: StreamCloseReason = "unsubscribed"): void {
    if (this.closed) return;
    this.reason = reason;
    this.queue = [];

    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.({ value: undefined, done: true });

    this.onClose(this);
  }
}

const subscribers = new Map<string, Set<Subscription>>();

function removeSubscription(sub: Subscription): void {
  const set = subscribers.get(sub.roomId);
  if (!set) return;
  set.delete(sub);
  if (set.size === 0) {
    subscribers.delete(sub.roomId);
  }
  if (sub.closeReason === "lagged") {
    console.warn(`[fanout] Dropped lagging subscriber on room ${sub.roomId}`);
  }
}

/** Register a live subscriber. Authorization is the caller's job. */
export function subscribe(roomId: string, user: UserId | undefined, queueLimit: number): Subscription {
  const sub = new Subscription(roomId, user, queueLimit, removeSubscription);
  let set = subscribers.get(roomId);
  if (!set) {
    set = new Set();
    subscribers.set(roomId, set);
  }
  set.add(sub);
  return sub;
}

/**
 * Hand a freshly appended item to every subscriber of its room.
 * Never waits on a subscriber. Returns how many accepted it.
 */
export function publish(item: ChatItem): number {
  const set = subscribers.get(item.room);
  if (!set) return 0;

  let delivered = 0;
  // Copy: a lagging subscriber removes itself while we iterate
  for (const sub of Array.from(set)) {
    if (sub.push(item)) delivered++;
  }
  return delivered;
}

export function subscriberCount(roomId: string): number {
  return subscribers.get(roomId)?.size ?? 0;
}

export function closeAllSubscriptions(reason: StreamCloseReason = "shutdown"): void {
  for (const set of Array.from(subscribers.values())) {
    for (const sub of Array.from(set)) {
      sub.close(reason);
    }
  }
}
