import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { createLogger, errorMessage, shortId } from "../logger.js";
import type { PendingRequestView } from "../types.js";

const logger = createLogger("channel");

/**
 * One observer's view of the channel: a FIFO of projections it has not
 * consumed yet, plus the ids of open requests it has been handed so nothing
 * arrives twice. Both forget a request once it is withdrawn.
 */
export class Subscription implements AsyncIterable<PendingRequestView> {
  readonly id = `obs_${uuidv4()}`;

  private seen = new Set<string>();
  private queue: PendingRequestView[] = [];
  private emitter = new EventEmitter();
  private _closed = false;

  constructor(private readonly onClose: (sub: Subscription) => void) {
    // One "offer" and one "close" listener per pending next().
    this.emitter.setMaxListeners(0);
  }

  get closed(): boolean {
    return this._closed;
  }

  /** How many request ids this observer is still tracking. */
  get tracked(): number {
    return this.seen.size;
  }

  /** Queue `view` unless this observer already got it. Returns whether it was queued. */
  offer(view: PendingRequestView): boolean {
    if (this._closed || this.seen.has(view.id)) return false;

    this.seen.add(view.id);
    this.queue.push(view);
    this.emitter.emit("offer");
    return true;
  }

  /** Forget `id`: drop its queued projection and its delivery record. */
  withdraw(id: string): void {
    this.seen.delete(id);
    if (this.queue.some((view) => view.id === id)) {
      this.queue = this.queue.filter((view) => view.id !== id);
    }
  }

  /** Pull mode: everything queued so far, without waiting. */
  poll(): PendingRequestView[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  /**
   * Wait for the next projection. Resolves null once the subscription is
   * closed or `signal` aborts.
   */
  async next(signal?: AbortSignal): Promise<PendingRequestView | null> {
    while (true) {
      const head = this.queue.shift();
      if (head) return head;
      if (this._closed || signal?.aborted) return null;

      await new Promise<void>((resolve) => {
        const wake = () => {
          this.emitter.off("offer", wake);
          this.emitter.off("close", wake);
          signal?.removeEventListener("abort", wake);
          resolve();
        };
        this.emitter.on("offer", wake);
        this.emitter.on("close", wake);
        signal?.addEventListener("abort", wake);
      });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<PendingRequestView> {
    try {
      while (true) {
        const view = await this.next();
        if (!view) return;
        yield view;
      }
    } finally {
      this.close();
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.emitter.emit("close");
    this.onClose(this);
  }
}

/**
 * Fans newly created requests out to every live subscription. Transports
 * decide how to surface them; the channel only tracks who got what.
 */
export class NotificationChannel {
  private subscriptions = new Set<Subscription>();
  private _closed = false;

  get observerCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Register an observer. `backlog` is handed over first, so requests opened
   * before anyone was listening are not lost.
   */
  subscribe(backlog: readonly PendingRequestView[] = []): Subscription {
    const sub = new Subscription((s) => this.subscriptions.delete(s));
    if (this._closed) {
      sub.close();
      return sub;
    }

    for (const view of backlog) sub.offer(view);
    this.subscriptions.add(sub);
    logger.debug(`Observer ${shortId(sub.id)} joined with ${backlog.length} queued`);
    return sub;
  }

  /** Returns how many observers received `view`. */
  publish(view: PendingRequestView): number {
    let delivered = 0;
    for (const sub of [...this.subscriptions]) {
      try {
        if (sub.offer(view)) delivered++;
      } catch (err) {
        logger.warn(`Dropping observer ${sub.id}: ${errorMessage(err)}`);
        sub.close();
      }
    }
    return delivered;
  }

  /** The request closed; no observer should be handed it from now on. */
  withdraw(id: string): void {
    for (const sub of this.subscriptions) sub.withdraw(id);
  }

  close(): void {
    this._closed = true;
    for (const sub of [...this.subscriptions]) sub.close();
  }
}
