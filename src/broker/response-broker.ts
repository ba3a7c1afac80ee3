import { v4 as uuidv4 } from "uuid";
import {
  BrokerClosedError,
  InvalidRequestError,
  RESOLVED,
  SHUTDOWN_REASON,
  UNKNOWN_OR_CLOSED,
  type ResolveResult,
} from "../errors.js";
import { createLogger, shortId } from "../logger.js";
import { NotificationChannel, type Subscription } from "./notification-channel.js";
import { PendingRequest } from "./pending-request.js";
import { awaitWithTimeout, unwrapOutcome } from "./suspension.js";
import type { AskOptions, PendingRequestView } from "../types.js";

const logger = createLogger("broker");

export interface PendingRequestHandle {
  readonly id: string;
  readonly question: string;
  /**
   * Suspend until the request is answered or cancelled. Every call returns the
   * same promise; it rejects with `CancelledError` on cancellation.
   */
  response(): Promise<string>;
}

/**
 * Owns the table of pending requests. Every mutation is a single synchronous
 * method call, so on one event loop each read-modify-write is atomic and a
 * second resolver always finds the request already settled.
 */
export class ResponseBroker {
  private requests = new Map<string, PendingRequest>();
  private channel = new NotificationChannel();
  private closed = false;

  get size(): number {
    return this.requests.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get observerCount(): number {
    return this.channel.observerCount;
  }

  ask(
    question: string,
    metadata: Record<string, unknown> = {},
    options: AskOptions = {}
  ): PendingRequestHandle {
    if (typeof question !== "string" || question.trim() === "") {
      throw new InvalidRequestError("Question must be a non-empty string");
    }
    if (this.closed) throw new BrokerClosedError();

    const request = new PendingRequest(`req_${uuidv4()}`, question, metadata);
    this.requests.set(request.id, request);
    logger.debug(`Opened ${shortId(request.id)}`);

    const observers = this.channel.publish(request.view());
    if (observers > 0) request.delivered = true;

    const id = request.id;
    let waiting: Promise<string> | null = null;
    const consume = () => this.consume(request);

    const handle: PendingRequestHandle = {
      id,
      question,
      response: () => {
        if (!waiting) {
          waiting =
            options.timeoutMs !== undefined
              ? awaitWithTimeout(this, { id, response: consume }, options.timeoutMs)
              : consume();
        }
        return waiting;
      },
    };
    return handle;
  }

  resolve(id: string, answer: string): ResolveResult {
    const request = this.requests.get(id);
    if (!request || !request.resolve(answer)) {
      logger.warn(`Ignoring answer for unknown or closed request ${id}`);
      return UNKNOWN_OR_CLOSED;
    }
    this.channel.withdraw(id);
    logger.debug(`Resolved ${shortId(id)}`);
    return RESOLVED;
  }

  cancel(id: string, reason: string): ResolveResult {
    const request = this.requests.get(id);
    if (!request || !request.cancel(reason)) {
      logger.debug(`Cancel of ${shortId(id)} ignored: unknown or closed`);
      return UNKNOWN_OR_CLOSED;
    }
    this.channel.withdraw(id);
    logger.debug(`Cancelled ${shortId(id)}: ${reason}`);
    return RESOLVED;
  }

  /** Every open request, oldest first. */
  listOpen(): PendingRequestView[] {
    const open: PendingRequestView[] = [];
    for (const request of this.requests.values()) {
      if (request.isOpen) open.push(request.view());
    }
    return open;
  }

  /**
   * Start observing. The subscription is seeded with every request that is
   * open right now, then receives each new one once.
   */
  subscribe(): Subscription {
    const backlog: PendingRequestView[] = [];
    for (const request of this.requests.values()) {
      if (!request.isOpen) continue;
      backlog.push(request.view());
      request.delivered = true;
    }
    return this.channel.subscribe(this.closed ? [] : backlog);
  }

  get(id: string): PendingRequest | undefined {
    return this.requests.get(id);
  }

  /** Cancel every open request. Returns how many were cancelled. */
  drain(reason: string = SHUTDOWN_REASON): number {
    let cancelled = 0;
    for (const request of this.requests.values()) {
      if (!request.cancel(reason)) continue;
      this.channel.withdraw(request.id);
      cancelled++;
    }
    if (cancelled > 0) logger.warn(`Cancelled ${cancelled} open request(s): ${reason}`);
    return cancelled;
  }

  shutdown(reason: string = SHUTDOWN_REASON): number {
    this.closed = true;
    const cancelled = this.drain(reason);
    this.channel.close();
    return cancelled;
  }

  /**
   * Forget settled requests nobody consumed within `retentionMs` of settling.
   * Returns how many were removed.
   */
  sweep(retentionMs: number, now: number = Date.now()): number {
    let removed = 0;
    for (const [id, request] of this.requests) {
      const settledAt = request.settledAt;
      if (settledAt && now - settledAt.getTime() >= retentionMs) {
        this.requests.delete(id);
        removed++;
      }
    }
    if (removed > 0) logger.debug(`Swept ${removed} settled request(s)`);
    return removed;
  }

  /**
   * Wait on the request captured at `ask` time, so a sweep that already
   * dropped the entry cannot lose its outcome. The table only drives removal.
   */
  private async consume(request: PendingRequest): Promise<string> {
    try {
      const outcome = await request.suspension.outcome;
      return unwrapOutcome(request.id, outcome);
    } finally {
      if (this.requests.get(request.id) === request) this.requests.delete(request.id);
    }
  }
}
