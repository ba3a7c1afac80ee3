import { CancelledError, TIMEOUT_REASON } from "../errors.js";

export type Outcome =
  | { kind: "answered"; answer: string }
  | { kind: "cancelled"; reason: string };

/**
 * One-shot wake-up slot for a single asker.
 *
 * `outcome` never rejects: a cancellation only becomes an error once the asker
 * unwraps it, so a request drained before anyone awaited it cannot surface as
 * an unhandled rejection. Promise continuations are queued as microtasks, so
 * the asker never runs inside the resolver's call stack.
 */
export class Suspension {
  readonly outcome: Promise<Outcome>;
  private settleFn: ((outcome: Outcome) => void) | null = null;

  constructor() {
    this.outcome = new Promise<Outcome>((resolve) => {
      this.settleFn = resolve;
    });
  }

  get settled(): boolean {
    return this.settleFn === null;
  }

  /** Returns false if the slot was already settled. */
  settle(outcome: Outcome): boolean {
    const fn = this.settleFn;
    if (!fn) return false;
    this.settleFn = null;
    fn(outcome);
    return true;
  }
}

export function unwrapOutcome(requestId: string, outcome: Outcome): string {
  if (outcome.kind === "answered") return outcome.answer;
  throw new CancelledError(requestId, outcome.reason);
}

/** Anything that can cancel a request by id. */
export interface Canceller {
  cancel(id: string, reason: string): unknown;
}

export interface Awaitable {
  id: string;
  response(): Promise<string>;
}

/**
 * Bound a wait on `handle` to `timeoutMs`. On expiry the request is cancelled
 * through the broker, so whichever of answer or timeout lands first wins and
 * the other becomes a no-op.
 */
export async function awaitWithTimeout(
  broker: Canceller,
  handle: Awaitable,
  timeoutMs: number
): Promise<string> {
  const timer = setTimeout(() => {
    broker.cancel(handle.id, TIMEOUT_REASON);
  }, timeoutMs);

  try {
    return await handle.response();
  } finally {
    clearTimeout(timer);
  }
}
