/** Reason recorded when a request outlives its `timeoutMs`. */
export const TIMEOUT_REASON = "timeout";

/** Reason recorded when the broker drains on shutdown. */
export const SHUTDOWN_REASON = "shutdown";

/** Rejected at `ask` time, before any request exists. */
export class InvalidRequestError extends Error {
  override readonly name = "InvalidRequestError";
}

/** `ask` was called after the broker shut down. */
export class BrokerClosedError extends Error {
  override readonly name = "BrokerClosedError";

  constructor() {
    super("Broker is shut down and accepts no new requests");
  }
}

/**
 * Terminal outcome of a request that was abandoned instead of answered.
 * Askers must branch on this rather than treat it as an answer.
 */
export class CancelledError extends Error {
  override readonly name = "CancelledError";

  constructor(
    readonly requestId: string,
    readonly reason: string
  ) {
    super(`Request ${requestId} was cancelled: ${reason}`);
  }
}

export function isCancelled(err: unknown): err is CancelledError {
  return err instanceof CancelledError;
}

/**
 * Result of `resolve`/`cancel`. The failure case stands for an id that is
 * unknown or no longer open; it is reported, never thrown.
 */
export type ResolveResult =
  | { ok: true }
  | { ok: false; error: "unknown_or_closed" };

export const RESOLVED: ResolveResult = { ok: true };
export const UNKNOWN_OR_CLOSED: ResolveResult = { ok: false, error: "unknown_or_closed" };
