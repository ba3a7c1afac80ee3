import { EventEmitter } from "events";
import type { RunEvent } from "./types.js";

/**
 * Broadcasts run outcomes to whoever is listening right now. Unlike pending
 * questions, outcomes are not replayed to late listeners.
 */
export class RunEventBus {
  private emitter = new EventEmitter();
  private closed = false;

  constructor() {
    // One listener per open event stream.
    this.emitter.setMaxListeners(0);
  }

  emit(event: RunEvent): void {
    if (this.closed) return;
    this.emitter.emit("event", event);
  }

  /** Returns the unsubscribe function. */
  subscribe(listener: (event: RunEvent) => void): () => void {
    this.emitter.on("event", listener);
    return () => {
      this.emitter.off("event", listener);
    };
  }

  get listenerCount(): number {
    return this.emitter.listenerCount("event");
  }

  close(): void {
    this.closed = true;
    this.emitter.removeAllListeners();
  }
}
