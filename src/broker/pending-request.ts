import { Suspension } from "./suspension.js";
import type { PendingRequestView, RequestMetadata, RequestState } from "../types.js";

/**
 * One outstanding question and its answer slot. Only the broker mutates it;
 * every transition goes through `resolve`/`cancel` and happens at most once.
 */
export class PendingRequest {
  readonly metadata: RequestMetadata;
  readonly createdAt = new Date();
  readonly suspension = new Suspension();

  /** Set once the projection reached at least one observer. Does not affect state. */
  delivered = false;

  private _state: RequestState = "open";
  private _answer: string | undefined;
  private _cancelReason: string | undefined;
  private _settledAt: Date | undefined;

  constructor(
    readonly id: string,
    readonly question: string,
    metadata: Record<string, unknown> = {}
  ) {
    this.metadata = Object.freeze({ ...metadata });
  }

  get state(): RequestState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === "open";
  }

  get answer(): string | undefined {
    return this._answer;
  }

  get cancelReason(): string | undefined {
    return this._cancelReason;
  }

  get settledAt(): Date | undefined {
    return this._settledAt;
  }

  resolve(answer: string): boolean {
    if (!this.isOpen) return false;
    this._state = "resolved";
    this._answer = answer;
    this._settledAt = new Date();
    this.suspension.settle({ kind: "answered", answer });
    return true;
  }

  cancel(reason: string): boolean {
    if (!this.isOpen) return false;
    this._state = "cancelled";
    this._cancelReason = reason;
    this._settledAt = new Date();
    this.suspension.settle({ kind: "cancelled", reason });
    return true;
  }

  view(): PendingRequestView {
    return { id: this.id, question: this.question, metadata: this.metadata };
  }
}
