import type { ResponseBroker } from "../broker/index.js";
import type { InputProvider } from "./types.js";

export interface BrokerInputProviderOptions {
  timeoutMs?: number;
}

/**
 * Routes questions through a shared broker so any connected transport can
 * answer them. Tracks the requests it opened so a caller that abandons its
 * work (a superseded run, for instance) can withdraw them.
 */
export class BrokerInputProvider implements InputProvider {
  private outstanding = new Set<string>();

  constructor(
    private readonly broker: ResponseBroker,
    private readonly options: BrokerInputProviderOptions = {}
  ) {}

  get outstandingCount(): number {
    return this.outstanding.size;
  }

  async getInput(question: string, metadata: Record<string, unknown> = {}): Promise<string> {
    const handle = this.broker.ask(question, metadata, { timeoutMs: this.options.timeoutMs });
    this.outstanding.add(handle.id);

    try {
      return await handle.response();
    } finally {
      this.outstanding.delete(handle.id);
    }
  }

  /** Cancel every question this provider still waits on. Returns how many were open. */
  cancelOutstanding(reason: string): number {
    let cancelled = 0;
    for (const id of [...this.outstanding]) {
      if (this.broker.cancel(id, reason).ok) cancelled++;
    }
    return cancelled;
  }
}
