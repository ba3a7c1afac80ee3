import { v4 as uuidv4 } from "uuid";
import { BrokerInputProvider } from "./providers/broker.js";
import { RunEventBus } from "./run-events.js";
import { isCancelled } from "./errors.js";
import { createLogger, errorMessage } from "./logger.js";
import type { ResponseBroker } from "./broker/index.js";
import type { OrderAgentFn } from "./agent/order-agent.js";

const logger = createLogger("runs");

export const SUPERSEDED_REASON = "superseded";

export interface ManagedRun {
  runId: string;
  request: string;
  abortController: AbortController;
  provider: BrokerInputProvider;
  done: Promise<void>;
}

export interface RunManagerOptions {
  timeoutMs?: number;
}

/**
 * Runs the ordering agent in the background, one run at a time. Starting a
 * run aborts the previous one and withdraws the questions it left open.
 */
export class RunManager {
  readonly events = new RunEventBus();
  private activeRuns = new Map<string, ManagedRun>();

  constructor(
    private readonly broker: ResponseBroker,
    private readonly agent: OrderAgentFn,
    private readonly options: RunManagerOptions = {}
  ) {}

  getActiveRunId(): string | null {
    for (const [runId, managed] of this.activeRuns) {
      if (!managed.abortController.signal.aborted) return runId;
    }
    return null;
  }

  getManaged(runId: string): ManagedRun | undefined {
    return this.activeRuns.get(runId);
  }

  start(request: string): ManagedRun {
    this.cancelAll(SUPERSEDED_REASON);

    const runId = `run_${uuidv4()}`;
    const abortController = new AbortController();
    const provider = new BrokerInputProvider(this.broker, { timeoutMs: this.options.timeoutMs });

    const managed: ManagedRun = {
      runId,
      request,
      abortController,
      provider,
      done: Promise.resolve(),
    };
    this.activeRuns.set(runId, managed);
    logger.debug(`Started ${runId}`);

    managed.done = this.execute(managed);
    return managed;
  }

  /** Abort every active run. Returns how many were aborted. */
  cancelAll(reason: string): number {
    let cancelled = 0;
    for (const managed of [...this.activeRuns.values()]) {
      if (this.cancel(managed.runId, reason)) cancelled++;
    }
    return cancelled;
  }

  cancel(runId: string, reason: string): boolean {
    const managed = this.activeRuns.get(runId);
    if (!managed) return false;

    logger.debug(`Cancelling ${runId}: ${reason}`);
    managed.abortController.abort();
    managed.provider.cancelOutstanding(reason);
    this.activeRuns.delete(runId);
    return true;
  }

  private async execute(managed: ManagedRun): Promise<void> {
    const { runId, request, abortController, provider } = managed;

    try {
      const order = await this.agent({ request, provider, signal: abortController.signal });
      if (abortController.signal.aborted) return;

      logger.debug(`${runId} complete with ${order.length} pizza(s)`);
      this.events.emit({ type: "task_result", runId, status: "complete", order });
    } catch (err) {
      if (abortController.signal.aborted) {
        logger.debug(`${runId} ended after abort`);
        return;
      }

      const message = isCancelled(err) ? `Question cancelled: ${err.reason}` : errorMessage(err);
      logger.warn(`Run ${runId} failed: ${message}`);
      this.events.emit({ type: "task_result", runId, status: "error", error: message });
    } finally {
      if (this.activeRuns.get(runId) === managed) this.activeRuns.delete(runId);
    }
  }
}
