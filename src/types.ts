export type RequestState = "open" | "resolved" | "cancelled";

export type RequestMetadata = Readonly<Record<string, unknown>>;

/** What observers and transports get to see of a request. Never the answer. */
export interface PendingRequestView {
  id: string;
  question: string;
  metadata: RequestMetadata;
}

export interface AskOptions {
  /** Cancel the request with reason "timeout" if unanswered after this long. */
  timeoutMs?: number;
}

export type RunEvent =
  | { type: "task_result"; runId: string; status: "complete"; order: unknown }
  | { type: "task_result"; runId: string; status: "error"; error: string };

/** Record written to the live event stream for each pending question. */
export interface HumanInputEvent extends PendingRequestView {
  type: "human_input";
}

export type StreamEvent = HumanInputEvent | RunEvent;
