import { query } from "@anthropic-ai/claude-agent-sdk";
import { ASK_HUMAN_TOOL, HUMAN_INPUT_SERVER, createHumanInputMcpServer } from "./ask-human.js";
import { parseOrder, type PizzaOrder } from "./order.js";
import { createLogger } from "../logger.js";
import type { BrokerServerConfig } from "../config.js";
import type { InputProvider } from "../providers/types.js";

const logger = createLogger("agent");

export interface OrderAgentInput {
  request: string;
  provider: InputProvider;
  signal: AbortSignal;
}

/** A reasoning loop that turns a customer request into an order. */
export type OrderAgentFn = (input: OrderAgentInput) => Promise<PizzaOrder>;

export const ORDER_SYSTEM_PROMPT = `You take pizza orders.

Work out exactly what the customer wants: how many pizzas, the size of each, the toppings and any special instructions.
Whenever something is missing or ambiguous, call the ask_human tool with one short question and wait for the answer. Never guess a size or topping the customer did not give you.

When the order is complete, reply with only a JSON array, one object per pizza:
[{"size": "large", "toppings": ["pepperoni"], "special_instructions": null}]`;

export function createOrderAgent(
  config: Pick<BrokerServerConfig, "model" | "maxTurns">
): OrderAgentFn {
  return async ({ request, provider, signal }) => {
    const abortController = new AbortController();
    const onAbort = () => abortController.abort();
    if (signal.aborted) abortController.abort();
    signal.addEventListener("abort", onAbort);

    try {
      const stream = query({
        prompt: request,
        options: {
          systemPrompt: ORDER_SYSTEM_PROMPT,
          model: config.model,
          maxTurns: config.maxTurns,
          abortController,
          mcpServers: { [HUMAN_INPUT_SERVER]: createHumanInputMcpServer(provider) },
          allowedTools: [ASK_HUMAN_TOOL],
          canUseTool: async (toolName, input) => {
            if (toolName === ASK_HUMAN_TOOL) {
              return { behavior: "allow" as const, updatedInput: input };
            }
            return { behavior: "deny" as const, message: "Only ask_human is available." };
          },
        },
      });

      for await (const msg of stream) {
        if (msg.type === "system" && msg.subtype === "init") {
          logger.debug(`Session initialized: ${msg.session_id}`);
        }

        if (msg.type === "result") {
          if (msg.subtype === "success") {
            logger.debug(`Finished after ${msg.num_turns} turn(s)`);
            return parseOrder(msg.result);
          }
          throw new Error(`Agent stopped without an order: ${msg.subtype}`);
        }
      }

      throw new Error("Agent stream ended without a result");
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  };
}
