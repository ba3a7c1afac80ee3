import { z } from "zod/v4";
import { createSdkMcpServer, tool } from "@anthropic-ai/claude-agent-sdk";
import { isCancelled } from "../errors.js";
import type { InputProvider } from "../providers/types.js";

export const HUMAN_INPUT_SERVER = "human-input";
export const ASK_HUMAN_TOOL = `mcp__${HUMAN_INPUT_SERVER}__ask_human`;

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(text: string) {
  return { content: [{ type: "text" as const, text }], isError: true };
}

/**
 * Ask the person behind `provider` and turn the outcome into a tool result.
 * A withdrawn question becomes an error result the model can react to.
 */
export async function askHuman(provider: InputProvider, question: string) {
  try {
    const answer = await provider.getInput(question);
    return textResult(answer);
  } catch (err) {
    if (isCancelled(err)) {
      return errorResult(`The person did not answer (${err.reason}).`);
    }
    throw err;
  }
}

export function createHumanInputMcpServer(provider: InputProvider) {
  const askHumanTool = tool(
    "ask_human",
    `Ask a human for clarification, additional information, or approval.

Use this whenever the request is ambiguous or a choice should be the customer's.
Ask one short question at a time and wait for the answer before continuing.`,
    {
      question: z.string().min(1).describe("The question to show the human"),
    },
    async (args) => askHuman(provider, args.question)
  );

  return createSdkMcpServer({
    name: HUMAN_INPUT_SERVER,
    version: "1.0.0",
    tools: [askHumanTool],
  });
}
