import { z } from "zod/v4";

export const pizzaSchema = z.object({
  size: z.string().min(1),
  toppings: z.array(z.string()),
  special_instructions: z.string().nullable().optional(),
});

export const pizzaOrderSchema = z.array(pizzaSchema);

export type Pizza = z.infer<typeof pizzaSchema>;
export type PizzaOrder = z.infer<typeof pizzaOrderSchema>;

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function extractJson(text: string): string | null {
  const fenced = FENCE.exec(text);
  if (fenced) return fenced[1].trim();

  const start = text.search(/[[{]/);
  if (start === -1) return null;
  const end = Math.max(text.lastIndexOf("]"), text.lastIndexOf("}"));
  if (end <= start) return null;
  return text.slice(start, end + 1);
}

/**
 * Pull the order out of the agent's final message. Accepts a bare array or
 * `{ "pizzas": [...] }`, fenced or inline.
 */
export function parseOrder(text: string): PizzaOrder {
  const json = extractJson(text);
  if (!json) throw new Error("Agent reply contained no order");

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new Error("Agent reply contained malformed order JSON");
  }

  const candidate =
    typeof data === "object" && data !== null && !Array.isArray(data) && "pizzas" in data
      ? data.pizzas
      : data;

  const parsed = pizzaOrderSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Agent reply did not match the order shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function formatOrder(order: PizzaOrder): string[] {
  const lines: string[] = [];
  order.forEach((pizza, i) => {
    const toppings = pizza.toppings.length ? pizza.toppings.join(", ") : "no toppings";
    lines.push(`${i + 1}. ${pizza.size} pizza with ${toppings}`);
    if (pizza.special_instructions) {
      lines.push(`   Special instructions: ${pizza.special_instructions}`);
    }
  });
  return lines;
}
