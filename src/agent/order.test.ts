import { describe, expect, it } from "vitest";
import { formatOrder, parseOrder } from "./order.js";

describe("parseOrder", () => {
  it("reads a fenced JSON array", () => {
    const text = [
      "Here is the order:",
      "```json",
      '[{"size": "large", "toppings": ["pepperoni", "olives"], "special_instructions": null}]',
      "```",
    ].join("\n");

    expect(parseOrder(text)).toEqual([
      { size: "large", toppings: ["pepperoni", "olives"], special_instructions: null },
    ]);
  });

  it("reads an inline array surrounded by prose", () => {
    const text = 'Done: [{"size": "small", "toppings": []}] Enjoy!';

    expect(parseOrder(text)).toEqual([{ size: "small", toppings: [] }]);
  });

  it("accepts a pizzas wrapper object", () => {
    const text = '{"pizzas": [{"size": "medium", "toppings": ["ham"], "special_instructions": "well done"}]}';

    expect(parseOrder(text)).toEqual([
      { size: "medium", toppings: ["ham"], special_instructions: "well done" },
    ]);
  });

  it("rejects replies without an order", () => {
    expect(() => parseOrder("Sorry, I could not take that order.")).toThrow(
      "Agent reply contained no order"
    );
    expect(() => parseOrder("[not json]")).toThrow("Agent reply contained malformed order JSON");
    expect(() => parseOrder('[{"size": 12}]')).toThrow(/did not match the order shape/);
  });
});

describe("formatOrder", () => {
  it("numbers pizzas and adds instructions on their own line", () => {
    expect(
      formatOrder([
        { size: "large", toppings: ["pepperoni", "mushrooms"] },
        { size: "small", toppings: [], special_instructions: "cut in squares" },
      ])
    ).toEqual([
      "1. large pizza with pepperoni, mushrooms",
      "2. small pizza with no toppings",
      "   Special instructions: cut in squares",
    ]);
  });
});
