/**
 * Capability a reasoning loop needs to ask a person something: hand over a
 * question, eventually get the answer back.
 */
export interface InputProvider {
  getInput(question: string, metadata?: Record<string, unknown>): Promise<string>;
}

/** The slice of `readline/promises` the console transport uses. */
export interface Prompter {
  question(prompt: string, options: { signal?: AbortSignal }): Promise<string>;
}
