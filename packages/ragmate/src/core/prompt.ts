import type { Message } from "./messages.js";

export const SYSTEM_SPEAKER = "System";
export const USER_SPEAKER = "User";
export const CONTEXT_SPEAKER = "Context";

/**
 * Instruction used by `summarize()` when there is no prior history to frame it.
 */
export const SUMMARIZE_INSTRUCTION =
  "Summarize the following content in a concise manner, capturing the key points of the content and any important decisions or actions discussed.";

/**
 * Instruction used by `summarize()` when history is supplied, telling the backend
 * not to repeat what the history already covers.
 */
export const SUMMARIZE_WITH_HISTORY_INSTRUCTION =
  "Based on the context above, summarize the following content in a concise manner, capturing the key points of the content and any important decisions or actions discussed. Do not summarize repeated content which is already existed in the context above!";

/**
 * One line of an assembled prompt.
 */
export interface PromptEntry {
  speaker: string;
  text: string;
}

/**
 * Accumulates the lines of a single prompt in the order they are added.
 * Built fresh for every turn and discarded once serialized.
 *
 * @example
 * ```typescript
 * const prompt = new PromptBuilder()
 *   .addSystem("You are a research assistant.")
 *   .addMemory(memory.recent(2))
 *   .addQuery("What is RAG?")
 *   .serialize();
 * ```
 */
export class PromptBuilder {
  private readonly entries: PromptEntry[] = [];

  addSystem(text: string): this {
    this.entries.push({ speaker: SYSTEM_SPEAKER, text });
    return this;
  }

  /** Adds one `"{sender}: {content}"` line per message. */
  addMemory(messages: readonly Message[]): this {
    for (const message of messages) {
      this.entries.push({ speaker: message.sender, text: message.content });
    }
    return this;
  }

  /** Adds a retrieved-context block. Empty text adds nothing. */
  addContext(text: string | undefined): this {
    if (text) {
      this.entries.push({ speaker: CONTEXT_SPEAKER, text });
    }
    return this;
  }

  /** Adds the labeled user query. Empty text adds nothing. */
  addQuery(text: string): this {
    if (text) {
      this.entries.push({ speaker: USER_SPEAKER, text });
    }
    return this;
  }

  build(): PromptEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  serialize(): string {
    return this.entries.map((entry) => `${entry.speaker}: ${entry.text}`).join("\n");
  }
}

/**
 * Joins the contents of the given messages into a single query string.
 */
export function toQueryText(messages: readonly Message[]): string {
  return messages.map((message) => message.content).join("\n");
}
