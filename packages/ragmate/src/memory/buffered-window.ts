import { CHARS_PER_TOKEN } from "../core/constants.js";
import type { Message } from "../core/messages.js";
import type { MemoryWindow, RetentionPolicy } from "./types.js";

/**
 * Estimates the token cost of a message from its character count.
 */
export function estimateMessageTokens(message: Message): number {
  return Math.ceil((message.sender.length + message.content.length + 2) / CHARS_PER_TOKEN);
}

/**
 * In-process {@link MemoryWindow} backed by an array.
 *
 * @example
 * ```typescript
 * const memory = new BufferedMemoryWindow({ kind: "entries", maxEntries: 50 });
 * memory.append(question, answer);
 * memory.recent(2); // [question, answer]
 * ```
 */
export class BufferedMemoryWindow implements MemoryWindow {
  private readonly entries: Message[] = [];
  readonly policy: RetentionPolicy;

  constructor(policy: RetentionPolicy = { kind: "unbounded" }) {
    validatePolicy(policy);
    this.policy = policy;
  }

  get size(): number {
    return this.entries.length;
  }

  append(...messages: Message[]): void {
    this.entries.push(...messages);
    this.evict();
  }

  recent(n: number): Message[] {
    const count = Number.isNaN(n) ? 0 : Math.min(Math.floor(n), this.entries.length);
    if (count <= 0) {
      return [];
    }
    return this.entries.slice(-count);
  }

  private evict(): void {
    switch (this.policy.kind) {
      case "unbounded":
        return;
      case "entries": {
        const overflow = this.entries.length - this.policy.maxEntries;
        if (overflow > 0) {
          this.entries.splice(0, overflow);
        }
        return;
      }
      case "tokens": {
        let total = this.entries.reduce((sum, message) => sum + estimateMessageTokens(message), 0);
        // The newest message is kept even when it alone exceeds the budget
        while (total > this.policy.maxTokens && this.entries.length > 1) {
          const dropped = this.entries.shift();
          if (dropped) {
            total -= estimateMessageTokens(dropped);
          }
        }
        return;
      }
    }
  }
}

function validatePolicy(policy: RetentionPolicy): void {
  if (policy.kind === "entries" && (!Number.isInteger(policy.maxEntries) || policy.maxEntries < 1)) {
    throw new RangeError(`maxEntries must be a positive integer, got ${policy.maxEntries}`);
  }
  if (policy.kind === "tokens" && (!Number.isFinite(policy.maxTokens) || policy.maxTokens < 1)) {
    throw new RangeError(`maxTokens must be a positive number, got ${policy.maxTokens}`);
  }
}
