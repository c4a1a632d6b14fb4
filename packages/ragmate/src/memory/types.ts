import type { Message } from "../core/messages.js";

/**
 * How much history a memory window keeps.
 *
 * - `unbounded`: nothing is ever evicted
 * - `entries`: keep the newest `maxEntries` messages
 * - `tokens`: keep the newest messages whose estimated size fits in `maxTokens`
 */
export type RetentionPolicy =
  | { kind: "unbounded" }
  | { kind: "entries"; maxEntries: number }
  | { kind: "tokens"; maxTokens: number };

/**
 * Append-only conversation memory owned by a single agent.
 *
 * `recent()` is the only read path, so callers never depend on the full history.
 * Implementations are not synchronized; one turn at a time per agent.
 */
export interface MemoryWindow {
  /** Number of messages currently retained. */
  readonly size: number;

  /** Appends messages in order, then applies the retention policy. */
  append(...messages: Message[]): void;

  /**
   * Returns up to `n` of the newest messages, oldest first.
   * Always a fresh array; the window itself is not touched.
   */
  recent(n: number): Message[];
}
