/**
 * Read-only hooks for watching an agent work.
 *
 * Observers cannot change what the agent does. They run after the fact, and an
 * observer that throws (or rejects) is logged and otherwise ignored.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(backend)
 *   .withObservers({
 *     onSpeak: (message) => transcript.push(message),
 *     onTurnError: (ctx) => metrics.increment("turn_failed"),
 *   })
 *   .build();
 * ```
 *
 * @module agent/observers
 */

import type { BackendKind } from "../backends/types.js";
import type { Message } from "../core/messages.js";
import type { GenerationMode } from "../core/modes.js";
import type { ILogObj, Logger } from "../logging/logger.js";

export type TurnOperation = "respond" | "summarize";

export interface ObserveDispatchContext {
  operation: TurnOperation;
  prompt: string;
  mode: GenerationMode;
  backend: BackendKind;
}

export interface ObserveTurnErrorContext {
  operation: TurnOperation;
  error: unknown;
}

export interface AgentObservers {
  /** Every message the agent produces, in its own voice. */
  onSpeak?: (message: Message) => void | Promise<void>;
  /** Just before the prompt goes to the backend. */
  onDispatch?: (context: ObserveDispatchContext) => void | Promise<void>;
  /** A turn failed; the error is rethrown to the caller afterwards. */
  onTurnError?: (context: ObserveTurnErrorContext) => void | Promise<void>;
}

/**
 * Runs one observer, logging instead of propagating its failure.
 */
export async function notifyObserver<T>(
  observer: ((context: T) => void | Promise<void>) | undefined,
  context: T,
  logger: Logger<ILogObj>,
): Promise<void> {
  if (!observer) {
    return;
  }
  try {
    await observer(context);
  } catch (error) {
    logger.error("Observer threw; continuing", error);
  }
}
