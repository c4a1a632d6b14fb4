/**
 * Fluent builder for creating agents.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withName("Curie")
 *   .withSystem("You answer questions about the lab's papers.")
 *   .withBackend(createBackend())
 *   .withMemoryWindowSize(4)
 *   .build();
 *
 * const reply = await agent.respond(createMessage("alice", "What is RAG?"));
 * ```
 */

import type { GenerationBackend } from "../backends/types.js";
import { ConfigurationMissingError } from "../core/errors.js";
import type { Message } from "../core/messages.js";
import type { ILogObj, Logger } from "../logging/logger.js";
import type { MemoryWindow } from "../memory/types.js";
import { RagAgent } from "./agent.js";
import type { AgentObservers } from "./observers.js";

export const DEFAULT_AGENT_NAME = "Assistant";
export const DEFAULT_SYSTEM_PROMPT = "You are a helpful research assistant.";

export class AgentBuilder {
  private name = DEFAULT_AGENT_NAME;
  private systemPrompt = DEFAULT_SYSTEM_PROMPT;
  private description?: string;
  private modelConfigName?: string;
  private backend?: GenerationBackend;
  private memory?: MemoryWindow | null;
  private memoryWindowSize?: number;
  private observers?: AgentObservers;
  private logger?: Logger<ILogObj>;
  private history: Message[] = [];

  /**
   * Set the name the agent speaks under.
   *
   * @returns This builder for chaining
   */
  withName(name: string): this {
    this.name = name;
    return this;
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  /**
   * Set the system prompt placed first in every turn.
   *
   * @returns This builder for chaining
   */
  withSystem(prompt: string): this {
    this.systemPrompt = prompt;
    return this;
  }

  /**
   * Label the model configuration behind the backend. Reported in `agent.state`.
   */
  withModelConfig(name: string): this {
    this.modelConfigName = name;
    return this;
  }

  /**
   * Set the generation backend. Required.
   *
   * @returns This builder for chaining
   */
  withBackend(backend: GenerationBackend): this {
    this.backend = backend;
    return this;
  }

  /**
   * Use a specific memory window, or `null` for none.
   * Without this call the agent keeps every entry.
   */
  withMemory(memory: MemoryWindow | null): this {
    this.memory = memory;
    return this;
  }

  /**
   * Number of remembered messages rendered into each prompt.
   *
   * @example
   * ```typescript
   * .withMemoryWindowSize(0)  // remember, but never replay
   * ```
   */
  withMemoryWindowSize(size: number): this {
    this.memoryWindowSize = size;
    return this;
  }

  withObservers(observers: AgentObservers): this {
    this.observers = { ...this.observers, ...observers };
    return this;
  }

  withLogger(logger: Logger<ILogObj>): this {
    this.logger = logger;
    return this;
  }

  /**
   * Seed memory with earlier messages. Ignored when memory is disabled.
   *
   * @example
   * ```typescript
   * .withHistory([
   *   createMessage("alice", "Which paper introduced RAG?"),
   *   createMessage("Curie", "Lewis et al., 2020.", "assistant"),
   * ])
   * ```
   */
  withHistory(messages: readonly Message[]): this {
    this.history.push(...messages);
    return this;
  }

  /**
   * Clear any previously seeded history.
   */
  clearHistory(): this {
    this.history = [];
    return this;
  }

  /**
   * @throws ConfigurationMissingError when no backend was set
   */
  build(): RagAgent {
    if (!this.backend) {
      throw new ConfigurationMissingError("A generation backend");
    }

    const agent = new RagAgent({
      name: this.name,
      systemPrompt: this.systemPrompt,
      description: this.description,
      modelConfigName: this.modelConfigName,
      backend: this.backend,
      memory: this.memory,
      memoryWindowSize: this.memoryWindowSize,
      observers: this.observers,
      logger: this.logger,
    });
    agent.remember(...this.history);
    return agent;
  }
}
