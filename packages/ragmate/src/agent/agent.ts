/**
 * Turn orchestration: one input in, one spoken message out.
 *
 * A turn normalizes the input, assembles a prompt from the system instruction,
 * recent memory, optional context and the query, dispatches it to the backend,
 * speaks the answer and finally records the turn in memory.
 */

import type { GenerationBackend } from "../backends/types.js";
import { DEFAULT_MEMORY_WINDOW } from "../core/constants.js";
import {
  createMessage,
  formatMessageLine,
  type Message,
  type MessageInput,
  normalizeMessages,
} from "../core/messages.js";
import { type GenerationMode, selectMode } from "../core/modes.js";
import {
  PromptBuilder,
  SUMMARIZE_INSTRUCTION,
  SUMMARIZE_WITH_HISTORY_INSTRUCTION,
  toQueryText,
} from "../core/prompt.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import { BufferedMemoryWindow } from "../memory/buffered-window.js";
import type { MemoryWindow } from "../memory/types.js";
import { type AgentObservers, notifyObserver, type TurnOperation } from "./observers.js";

export interface RagAgentOptions {
  /** Identity used as the sender of every message the agent speaks. */
  name: string;
  systemPrompt: string;
  backend: GenerationBackend;
  /** Opaque label for the model configuration behind the backend. */
  modelConfigName?: string;
  description?: string;
  /**
   * Conversation memory. Omit for an unbounded window that never evicts;
   * pass a bounded `BufferedMemoryWindow` to cap it, or `null` to run without memory.
   */
  memory?: MemoryWindow | null;
  /** Memory entries rendered into each prompt. @default 2 */
  memoryWindowSize?: number;
  observers?: AgentObservers;
  logger?: Logger<ILogObj>;
}

export interface RespondOptions {
  /** Let the backend retrieve documents (`chat` mode). @default true */
  useRetrieval?: boolean;
  /** Include recent memory in the prompt. @default true */
  useMemory?: boolean;
  /** Remember the generated answer. The input is remembered regardless. @default true */
  commitToMemory?: boolean;
  /** Retrieved reference text placed between memory and the query. */
  context?: string;
}

export interface AgentState {
  name: string;
  systemPrompt: string;
  modelConfigName?: string;
  /** True when the backend can retrieve workspace documents. */
  retrievalEnabled: boolean;
  memoryEnabled: boolean;
}

export class RagAgent {
  readonly name: string;
  readonly description: string;
  private readonly systemPrompt: string;
  private readonly modelConfigName?: string;
  private readonly backend: GenerationBackend;
  private readonly memory: MemoryWindow | null;
  private readonly memoryWindowSize: number;
  private readonly observers: AgentObservers;
  private readonly logger: Logger<ILogObj>;

  constructor(options: RagAgentOptions) {
    this.name = options.name;
    this.description = options.description ?? "";
    this.systemPrompt = options.systemPrompt;
    this.modelConfigName = options.modelConfigName;
    this.backend = options.backend;
    this.memory = options.memory === undefined ? new BufferedMemoryWindow({ kind: "unbounded" }) : options.memory;
    this.memoryWindowSize = options.memoryWindowSize ?? DEFAULT_MEMORY_WINDOW;
    this.observers = options.observers ?? {};
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: options.name });
  }

  get state(): AgentState {
    return {
      name: this.name,
      systemPrompt: this.systemPrompt,
      modelConfigName: this.modelConfigName,
      retrievalEnabled: this.backend.kind === "workspace",
      memoryEnabled: this.memory !== null,
    };
  }

  /**
   * The newest `n` remembered messages, oldest first. Empty without memory.
   */
  recall(n: number = this.memoryWindowSize): Message[] {
    return this.memory?.recent(n) ?? [];
  }

  /**
   * Appends messages to memory outside of a turn. No-op without memory.
   */
  remember(...messages: Message[]): void {
    if (messages.length > 0) {
      this.memory?.append(...messages);
    }
  }

  /**
   * Runs one turn and returns the spoken answer.
   *
   * With no input the prompt carries only the system line and memory, which is
   * a valid request. A failed dispatch leaves memory untouched and the agent usable.
   *
   * @throws TypeMismatchError when `input` is not a message or list of messages
   * @throws BackendUnavailableError (or the backend's own error) when generation fails
   */
  async respond(input?: MessageInput, options: RespondOptions = {}): Promise<Message> {
    const { useRetrieval = true, useMemory = true, commitToMemory = true, context } = options;
    const inputMessages = normalizeMessages(input);

    const prompt = new PromptBuilder()
      .addSystem(this.systemPrompt)
      .addMemory(useMemory ? this.recall() : [])
      .addContext(context)
      .addQuery(toQueryText(inputMessages))
      .serialize();

    const text = await this.dispatch("respond", prompt, selectMode(useRetrieval));
    const reply = createMessage(this.name, text, "assistant");
    await this.speak(reply);

    if (this.memory) {
      this.memory.append(...inputMessages);
      if (commitToMemory) {
        this.memory.append(reply);
      }
    }

    return reply;
  }

  /**
   * Condenses `content`, framed by `history` when given. Always generates without
   * retrieval and never touches memory.
   */
  async summarize(history?: MessageInput, content?: MessageInput): Promise<Message> {
    const historyMessages = normalizeMessages(history);
    const contentMessages = normalizeMessages(content);

    const builder = new PromptBuilder();
    if (history !== undefined && history !== null) {
      builder.addMemory(historyMessages).addSystem(SUMMARIZE_WITH_HISTORY_INSTRUCTION);
    } else {
      builder.addSystem(SUMMARIZE_INSTRUCTION);
    }
    builder.addMemory(contentMessages);

    const text = await this.dispatch("summarize", builder.serialize(), "query");
    const summary = createMessage(this.name, text, "assistant");
    await this.speak(summary);
    return summary;
  }

  private async dispatch(operation: TurnOperation, prompt: string, mode: GenerationMode): Promise<string> {
    this.logger.debug(`Dispatching ${operation}`, {
      mode,
      backend: this.backend.kind,
      promptLength: prompt.length,
    });
    await notifyObserver(
      this.observers.onDispatch,
      { operation, prompt, mode, backend: this.backend.kind },
      this.logger,
    );

    try {
      const result = await this.backend.generate({ prompt, mode });
      return result.text;
    } catch (error) {
      this.logger.error(`${operation} failed`, error);
      await notifyObserver(this.observers.onTurnError, { operation, error }, this.logger);
      throw error;
    }
  }

  private async speak(message: Message): Promise<void> {
    this.logger.info(formatMessageLine(message));
    await notifyObserver(this.observers.onSpeak, message, this.logger);
  }
}
