import type {
  BackendKind,
  GenerationBackend,
  GenerationRequest,
  GenerationResult,
  WorkspaceSource,
} from "ragmate";

/**
 * One scripted reply: plain text, a full result, or an error to throw.
 */
export type ScriptedReply = string | GenerationResult | Error;

export interface MockBackendOptions {
  /** @default "workspace" */
  kind?: BackendKind;
  /** Replies consumed in order, one per `generate()` call. */
  replies?: ScriptedReply[];
  /**
   * Answer used once the script runs out.
   * @default "Mock answer."
   */
  fallback?: string | ((request: GenerationRequest) => string);
  /** Sources attached to text replies. */
  sources?: WorkspaceSource[];
}

/**
 * Scriptable in-process {@link GenerationBackend} that records every request.
 *
 * @example
 * ```typescript
 * const backend = new MockBackend().respondWith("First", "Second").failWith(new Error("down"));
 * const agent = new AgentBuilder().withBackend(backend).build();
 *
 * await agent.respond(createMessage("alice", "Hi"));
 * expect(backend.lastRequest?.mode).toBe("chat");
 * ```
 */
export class MockBackend implements GenerationBackend {
  readonly kind: BackendKind;
  readonly requests: GenerationRequest[] = [];
  private readonly script: ScriptedReply[];
  private readonly fallback: string | ((request: GenerationRequest) => string);
  private readonly sources: WorkspaceSource[];

  constructor(options: MockBackendOptions = {}) {
    this.kind = options.kind ?? "workspace";
    this.script = [...(options.replies ?? [])];
    this.fallback = options.fallback ?? "Mock answer.";
    this.sources = options.sources ?? [];
  }

  /** Queues text replies. */
  respondWith(...texts: string[]): this {
    this.script.push(...texts);
    return this;
  }

  /** Queues a failure for the next unscripted call. */
  failWith(error: Error = new Error("Mock backend failure")): this {
    this.script.push(error);
    return this;
  }

  get lastRequest(): GenerationRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  get prompts(): string[] {
    return this.requests.map((request) => request.prompt);
  }

  /** Scripted replies not yet consumed. */
  get pending(): number {
    return this.script.length;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push({ ...request });

    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next === undefined) {
      const text = typeof this.fallback === "function" ? this.fallback(request) : this.fallback;
      return { text, sources: [...this.sources] };
    }
    if (typeof next === "string") {
      return { text: next, sources: [...this.sources] };
    }
    return next;
  }

  reset(): void {
    this.requests.length = 0;
    this.script.length = 0;
  }
}

/**
 * Shorthand for a mock backend answering with the given texts in order.
 */
export function mockBackend(...replies: ScriptedReply[]): MockBackend {
  return new MockBackend({ replies });
}
