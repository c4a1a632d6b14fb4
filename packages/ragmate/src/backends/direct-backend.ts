import OpenAI from "openai";
import type { DirectConfig } from "../config/resolve.js";
import { BackendUnavailableError } from "../core/errors.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import type { GenerationBackend, GenerationRequest, GenerationResult, TextGenerator } from "./types.js";

/**
 * Backend that generates without any retrieval step. The prompt is passed to the
 * generator verbatim and the requested mode is ignored.
 */
export class DirectBackend implements GenerationBackend {
  readonly kind = "direct" as const;
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly generator: TextGenerator,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? defaultLogger.getSubLogger({ name: "direct" });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (request.mode === "chat") {
      this.logger.debug("Retrieval requested but no workspace is configured; generating directly");
    }
    const text = await this.generator(request.prompt);
    return { text, sources: [] };
  }
}

/**
 * Wraps an OpenAI-compatible chat completion endpoint as a {@link TextGenerator}.
 * The prompt is sent as a single user message.
 *
 * @example
 * ```typescript
 * const backend = new DirectBackend(createOpenAIGenerator(new OpenAI(), "gpt-4o-mini"));
 * ```
 */
export function createOpenAIGenerator(client: OpenAI, model: string): TextGenerator {
  return async (prompt) => {
    try {
      const completion = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
      });
      return completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new BackendUnavailableError(
        `Direct generation failed: ${error instanceof Error ? error.message : String(error)}`,
        { status, cause: error },
      );
    }
  };
}

/**
 * Builds a direct backend on the OpenAI SDK from resolved settings.
 */
export function createOpenAIBackend(config: DirectConfig, logger?: Logger<ILogObj>): DirectBackend {
  const client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  return new DirectBackend(createOpenAIGenerator(client, config.model), logger);
}
