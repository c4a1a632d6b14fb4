import chalk from "chalk";
import {
  AgentBuilder,
  type BackendKind,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResult,
  type RagAgent,
  type WorkspaceSource,
} from "ragmate";
import type { CLIConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveBackendOptions } from "./settings.js";

/**
 * Options shared by the `ask` and `chat` commands.
 */
export interface AgentCommandOptions {
  /** False with --no-rag. */
  rag: boolean;
  /** False with --no-memory. */
  memory: boolean;
  system?: string;
  name?: string;
  sender?: string;
  memoryWindow?: number;
}

/**
 * Passes requests through and keeps the sources cited by the latest answer.
 */
export class SourceRecorder implements GenerationBackend {
  lastSources: WorkspaceSource[] = [];

  constructor(private readonly inner: GenerationBackend) {}

  get kind(): BackendKind {
    return this.inner.kind;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.lastSources = [];
    const result = await this.inner.generate(request);
    this.lastSources = result.sources;
    return result;
  }
}

export interface CLIAgent {
  agent: RagAgent;
  recorder: SourceRecorder;
}

/**
 * Builds an agent from command options, falling back to the [agent] config section.
 */
export function createCLIAgent(
  options: AgentCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): CLIAgent {
  const backend = env.createBackend(resolveBackendOptions(env, config?.workspace, config?.agent));
  const recorder = new SourceRecorder(backend);
  const builder = new AgentBuilder().withBackend(recorder).withLogger(env.createLogger("agent"));

  const name = options.name ?? config?.agent?.name;
  if (name) {
    builder.withName(name);
  }
  const system = options.system ?? config?.agent?.system;
  if (system) {
    builder.withSystem(system);
  }
  const windowSize = options.memoryWindow ?? config?.agent?.["memory-window"];
  if (windowSize !== undefined) {
    builder.withMemoryWindowSize(windowSize);
  }
  if (!options.memory) {
    builder.withMemory(null);
  }

  return { agent: builder.build(), recorder };
}

/**
 * Distinct titles of the cited sources, in citation order.
 */
export function sourceTitles(sources: readonly WorkspaceSource[]): string[] {
  const titles = sources.map((source) => source.title).filter((title): title is string => Boolean(title));
  return [...new Set(titles)];
}

export function writeSources(stream: NodeJS.WritableStream, sources: readonly WorkspaceSource[]): void {
  const titles = sourceTitles(sources);
  if (titles.length === 0) return;

  stream.write(`\n${chalk.dim("Sources:")}\n`);
  for (const title of titles) {
    stream.write(`  - ${title}\n`);
  }
}
