import type { Command } from "commander";
import { DEFAULT_SEARCH_LIMIT, type WorkspaceSource } from "ragmate";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkspaceOptions } from "./settings.js";
import { createNumericParser, executeAction } from "./utils.js";

const SNIPPET_LENGTH = 120;

export interface SearchCommandOptions {
  limit?: number;
}

/**
 * One-line preview of a source's text.
 */
export function formatSnippet(text: string | undefined): string | undefined {
  const flat = text?.replace(/\s+/g, " ").trim();
  if (!flat) return undefined;
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}...` : flat;
}

function writeSource(env: CLIEnvironment, source: WorkspaceSource, index: number): void {
  env.stdout.write(`${index + 1}. ${source.title ?? "Untitled"}\n`);
  const snippet = formatSnippet(source.text);
  if (snippet) {
    env.stdout.write(`   ${snippet}\n`);
  }
}

export async function executeSearch(
  queryWords: string[],
  options: SearchCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const client = env.createWorkspaceClient(resolveWorkspaceOptions(env, config?.workspace));
  const sources = await client.searchDocuments(queryWords.join(" "), options.limit ?? DEFAULT_SEARCH_LIMIT);

  if (sources.length === 0) {
    env.stdout.write("No related documents found.\n");
    return;
  }

  env.stdout.write(`Found ${sources.length} related documents:\n`);
  sources.forEach((source, index) => writeSource(env, source, index));
}

export function registerSearchCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command(COMMANDS.search)
    .description("List workspace documents related to a query.")
    .argument("<query...>", "Search text.")
    .option(
      OPTION_FLAGS.limit,
      OPTION_DESCRIPTIONS.limit,
      createNumericParser({ label: "Limit", integer: true, min: 1 }),
    )
    .action((query: string[], options: SearchCommandOptions) =>
      executeAction(() => executeSearch(query, options, env, config), env),
    );
}
