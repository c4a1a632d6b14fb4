import type { Command } from "commander";
import { createMessage, USER_SPEAKER } from "ragmate";
import { type AgentCommandOptions, createCLIAgent, writeSources } from "./agent-factory.js";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { createNumericParser, executeAction } from "./utils.js";

export interface AskCommandOptions extends AgentCommandOptions {
  context?: string;
}

/**
 * Answers a single question and prints the reply, followed by cited sources.
 */
export async function executeAsk(
  questionWords: string[],
  options: AskCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const { agent, recorder } = createCLIAgent(options, env, config);
  const question = createMessage(options.sender ?? USER_SPEAKER, questionWords.join(" "));

  const reply = await agent.respond(question, {
    useRetrieval: options.rag,
    useMemory: options.memory,
    context: options.context,
  });

  env.stdout.write(`${reply.content}\n`);
  writeSources(env.stdout, recorder.lastSources);
}

/**
 * Registers the agent options shared by `ask` and `chat`.
 */
export function addAgentOptions(cmd: Command): Command {
  return cmd
    .option(OPTION_FLAGS.noRag, OPTION_DESCRIPTIONS.noRag)
    .option(OPTION_FLAGS.noMemory, OPTION_DESCRIPTIONS.noMemory)
    .option(OPTION_FLAGS.system, OPTION_DESCRIPTIONS.system)
    .option(OPTION_FLAGS.name, OPTION_DESCRIPTIONS.name)
    .option(OPTION_FLAGS.sender, OPTION_DESCRIPTIONS.sender)
    .option(
      OPTION_FLAGS.memoryWindow,
      OPTION_DESCRIPTIONS.memoryWindow,
      createNumericParser({ label: "Memory window", integer: true, min: 0 }),
    );
}

export function registerAskCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.ask)
    .description("Ask the agent a single question.")
    .argument("<question...>", "Question to ask.");

  addAgentOptions(cmd)
    .option(OPTION_FLAGS.context, OPTION_DESCRIPTIONS.context)
    .action((question: string[], options: AskCommandOptions) =>
      executeAction(() => executeAsk(question, options, env, config), env),
    );
}
