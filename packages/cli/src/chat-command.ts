import { createInterface } from "node:readline";
import chalk from "chalk";
import type { Command } from "commander";
import { BackendUnavailableError, createMessage, USER_SPEAKER } from "ragmate";
import { type AgentCommandOptions, createCLIAgent, writeSources } from "./agent-factory.js";
import { addAgentOptions } from "./ask-command.js";
import type { CLIConfig } from "./config.js";
import { CHAT_EXIT_COMMANDS, COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

export type ChatCommandOptions = AgentCommandOptions;

/**
 * Multi-turn conversation over stdin, one line per turn. Memory carries across
 * turns. A failed turn is reported and the conversation continues.
 */
export async function executeChat(
  options: ChatCommandOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const { agent, recorder } = createCLIAgent(options, env, config);
  const sender = options.sender ?? USER_SPEAKER;
  const rl = createInterface({ input: env.stdin, terminal: false });

  env.stderr.write(`Chatting with ${agent.name}. Type "exit" to leave.\n`);

  try {
    for await (const line of rl) {
      const text = line.trim();
      if (!text) continue;
      if (CHAT_EXIT_COMMANDS.has(text.toLowerCase())) break;

      try {
        const reply = await agent.respond(createMessage(sender, text), {
          useRetrieval: options.rag,
          useMemory: options.memory,
        });
        env.stdout.write(`${chalk.cyan.bold(`${reply.sender}:`)} ${reply.content}\n`);
        writeSources(env.stdout, recorder.lastSources);
      } catch (error) {
        if (!(error instanceof BackendUnavailableError)) {
          throw error;
        }
        env.stderr.write(`${chalk.red.bold("Error:")} ${error.message}\n`);
      }
    }
  } finally {
    rl.close();
  }
}

export function registerChatCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  const cmd = program.command(COMMANDS.chat).description("Hold a conversation with the agent, reading stdin.");

  addAgentOptions(cmd).action((options: ChatCommandOptions) =>
    executeAction(() => executeChat(options, env, config), env),
  );
}
