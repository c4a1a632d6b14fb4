/**
 * Fixture generators for conversation and document tests.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMessage, type Message } from "ragmate";

/**
 * Messages from one sender, one per content string.
 *
 * @example
 * ```typescript
 * userMessages("alice", "Hi", "Any news?");
 * ```
 */
export function userMessages(sender: string, ...contents: string[]): Message[] {
  return contents.map((content) => createMessage(sender, content, "user"));
}

/**
 * Alternating user/assistant exchange with `turnCount` turns.
 * Contents read `Question 1`, `Answer 1`, `Question 2`, ...
 */
export function createConversation(
  turnCount: number,
  options?: {
    /** @default "alice" */
    user?: string;
    /** @default "Assistant" */
    agent?: string;
  },
): Message[] {
  const user = options?.user ?? "alice";
  const agent = options?.agent ?? "Assistant";
  const messages: Message[] = [];

  for (let i = 1; i <= turnCount; i++) {
    messages.push(createMessage(user, `Question ${i}`, "user"));
    messages.push(createMessage(agent, `Answer ${i}`, "assistant"));
  }

  return messages;
}

export interface TempDirectory {
  path: string;
  /** Writes files relative to the directory, creating parents as needed. */
  write(files: Record<string, string>): Promise<void>;
  cleanup(): Promise<void>;
}

/**
 * Creates an empty directory under the OS temp dir.
 */
export async function createTempDirectory(prefix = "ragmate-test-"): Promise<TempDirectory> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    async write(files) {
      for (const [name, content] of Object.entries(files)) {
        const target = join(path, name);
        await mkdir(join(target, ".."), { recursive: true });
        await writeFile(target, content, "utf8");
      }
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}
