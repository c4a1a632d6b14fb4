import { describeType, TypeMismatchError } from "./errors.js";

export const MESSAGE_ROLES = ["system", "user", "assistant"] as const;

/**
 * Conversational role. Used only to format prompts, never for access control.
 */
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/**
 * An immutable unit of conversation.
 */
export interface Message {
  readonly sender: string;
  readonly role: MessageRole;
  readonly content: string;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * Structural check for a {@link Message}. Roles outside the closed set do not count.
 */
export function isMessage(value: unknown): value is Message {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    "sender" in value &&
    typeof value.sender === "string" &&
    "content" in value &&
    typeof value.content === "string" &&
    "role" in value &&
    isMessageRole(value.role)
  );
}

/**
 * Builds a frozen message, rejecting unknown roles up front.
 *
 * @example
 * ```typescript
 * const question = createMessage("alice", "What is RAG?");
 * const note = createMessage("system", "Be brief.", "system");
 * ```
 */
export function createMessage(sender: string, content: string, role: string = "user"): Message {
  if (!isMessageRole(role)) {
    throw new TypeMismatchError(
      `role "${role}"`,
      `Unknown message role "${role}". Expected one of: ${MESSAGE_ROLES.join(", ")}.`,
    );
  }
  return Object.freeze({ sender, role, content });
}

/**
 * Input accepted wherever the agent takes messages.
 */
export type MessageInput = Message | readonly Message[] | null | undefined;

/**
 * Flattens a variadic mix of messages and message arrays into one ordered list.
 *
 * `null`/`undefined` arguments are skipped and arrays are flattened one level.
 * Any other value, including an array holding a single non-message, fails the
 * whole call with {@link TypeMismatchError}.
 */
export function normalizeMessages(...inputs: unknown[]): Message[] {
  const result: Message[] = [];

  for (const input of inputs) {
    if (input === null || input === undefined) {
      continue;
    }
    if (isMessage(input)) {
      result.push(input);
      continue;
    }
    if (Array.isArray(input) && input.every(isMessage)) {
      result.push(...input);
      continue;
    }
    throw new TypeMismatchError(describeType(input));
  }

  return result;
}

/**
 * Renders a message as a transcript line: `"{sender}: {content}"`.
 */
export function formatMessageLine(message: Message): string {
  return `${message.sender}: ${message.content}`;
}
