import { TypeMismatchError } from "./errors.js";

export const GENERATION_MODES = ["chat", "query"] as const;

/**
 * `chat` lets the service retrieve workspace documents; `query` answers from the
 * prompt alone.
 */
export type GenerationMode = (typeof GENERATION_MODES)[number];

/**
 * Maps the retrieval flag onto a generation mode. No other input influences it.
 */
export function selectMode(useRetrieval: boolean): GenerationMode {
  return useRetrieval ? "chat" : "query";
}

/**
 * Validates a mode read from configuration or user input.
 */
export function parseGenerationMode(value: string): GenerationMode {
  const normalized = value.trim().toLowerCase();
  for (const mode of GENERATION_MODES) {
    if (mode === normalized) {
      return mode;
    }
  }
  throw new TypeMismatchError(
    `mode "${value}"`,
    `Unknown generation mode "${value}". Expected one of: ${GENERATION_MODES.join(", ")}.`,
  );
}
