import type { GenerationMode } from "../core/modes.js";
import type { WorkspaceSource } from "../workspace/schemas.js";

export type BackendKind = "workspace" | "direct";

export interface GenerationRequest {
  /** Fully assembled prompt, sent verbatim. */
  prompt: string;
  mode: GenerationMode;
}

export interface GenerationResult {
  text: string;
  /** Documents cited by the service. Always empty for the direct backend. */
  sources: WorkspaceSource[];
}

/**
 * Anything that turns an assembled prompt into text.
 *
 * Implementations must be interchangeable at the call site: the agent never
 * inspects `kind` to decide how to call `generate()`.
 */
export interface GenerationBackend {
  readonly kind: BackendKind;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

/**
 * Plain text generation capability used by the direct backend.
 */
export type TextGenerator = (prompt: string) => Promise<string>;
