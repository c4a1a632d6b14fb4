import type { WorkspaceClient } from "../workspace/client.js";
import type { GenerationBackend, GenerationRequest, GenerationResult } from "./types.js";

/**
 * Backend that forwards prompt and mode to a workspace service, which owns
 * retrieval, ranking and generation.
 *
 * Failures surface as `BackendUnavailableError` from the client and are not retried.
 */
export class WorkspaceBackend implements GenerationBackend {
  readonly kind = "workspace" as const;

  constructor(readonly client: WorkspaceClient) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const response = await this.client.chat(request.prompt, request.mode);
    return {
      text: response.textResponse ?? "",
      sources: response.sources ?? [],
    };
  }
}
