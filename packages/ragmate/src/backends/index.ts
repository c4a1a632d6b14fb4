export { createOpenAIBackend, createOpenAIGenerator, DirectBackend } from "./direct-backend.js";
export { type CreateBackendOptions, createBackend } from "./factory.js";
export type {
  BackendKind,
  GenerationBackend,
  GenerationRequest,
  GenerationResult,
  TextGenerator,
} from "./types.js";
export { WorkspaceBackend } from "./workspace-backend.js";
