// Agent
export {
  AgentBuilder,
  type AgentObservers,
  type AgentState,
  DEFAULT_AGENT_NAME,
  DEFAULT_SYSTEM_PROMPT,
  type ObserveDispatchContext,
  type ObserveTurnErrorContext,
  RagAgent,
  type RagAgentOptions,
  type RespondOptions,
  type TurnOperation,
} from "./agent/index.js";
// Generation backends
export {
  type BackendKind,
  type CreateBackendOptions,
  createBackend,
  createOpenAIBackend,
  createOpenAIGenerator,
  DirectBackend,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResult,
  type TextGenerator,
  WorkspaceBackend,
} from "./backends/index.js";
// Configuration
export { type Environment, isNonEmpty, readEnvVar, resolveSetting } from "./config/env.js";
export {
  type DirectConfig,
  type DirectConfigOptions,
  resolveDirectConfig,
  resolveWorkspaceConfig,
  type WorkspaceConfig,
  type WorkspaceConfigOptions,
} from "./config/resolve.js";
export * from "./core/constants.js";
export {
  BackendUnavailableError,
  ConfigurationMissingError,
  describeType,
  RagmateError,
  TypeMismatchError,
} from "./core/errors.js";
// Messages and prompts
export {
  createMessage,
  formatMessageLine,
  isMessage,
  isMessageRole,
  MESSAGE_ROLES,
  type Message,
  type MessageInput,
  type MessageRole,
  normalizeMessages,
} from "./core/messages.js";
export { GENERATION_MODES, type GenerationMode, parseGenerationMode, selectMode } from "./core/modes.js";
export {
  CONTEXT_SPEAKER,
  PromptBuilder,
  type PromptEntry,
  SUMMARIZE_INSTRUCTION,
  SUMMARIZE_WITH_HISTORY_INSTRUCTION,
  SYSTEM_SPEAKER,
  toQueryText,
  USER_SPEAKER,
} from "./core/prompt.js";
// Logging
export {
  createLogger,
  defaultLogger,
  type ILogObj,
  LOG_LEVEL_IDS,
  Logger,
  type LoggerOptions,
  parseLogLevel,
  stripAnsi,
} from "./logging/logger.js";
// Memory
export {
  BufferedMemoryWindow,
  estimateMessageTokens,
  type MemoryWindow,
  type RetentionPolicy,
} from "./memory/index.js";
// Workspace service
export * from "./workspace/index.js";
