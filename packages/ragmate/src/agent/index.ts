export {
  type AgentState,
  RagAgent,
  type RagAgentOptions,
  type RespondOptions,
} from "./agent.js";
export { AgentBuilder, DEFAULT_AGENT_NAME, DEFAULT_SYSTEM_PROMPT } from "./builder.js";
export type {
  AgentObservers,
  ObserveDispatchContext,
  ObserveTurnErrorContext,
  TurnOperation,
} from "./observers.js";
