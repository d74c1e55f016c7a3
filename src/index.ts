export {
  Orchestrator,
  defaultTools,
  type OrchestratorConfig,
  type ToolFactory
} from "./orchestrator";
export {
  loadSettings,
  DEFAULT_MODELS,
  DEFAULT_PROMPTS_DIR,
  type Settings,
  type SettingsOverrides,
  type ModelConfig,
  type ModelProfiles
} from "./config/settings";
export * from "./agents";
export * from "./prompts";
export * from "./tools";
export * from "./llm/types";
export { OpenAIChatModel, toChatMessages, toAssistantTurn, parseToolArguments } from "./llm/openai-client";
export { DecisionEngine, nextPhaseAfterDecision, type DecisionOutcome, type DecisionResult } from "./decision/engine";
export { formatResearchDate } from "./utils/date";
export type { Logger } from "./utils/logger";
