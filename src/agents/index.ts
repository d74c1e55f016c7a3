export * from "./agent-base";
export { ResearchPhase, ResearchState, type ResearchStateSnapshot } from "./research-state";
export {
  ResearchSession,
  ResearchSessionError,
  DEFAULT_MAX_ITERATIONS,
  type ResearchModels,
  type ResearchObservers,
  type ResearchResult,
  type ResearchSessionOptions
} from "./research-session";
export { CompressorAgent, collectRawNotes, RAW_NOTES_SEPARATOR, type CompressionResult } from "./compressor-agent";
export { QualityAssessorAgent } from "./quality-assessor-agent";
