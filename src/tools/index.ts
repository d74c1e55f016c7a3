export * from "./types";
export * from "./errors";
export { ToolDispatcher, type ToolDispatcherOptions, type ToolResult } from "./registry";
export { thinkTool } from "./think";
export { createAskModelTool } from "./ask-model";
export {
  createWebSearchTool,
  formatSearchResults,
  type SearchClient,
  type SearchHit,
  type SearchRequestOptions,
  type WebSearchToolOptions
} from "./web-search";
